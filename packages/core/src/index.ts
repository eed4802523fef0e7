// Types
export * from './types/index.js';

// Utilities
export * from './util/hash.js';
export * from './util/logger.js';
export * from './util/keyed-lock.js';
export * from './errors.js';
export * from './config.js';

// Pipeline
export * from './bus.js';
export * from './correlator.js';
export * from './scorer.js';
export * from './model.js';
export * from './policy/lifecycle.js';
export * from './policy/rules.js';
export * from './policy/budget.js';
export * from './policy/engine.js';
export * from './dispatch-queue.js';
export * from './orchestrator.js';
export * from './handlers.js';

// Federation
export * from './federation/signature.js';
export * from './federation/trust.js';
export * from './federation/intel.js';
export * from './federation/coordinator.js';

// Audit
export * from './audit/log.js';
export * from './audit/why.js';

// Transports
export * from './transports/memory.js';
export * from './transports/logged.js';

// Main node
export * from './node.js';

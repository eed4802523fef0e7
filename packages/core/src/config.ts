/**
 * Configuration
 * =============
 *
 * Node configuration file: tuning constants, the policy rule set and an
 * optional system id. Every field is optional and falls back to
 * DEFAULT_CONFIG / DEFAULT_POLICY. Anything invalid is a PolicyConfigError.
 *
 * {
 *   "systemId": "edge-east-1",
 *   "node": { "windowMs": 30000, "alertThreshold": 0.5 },
 *   "policy": { "version": "2024-06", "rules": [ ... ] }
 * }
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DefenseConfig, DEFAULT_CONFIG, PolicySet } from './types/index.js';
import { PolicyConfigError, describeError } from './errors.js';
import { ActionKindZ, DEFAULT_POLICY, PolicySetZ, compilePolicySet } from './policy/rules.js';

const probability = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();
const nonNegative = z.number().nonnegative();

const perAction = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    noaction: value,
    alert: value,
    deceive: value,
    isolate: value,
    block: value,
  }).partial().strict();

export const DefenseConfigZ = z
  .object({
    maxPendingPerEntity: positiveInt,
    maxSeenSignals: positiveInt,
    windowMs: positiveInt,
    sweepIntervalMs: positiveInt,
    entityAttributes: z.array(z.string().min(1)),
    maxClosedIncidents: positiveInt,
    maxScoreHistory: positiveInt,
    alertThreshold: probability,
    resourceCapacity: nonNegative,
    replenishIntervalMs: positiveInt,
    replenishAmount: nonNegative,
    enabledLegalTags: z.array(z.string().min(1)),
    actionLegalTags: perAction(z.string().min(1)),
    actionCostWeights: perAction(nonNegative),
    terminalActions: z.array(ActionKindZ),
    isolationDurationMs: positiveInt,
    deceptionProfiles: z.record(z.string().min(1)),
    defaultDeceptionProfile: z.string().min(1),
    autonomousResponse: z.boolean(),
    defenseLevel: z.enum(['passive', 'standard', 'paranoid']),
    adaptiveDefense: z.boolean(),
    paranoidSeverityBoost: probability,
    passiveBudgetRatio: probability,
    paranoidThreatCount: positiveInt,
    threatVolumeWindowMs: positiveInt,
    dispatchQueueSize: positiveInt,
    dispatchConcurrency: positiveInt,
    maxRetries: z.number().int().nonnegative(),
    retryBaseDelayMs: nonNegative,
    gossipIntervalMs: positiveInt,
    gossipFanout: positiveInt,
    gossipHops: positiveInt,
    maxSeenMessages: positiveInt,
    newPeerTrust: probability,
    corroborationTtlMs: positiveInt,
    outboundHistory: z.number().int().nonnegative(),
  })
  .partial()
  .strict();

export const ConfigFileZ = z
  .object({
    systemId: z.string().min(1).optional(),
    node: DefenseConfigZ.default({}),
    policy: PolicySetZ.optional(),
  })
  .strict();

export interface LoadedConfig {
  systemId?: string;
  config: DefenseConfig;
  policy: PolicySet;
}

/**
 * Validate a parsed configuration document and merge it over the defaults
 */
export function resolveConfig(input: unknown): LoadedConfig {
  const parsed = ConfigFileZ.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PolicyConfigError(`Invalid configuration: ${detail}`);
  }

  const { actionCostWeights, actionLegalTags, ...rest } = parsed.data.node;
  const config: DefenseConfig = {
    ...DEFAULT_CONFIG,
    ...rest,
    actionCostWeights: { ...DEFAULT_CONFIG.actionCostWeights, ...actionCostWeights },
    actionLegalTags: { ...DEFAULT_CONFIG.actionLegalTags, ...actionLegalTags },
  };

  return {
    systemId: parsed.data.systemId,
    config,
    policy: compilePolicySet(parsed.data.policy ?? DEFAULT_POLICY),
  };
}

/**
 * Read and validate a JSON configuration file
 */
export function loadConfigFile(path: string): LoadedConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new PolicyConfigError(`Cannot read configuration ${path}: ${describeError(error)}`);
  }
  return resolveConfig(raw);
}

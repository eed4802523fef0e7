/**
 * Built-in action handlers.
 *
 * Only alerts have a default: they must always reach a human, even on a
 * node with no enforcement integrations. Isolation, deception and
 * blocking are deployment specific and registered by the host.
 */

import { Outcome, ResponseAction } from './types/index.js';
import { ActionHandler } from './orchestrator.js';
import { logger } from './util/logger.js';

export type AlertAction = Extract<ResponseAction, { kind: 'alert' }>;

export interface AlertSink {
  notify(action: AlertAction): Promise<void>;
}

/**
 * Logs every alert and forwards it to an optional sink (pager, SIEM, chat)
 */
export class AlertHandler implements ActionHandler {
  private delivered = new Set<string>();

  constructor(private sink?: AlertSink, private maxRemembered = 1_000) {}

  async apply(action: ResponseAction, idempotencyKey: string): Promise<Outcome> {
    if (action.kind !== 'alert') {
      return { status: 'failed', reason: `alert handler cannot apply ${action.kind}` };
    }
    if (this.delivered.has(idempotencyKey)) {
      return { status: 'success', reason: 'already delivered' };
    }

    logger.warn('security alert', {
      incidentId: action.incidentId,
      severity: action.severity,
      summary: action.summary,
      reason: action.justification.reason,
    });
    // Sink errors propagate so the orchestrator retries them
    await this.sink?.notify(action);

    this.delivered.add(idempotencyKey);
    if (this.delivered.size > this.maxRemembered) {
      const oldest = this.delivered.values().next();
      if (!oldest.done) this.delivered.delete(oldest.value);
    }
    return { status: 'success' };
  }
}

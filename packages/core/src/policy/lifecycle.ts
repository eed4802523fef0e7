import { IncidentState } from '../types/index.js';

/**
 * Allowed incident state transitions. Closed has no way out.
 */
const TRANSITIONS: Record<IncidentState, readonly IncidentState[]> = {
  [IncidentState.OPEN]: [IncidentState.EVALUATED, IncidentState.CLOSED],
  [IncidentState.EVALUATED]: [IncidentState.EVALUATED, IncidentState.ACTIONED, IncidentState.CLOSED],
  [IncidentState.ACTIONED]: [IncidentState.EVALUATED, IncidentState.ACTIONED, IncidentState.CLOSED],
  [IncidentState.CLOSED]: [],
};

export function canTransition(from: IncidentState, to: IncidentState): boolean {
  return TRANSITIONS[from].includes(to);
}

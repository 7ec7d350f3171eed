import type { ProposalStatus } from './types.js';

/** Events that trigger state transitions. */
export type ProposalEvent =
  | 'validate_audience'
  | 'evaluate_pricing'
  | 'accept'
  | 'counter'
  | 'reject'
  | 'withdraw';

/** Terminal states that do not accept any transitions. */
export const TERMINAL_STATES: ReadonlySet<ProposalStatus> = new Set([
  'ACCEPTED',
  'COUNTERED',
  'REJECTED',
  'WITHDRAWN',
]);

/**
 * Valid state transitions map.
 * Key: current status → Map of event → next status.
 * AUDIENCE_VALIDATING is skipped when the proposal carries no targeting.
 */
const TRANSITIONS: Partial<Record<ProposalStatus, Partial<Record<ProposalEvent, ProposalStatus>>>> = {
  SUBMITTED: {
    validate_audience: 'AUDIENCE_VALIDATING',
    evaluate_pricing: 'PRICING_EVALUATING',
    reject: 'REJECTED',
    withdraw: 'WITHDRAWN',
  },
  AUDIENCE_VALIDATING: {
    evaluate_pricing: 'PRICING_EVALUATING',
    reject: 'REJECTED',
    withdraw: 'WITHDRAWN',
  },
  PRICING_EVALUATING: {
    accept: 'ACCEPTED',
    counter: 'COUNTERED',
    reject: 'REJECTED',
    withdraw: 'WITHDRAWN',
  },
};

export function isTerminal(status: ProposalStatus): boolean {
  return TERMINAL_STATES.has(status);
}

/**
 * Attempt a state transition. Returns the new status if valid, or null if the
 * transition is not allowed.
 */
export function transition(current: ProposalStatus, event: ProposalEvent): ProposalStatus | null {
  if (TERMINAL_STATES.has(current)) {
    return null;
  }
  const allowed = TRANSITIONS[current];
  if (!allowed) {
    return null;
  }
  return allowed[event] ?? null;
}

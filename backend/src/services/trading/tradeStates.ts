import { InvariantViolationError } from './errors';

// ============================================================================
// Trade lifecycle states
// ============================================================================

export type TradeState =
  | 'PLANNED'            // Plan built, nothing sent yet
  | 'ENTRY_SUBMITTED'    // Entry limit order resting on the exchange
  | 'ENTRY_FILLED'       // Entry filled, position open, protection not yet placed
  | 'PROTECTED'          // Stop loss and take-profit ladder resting
  | 'PARTIALLY_CLOSED'   // At least one protective order filled
  | 'CLOSED'             // Quantity reached zero
  | 'ABORTED'            // Entry never filled
  | 'UNPROTECTED';       // Protection could not be placed; manual intervention needed

export const TERMINAL_STATES: readonly TradeState[] = ['CLOSED', 'ABORTED'];

export const STATE_TRANSITIONS: Readonly<Record<TradeState, readonly TradeState[]>> = {
  PLANNED: ['ENTRY_SUBMITTED', 'ABORTED'],
  ENTRY_SUBMITTED: ['ENTRY_FILLED', 'ABORTED'],
  ENTRY_FILLED: ['PROTECTED', 'UNPROTECTED', 'CLOSED'],
  PROTECTED: ['PARTIALLY_CLOSED', 'CLOSED'],
  PARTIALLY_CLOSED: ['PARTIALLY_CLOSED', 'CLOSED'],
  UNPROTECTED: ['UNPROTECTED', 'CLOSED'],
  CLOSED: [],
  ABORTED: [],
};

/** States in which an external cancel is still allowed. */
export const CANCELLABLE_STATES: readonly TradeState[] = ['PLANNED', 'ENTRY_SUBMITTED'];

export function isTerminalState(state: TradeState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function isValidTransition(from: TradeState, to: TradeState): boolean {
  return STATE_TRANSITIONS[from].includes(to);
}

export function assertTransition(tradeId: string, from: TradeState, to: TradeState): void {
  if (!isValidTransition(from, to)) {
    throw new InvariantViolationError(`Illegal trade transition ${from} -> ${to} for ${tradeId}`);
  }
}

import { RejectionReason } from '../../types/trading';

export type TradingErrorCode =
  | 'PLANNING_FAILED'
  | 'TRANSIENT_TRANSPORT'
  | 'EXCHANGE_REJECTED'
  | 'INVARIANT_VIOLATION'
  | 'RECONCILIATION_DISCREPANCY'
  | 'CONFIG_INVALID'
  | 'UPSTREAM_FAILED';

/**
 * Base class for every error raised by the signal-to-execution pipeline.
 * `retryable` tells RetryPolicy whether another attempt can succeed.
 */
export class TradingError extends Error {
  readonly code: TradingErrorCode;
  readonly retryable: boolean;

  constructor(code: TradingErrorCode, message: string, retryable: boolean = false) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PlanningError extends TradingError {
  constructor(readonly reason: Extract<RejectionReason, 'NO_TAKE_PROFIT' | 'QUANTITY_TOO_SMALL'>, message: string) {
    super('PLANNING_FAILED', message);
  }
}

export class InvariantViolationError extends TradingError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
  }
}

export class ReconciliationDiscrepancy extends TradingError {
  constructor(
    readonly kind: 'untracked_position' | 'missing_on_exchange' | 'quantity_mismatch',
    readonly symbol: string,
    message: string
  ) {
    super('RECONCILIATION_DISCREPANCY', message);
  }
}

export class ConfigValidationError extends TradingError {
  constructor(readonly problems: string[]) {
    super('CONFIG_INVALID', `Configuration validation failed: ${problems.join(', ')}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

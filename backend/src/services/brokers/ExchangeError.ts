/**
 * Exchange error taxonomy.
 * Every adapter maps venue-specific failures onto these codes so the
 * execution engine can decide between retrying and aborting.
 */

import { TradingError } from '../trading/errors';

export enum ExchangeErrorCode {
  RATE_LIMITED = 'RATE_LIMITED',
  NETWORK = 'NETWORK',
  TIMEOUT = 'TIMEOUT',
  REJECTED = 'REJECTED',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  SYMBOL_SUSPENDED = 'SYMBOL_SUSPENDED',
  ORDER_NOT_FOUND = 'ORDER_NOT_FOUND',
  UNKNOWN = 'UNKNOWN',
}

const TRANSIENT_CODES: readonly ExchangeErrorCode[] = [
  ExchangeErrorCode.RATE_LIMITED,
  ExchangeErrorCode.NETWORK,
  ExchangeErrorCode.TIMEOUT,
];

export function isTransientCode(code: ExchangeErrorCode): boolean {
  return TRANSIENT_CODES.includes(code);
}

/** Failures after which the venue may or may not have accepted the request. */
const AMBIGUOUS_CODES: readonly ExchangeErrorCode[] = [
  ExchangeErrorCode.NETWORK,
  ExchangeErrorCode.TIMEOUT,
  ExchangeErrorCode.UNKNOWN,
];

export function isAmbiguousCode(code: ExchangeErrorCode): boolean {
  return AMBIGUOUS_CODES.includes(code);
}

export interface ExchangeErrorDetail {
  exchange: string;
  code: ExchangeErrorCode;
  message: string;
  originalCode?: string | number;
  metadata?: Record<string, unknown>;
}

export class ExchangeError extends TradingError {
  readonly exchange: string;
  readonly exchangeCode: ExchangeErrorCode;
  readonly originalCode?: string | number;
  readonly metadata?: Record<string, unknown>;

  constructor(detail: ExchangeErrorDetail, transient: boolean) {
    super(transient ? 'TRANSIENT_TRANSPORT' : 'EXCHANGE_REJECTED', detail.message, transient);
    this.exchange = detail.exchange;
    this.exchangeCode = detail.code;
    this.originalCode = detail.originalCode;
    this.metadata = detail.metadata;
  }

  toJSON(): ExchangeErrorDetail {
    return {
      exchange: this.exchange,
      code: this.exchangeCode,
      message: this.message,
      originalCode: this.originalCode,
      metadata: this.metadata,
    };
  }
}

/** Network failure, timeout or rate limit: safe to retry. */
export class TransientTransportError extends ExchangeError {
  constructor(detail: ExchangeErrorDetail) {
    super(detail, true);
  }
}

/** The venue refused the request: retrying cannot help. */
export class ExchangeRejection extends ExchangeError {
  constructor(detail: ExchangeErrorDetail) {
    super(detail, false);
  }
}

export function createExchangeError(detail: ExchangeErrorDetail): ExchangeError {
  return isTransientCode(detail.code)
    ? new TransientTransportError(detail)
    : new ExchangeRejection(detail);
}

/**
 * Wrap anything thrown by a transport call into an ExchangeError.
 */
export function toExchangeError(exchange: string, error: unknown): ExchangeError {
  if (error instanceof ExchangeError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (/ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|socket hang up/i.test(message)) {
    return createExchangeError({ exchange, code: ExchangeErrorCode.NETWORK, message });
  }

  if (/ETIMEDOUT|timeout|aborted/i.test(message)) {
    return createExchangeError({ exchange, code: ExchangeErrorCode.TIMEOUT, message });
  }

  return createExchangeError({ exchange, code: ExchangeErrorCode.UNKNOWN, message });
}

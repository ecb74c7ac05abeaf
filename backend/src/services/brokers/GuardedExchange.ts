/**
 * Guarded exchange - wraps any ExchangeCapability with the process-wide
 * rate-limit budget and the transient-error retry policy.
 *
 * Order placement is attempted once: after a lost response the order may
 * be resting, and only the caller can look it up by client order id.
 */

import {
  ClientOrderRef,
  DEFAULT_CONSTRAINTS,
  ExchangeBalance,
  ExchangeCapability,
  ExchangeOrder,
  ExchangePosition,
  LimitOrderRequest,
  MarketConstraints,
  OrderRef,
  TriggerOrderRequest,
} from './ExchangeCapability';
import { ExchangeErrorCode, toExchangeError } from './ExchangeError';
import { RateLimiter } from '../resilience/RateLimiter';
import { RetryPolicy } from '../resilience/RetryPolicy';
import { MarketType } from '../../types/trading';

const RATE_LIMIT_COOLDOWN_MS = 1000;
const SINGLE_ATTEMPT = 1;

export class GuardedExchange implements ExchangeCapability {
  readonly name: string;
  readonly tradableMarkets: readonly MarketType[];
  readonly reportedMarkets: readonly MarketType[];

  constructor(
    private readonly inner: ExchangeCapability,
    private readonly rateLimiter: RateLimiter,
    private readonly retryPolicy: RetryPolicy
  ) {
    this.name = inner.name;
    this.tradableMarkets = inner.tradableMarkets;
    this.reportedMarkets = inner.reportedMarkets;
  }

  placeLimitOrder(request: LimitOrderRequest): Promise<ExchangeOrder> {
    return this.call('placeLimitOrder', request.symbol, () => this.inner.placeLimitOrder(request), SINGLE_ATTEMPT);
  }

  placeStopOrder(request: TriggerOrderRequest): Promise<ExchangeOrder> {
    return this.call('placeStopOrder', request.symbol, () => this.inner.placeStopOrder(request), SINGLE_ATTEMPT);
  }

  placeTakeProfitOrder(request: TriggerOrderRequest): Promise<ExchangeOrder> {
    return this.call('placeTakeProfitOrder', request.symbol, () => this.inner.placeTakeProfitOrder(request), SINGLE_ATTEMPT);
  }

  cancelOrder(ref: OrderRef): Promise<void> {
    return this.call('cancelOrder', ref.symbol, () => this.inner.cancelOrder(ref));
  }

  setLeverage(symbol: string, leverage: number): Promise<void> {
    return this.call('setLeverage', symbol, () => this.inner.setLeverage(symbol, leverage));
  }

  fetchOpenPositions(): Promise<ExchangePosition[]> {
    return this.call('fetchOpenPositions', undefined, () => this.inner.fetchOpenPositions());
  }

  fetchOrderStatus(ref: OrderRef): Promise<ExchangeOrder> {
    return this.call('fetchOrderStatus', ref.symbol, () => this.inner.fetchOrderStatus(ref));
  }

  fetchOrderByClientId(ref: ClientOrderRef): Promise<ExchangeOrder | null> {
    return this.call('fetchOrderByClientId', ref.symbol, () => this.inner.fetchOrderByClientId(ref));
  }

  fetchBalance(): Promise<ExchangeBalance[]> {
    return this.call('fetchBalance', undefined, () => this.inner.fetchBalance());
  }

  /** Falls back to conservative defaults when the venue exposes no filters. */
  getMarketConstraints(symbol: string, marketType: MarketType): Promise<MarketConstraints> {
    const getConstraints = this.inner.getMarketConstraints?.bind(this.inner);
    if (!getConstraints) {
      return Promise.resolve(DEFAULT_CONSTRAINTS[marketType]);
    }
    return this.call('getMarketConstraints', symbol, () => getConstraints(symbol, marketType));
  }

  private call<T>(method: string, symbol: string | undefined, fn: () => Promise<T>, maxAttempts?: number): Promise<T> {
    return this.retryPolicy.execute(async () => {
      await this.rateLimiter.waitForToken(this.name);
      try {
        return await fn();
      } catch (error) {
        const exchangeError = toExchangeError(this.name, error);
        if (exchangeError.exchangeCode === ExchangeErrorCode.RATE_LIMITED) {
          this.rateLimiter.block(this.name, RATE_LIMIT_COOLDOWN_MS);
        }
        throw exchangeError;
      }
    }, { service: this.name, method, symbol }, maxAttempts);
  }
}

export default GuardedExchange;

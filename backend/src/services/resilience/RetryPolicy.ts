import logger from '../../utils/logger';
import { Clock, Sleeper, delay, systemClock } from '../../utils/time';
import { TradingError, errorMessage } from '../trading/errors';

export interface RetryConfig {
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  jitterMax: number;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  resetTimeout: number;
  successThreshold: number;
}

export interface CircuitBreakerState {
  isOpen: boolean;
  failureCount: number;
  lastFailureTime: number;
  successCount: number;
}

export interface CallContext {
  service: string;
  method: string;
  symbol?: string;
}

export class CircuitOpenError extends TradingError {
  constructor(readonly service: string) {
    super('TRANSIENT_TRANSPORT', `Circuit breaker is open for service: ${service}`);
  }
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelay: 500,
  maxDelay: 10000,
  backoffMultiplier: 2,
  jitterMax: 250,
};

const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,        // Open circuit after 5 exhausted calls
  resetTimeout: 60000,        // Half-open after 1 minute
  successThreshold: 2,        // Close after 2 successes while half-open
};

export interface RetryPolicyOptions {
  retry?: Partial<RetryConfig>;
  breaker?: Partial<CircuitBreakerConfig>;
  sleep?: Sleeper;
  clock?: Clock;
  random?: () => number;
}

/**
 * Bounded retry with exponential backoff and a per-service circuit breaker.
 * Only errors flagged `retryable` (transport failures) are retried; policy
 * rejections and venue rejections surface on the first attempt.
 */
export class RetryPolicy {
  private readonly retryConfig: RetryConfig;
  private readonly breakerConfig: CircuitBreakerConfig;
  private readonly sleep: Sleeper;
  private readonly clock: Clock;
  private readonly random: () => number;
  private circuitBreakers: Map<string, CircuitBreakerState> = new Map();

  constructor(options: RetryPolicyOptions = {}) {
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.breakerConfig = { ...DEFAULT_BREAKER_CONFIG, ...options.breaker };
    this.sleep = options.sleep ?? delay;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  get maxAttempts(): number {
    return this.retryConfig.maxAttempts;
  }

  async execute<T>(fn: () => Promise<T>, context: CallContext, maxAttempts?: number): Promise<T> {
    if (this.isCircuitOpen(context.service)) {
      throw new CircuitOpenError(context.service);
    }

    const attempts = maxAttempts ?? this.retryConfig.maxAttempts;
    let lastError: unknown = new Error('Not executed');

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const result = await fn();
        if (attempt > 1) {
          logger.info(`Retry successful on attempt ${attempt} for ${context.service}.${context.method}`);
        }
        this.recordSuccess(context.service);
        return result;
      } catch (error) {
        lastError = error;

        if (!RetryPolicy.isRetryable(error)) {
          throw error;
        }

        if (attempt < attempts) {
          const wait = this.calculateRetryDelay(attempt);
          logger.warn(
            `Attempt ${attempt} failed for ${context.service}.${context.method}, retrying in ${wait}ms: ${errorMessage(error)}`
          );
          await this.sleep(wait);
        }
      }
    }

    this.recordFailure(context.service);
    throw lastError;
  }

  static isRetryable(error: unknown): boolean {
    return error instanceof TradingError && error.retryable;
  }

  calculateRetryDelay(attempt: number): number {
    const exponential = this.retryConfig.baseDelay * Math.pow(this.retryConfig.backoffMultiplier, attempt - 1);
    const jitter = Math.floor(this.random() * this.retryConfig.jitterMax);
    return Math.min(exponential + jitter, this.retryConfig.maxDelay);
  }

  isCircuitOpen(service: string): boolean {
    const breaker = this.circuitBreakers.get(service);
    if (!breaker || !breaker.isOpen) {
      return false;
    }

    if (this.clock() - breaker.lastFailureTime >= this.breakerConfig.resetTimeout) {
      // Half-open: let calls through and count successes
      breaker.isOpen = false;
      breaker.successCount = 0;
      logger.info(`Circuit breaker half-open for service: ${service}`);
      return false;
    }

    return true;
  }

  getCircuitState(service: string): CircuitBreakerState | undefined {
    const breaker = this.circuitBreakers.get(service);
    return breaker ? { ...breaker } : undefined;
  }

  private recordSuccess(service: string): void {
    const breaker = this.circuitBreakers.get(service);
    if (!breaker) return;

    breaker.successCount++;
    if (breaker.successCount >= this.breakerConfig.successThreshold) {
      this.circuitBreakers.delete(service);
    }
  }

  private recordFailure(service: string): void {
    const breaker = this.circuitBreakers.get(service) ?? {
      isOpen: false,
      failureCount: 0,
      lastFailureTime: 0,
      successCount: 0,
    };

    breaker.failureCount++;
    breaker.successCount = 0;
    breaker.lastFailureTime = this.clock();

    if (breaker.failureCount >= this.breakerConfig.failureThreshold && !breaker.isOpen) {
      breaker.isOpen = true;
      logger.error(`Circuit breaker opened for service: ${service} after ${breaker.failureCount} failures`);
    }

    this.circuitBreakers.set(service, breaker);
  }
}

export default RetryPolicy;

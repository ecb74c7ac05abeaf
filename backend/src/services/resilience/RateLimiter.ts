import logger from '../../utils/logger';
import { Clock, Sleeper, delay, systemClock } from '../../utils/time';

export interface RateLimitStatus {
  service: string;
  remaining: number;
  queued: number;
  isBlocked: boolean;
}

interface TokenBucket {
  tokens: number;
  maxTokens: number;
  refillRate: number; // tokens per second
  lastRefill: number;
  blockedUntil: number;
  queued: number;
  tail: Promise<void>;
}

/**
 * Token-bucket limiter shared by every caller of a service.
 * Callers that find the bucket empty wait in FIFO order; nobody is dropped.
 */
export class RateLimiter {
  private buckets: Map<string, TokenBucket> = new Map();
  private stats: Map<string, { requests: number; waited: number }> = new Map();
  private readonly clock: Clock;
  private readonly sleep: Sleeper;

  constructor(options: { clock?: Clock; sleep?: Sleeper } = {}) {
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? delay;
  }

  addLimit(service: string, requestsPerSecond: number, windowMs: number = 1000): void {
    const maxTokens = Math.max(1, Math.floor(requestsPerSecond * (windowMs / 1000)));

    this.buckets.set(service, {
      tokens: maxTokens,
      maxTokens,
      refillRate: requestsPerSecond,
      lastRefill: this.clock(),
      blockedUntil: 0,
      queued: 0,
      tail: Promise.resolve(),
    });
    this.stats.set(service, { requests: 0, waited: 0 });

    logger.debug(`Rate limiter configured for ${service}: ${requestsPerSecond} req/s, capacity ${maxTokens}`);
  }

  /** Limit expressed as a fixed request-per-minute ceiling. */
  addPerMinuteLimit(service: string, requestsPerMinute: number): void {
    this.addLimit(service, requestsPerMinute / 60, 60000);
  }

  async waitForToken(service: string): Promise<void> {
    const bucket = this.buckets.get(service);
    if (!bucket) {
      logger.warn(`No rate limit configured for service: ${service}`);
      return;
    }

    bucket.queued++;
    const turn = bucket.tail.then(() => this.acquire(service, bucket));
    bucket.tail = turn.catch(() => undefined);

    try {
      await turn;
    } finally {
      bucket.queued--;
    }
  }

  /** Pause a service, e.g. after the venue answered 429 with Retry-After. */
  block(service: string, ms: number): void {
    const bucket = this.buckets.get(service);
    if (!bucket) return;
    bucket.blockedUntil = Math.max(bucket.blockedUntil, this.clock() + ms);
    logger.warn(`Service ${service} blocked for ${ms}ms`);
  }

  getStatus(service: string): RateLimitStatus | undefined {
    const bucket = this.buckets.get(service);
    if (!bucket) return undefined;

    this.refill(bucket);
    return {
      service,
      remaining: Math.floor(bucket.tokens),
      queued: bucket.queued,
      isBlocked: bucket.blockedUntil > this.clock(),
    };
  }

  getStats(service: string): { requests: number; waited: number } | undefined {
    return this.stats.get(service);
  }

  private async acquire(service: string, bucket: TokenBucket): Promise<void> {
    const blockedFor = bucket.blockedUntil - this.clock();
    if (blockedFor > 0) {
      logger.debug(`Service ${service} is blocked, waiting ${blockedFor}ms`);
      await this.sleep(blockedFor);
    }

    this.refill(bucket);
    let waited = false;
    while (bucket.tokens < 1) {
      const waitTimeMs = Math.ceil(((1 - bucket.tokens) / bucket.refillRate) * 1000);
      logger.debug(`Rate limit reached for ${service}, waiting ${waitTimeMs}ms`);
      waited = true;
      await this.sleep(waitTimeMs);
      this.refill(bucket);
    }

    bucket.tokens -= 1;
    const stats = this.stats.get(service);
    if (stats) {
      stats.requests++;
      if (waited) stats.waited++;
    }
  }

  private refill(bucket: TokenBucket): void {
    const now = this.clock();
    const elapsedSeconds = (now - bucket.lastRefill) / 1000;
    if (elapsedSeconds <= 0) return;

    bucket.tokens = Math.min(bucket.maxTokens, bucket.tokens + elapsedSeconds * bucket.refillRate);
    bucket.lastRefill = now;
  }
}

export default RateLimiter;

import { createHash } from 'crypto';
import { CandidateSignal } from '../../types/trading';
import { Clock, systemClock } from '../../utils/time';

/**
 * SHA-256 over symbol, direction, entry, stop and the arrival-time bucket.
 */
export function signalFingerprint(signal: CandidateSignal, bucketMs: number, bucketOffset: number = 0): string {
  const bucket = Math.floor(signal.receivedAt / bucketMs) + bucketOffset;
  const entry = signal.entry.kind === 'limit' ? String(signal.entry.price) : 'market';
  const parts = [
    signal.symbol.toUpperCase(),
    signal.direction,
    entry,
    signal.stopLoss === undefined ? 'none' : String(signal.stopLoss),
    String(bucket),
  ];
  return createHash('sha256').update(parts.join('|')).digest('hex');
}

/**
 * Identifier of one accepted execution. The same alert re-sent after its
 * fingerprint expired gets a fresh id.
 */
export function tradeIdFor(fingerprint: string, acceptedAt: number, sequence: number): string {
  return createHash('sha256').update(`${fingerprint}|${acceptedAt}|${sequence}`).digest('hex');
}

/**
 * Fingerprints of accepted signals with the time they were first seen.
 * Entries only leave the cache by expiring.
 */
export class ProcessedSignalCache {
  private seen: Map<string, number> = new Map();

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * A re-delivered alert can land in the bucket after the original one,
   * so the previous bucket is checked as well.
   */
  isDuplicate(signal: CandidateSignal, bucketMs: number, ttlMs: number): boolean {
    this.prune(ttlMs);
    return [0, -1].some(offset => this.seen.has(signalFingerprint(signal, bucketMs, offset)));
  }

  /** Returns when the fingerprint was first seen. */
  record(fingerprint: string): number {
    const existing = this.seen.get(fingerprint);
    if (existing !== undefined) return existing;
    const seenAt = this.clock();
    this.seen.set(fingerprint, seenAt);
    return seenAt;
  }

  firstSeen(fingerprint: string): number | undefined {
    return this.seen.get(fingerprint);
  }

  prune(ttlMs: number): void {
    const cutoff = this.clock() - ttlMs;
    for (const [fingerprint, seenAt] of this.seen) {
      if (seenAt <= cutoff) {
        this.seen.delete(fingerprint);
      }
    }
  }

  get size(): number {
    return this.seen.size;
  }
}

export default ProcessedSignalCache;

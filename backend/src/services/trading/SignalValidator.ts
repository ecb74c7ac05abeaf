import logger from '../../utils/logger';
import KeyedMutex from '../../utils/KeyedMutex';
import {
  CandidateSignal,
  MarketType,
  Rejection,
  RejectionReason,
  ValidatedTrade,
  ValidationResult,
} from '../../types/trading';
import { ConfigSnapshot, maxPositionsFor, positionSizeFor } from '../../config/TradingConfig';
import { RiskState } from './RiskState';
import { ProcessedSignalCache, signalFingerprint, tradeIdFor } from './ProcessedSignalCache';
import { ExposureView } from './PositionTracker';

const VALIDATION_LOCK = 'validation';

type Check =
  | { ok: true }
  | { ok: false; reason: RejectionReason; message: string };

const pass: Check = { ok: true };

function fail(reason: RejectionReason, message: string): Check {
  return { ok: false, reason, message };
}

/** Take-profit levels on the profitable side of the entry, in signal order. */
export function profitableTargets(signal: CandidateSignal, entryPrice: number): number[] {
  return signal.takeProfits.filter(price =>
    Number.isFinite(price) && (signal.direction === 'long' ? price > entryPrice : price < entryPrice)
  );
}

/** |nearest TP - entry| / |entry - stop| */
export function riskRewardRatio(entryPrice: number, stopLoss: number, takeProfits: readonly number[]): number | null {
  if (takeProfits.length === 0) return null;
  const risk = Math.abs(entryPrice - stopLoss);
  if (risk === 0) return null;
  const nearest = Math.min(...takeProfits.map(price => Math.abs(price - entryPrice)));
  return nearest / risk;
}

/** Config override when set, then the signal's hint, then the configured default. */
export function resolveLeverage(signal: CandidateSignal, config: ConfigSnapshot): number {
  if (config.leverage > 0) return config.leverage;
  if (signal.leverage !== undefined && Number.isFinite(signal.leverage) && signal.leverage > 0) {
    return Math.floor(signal.leverage);
  }
  return config.defaultLeverage;
}

export interface SignalValidatorOptions {
  /** Market types the connected venue can trade; defaults to all. */
  supportedMarkets?: readonly MarketType[];
  mutex?: KeyedMutex;
}

/**
 * Turns a candidate into a ValidatedTrade or a Rejection. The whole
 * check-then-record sequence runs under one global lock so two copies of
 * the same alert can never both pass the duplicate checks.
 */
export class SignalValidator {
  private readonly supportedMarkets: ReadonlySet<MarketType>;
  private readonly mutex: KeyedMutex;
  private accepted = 0;

  constructor(
    private readonly riskState: RiskState,
    private readonly exposure: ExposureView,
    private readonly cache: ProcessedSignalCache,
    options: SignalValidatorOptions = {}
  ) {
    this.supportedMarkets = new Set(options.supportedMarkets ?? ['futures', 'spot']);
    this.mutex = options.mutex ?? new KeyedMutex();
  }

  async validate(candidate: CandidateSignal, config: ConfigSnapshot): Promise<ValidationResult> {
    return this.mutex.runExclusive(VALIDATION_LOCK, () => this.validateLocked(candidate, config));
  }

  private validateLocked(signal: CandidateSignal, config: ConfigSnapshot): ValidationResult {
    const symbol = signal.symbol.toUpperCase();

    const policy = this.checkPolicy(signal, symbol, config);
    if (!policy.ok) return this.reject(signal, policy.reason, policy.message);

    if (signal.entry.kind !== 'limit') {
      return this.reject(signal, 'MARKET_ENTRY_REJECTED', 'Market entries are not traded; a limit entry price is required');
    }
    const entryPrice = signal.entry.price;

    const stop = checkStopLoss(signal, entryPrice);
    if (typeof stop !== 'number') {
      return this.reject(signal, 'INVALID_STOP_LOSS', stop.message);
    }
    const stopLoss = stop;

    const takeProfits = profitableTargets(signal, entryPrice);
    const riskReward = riskRewardRatio(entryPrice, stopLoss, takeProfits);
    if (riskReward === null || riskReward <= 0 || riskReward > config.maxRiskRewardRatio) {
      const detail = riskReward === null
        ? 'no take-profit level on the profitable side of entry'
        : `risk/reward ${riskReward.toFixed(2)} outside (0, ${config.maxRiskRewardRatio}]`;
      return this.reject(signal, 'RISK_REWARD_EXCEEDED', `Risk/reward rejected: ${detail}`);
    }

    const exposure = this.checkExposure(signal, symbol, config);
    if (!exposure.ok) return this.reject(signal, exposure.reason, exposure.message);

    if (this.cache.isDuplicate(signal, config.fingerprintBucketMs, config.signalTtlMs)) {
      return this.reject(signal, 'DUPLICATE_SIGNAL', `Signal for ${symbol} already processed within ${config.signalTtlMs}ms`);
    }

    const fingerprint = signalFingerprint(signal, config.fingerprintBucketMs);
    const acceptedAt = this.cache.record(fingerprint);
    const tradeId = tradeIdFor(fingerprint, acceptedAt, ++this.accepted);
    this.exposure.reserve(tradeId, symbol, signal.marketType, fingerprint);

    const base = {
      verdict: 'accepted' as const,
      tradeId,
      fingerprint,
      signal,
      symbol,
      direction: signal.direction,
      entryPrice,
      stopLoss,
      takeProfits,
      riskReward,
      positionSize: positionSizeFor(config, signal.marketType),
    };
    const trade: ValidatedTrade = signal.marketType === 'futures'
      ? { ...base, marketType: 'futures', leverage: resolveLeverage(signal, config) }
      : { ...base, marketType: 'spot' };

    logger.info(
      `Signal accepted: ${trade.direction} ${symbol} ${trade.marketType} @ ${entryPrice}, ` +
      `SL ${stopLoss}, R/R ${riskReward.toFixed(2)}`
    );
    return trade;
  }

  private checkPolicy(signal: CandidateSignal, symbol: string, config: ConfigSnapshot): Check {
    if (!config.tradingEnabled || !this.riskState.isTradingEnabled()) {
      const reason = this.riskState.snapshot().haltReason ?? 'trading disabled by configuration';
      return fail('TRADING_HALTED', `Trading halted: ${reason}`);
    }
    if (config.blacklist.has(symbol)) {
      return fail('BLACKLISTED', `${symbol} is blacklisted`);
    }
    if (!(signal.confidence >= config.minConfidenceThreshold)) {
      return fail('LOW_CONFIDENCE', `Confidence ${signal.confidence} below ${config.minConfidenceThreshold}`);
    }
    if (!this.supportedMarkets.has(signal.marketType)) {
      return fail('MARKET_UNSUPPORTED', `${signal.marketType} trading is not supported by the connected exchange`);
    }
    return pass;
  }

  /**
   * Reservations made for this signal's own fingerprints are not counted
   * while those fingerprints are still cached: the re-delivery is then
   * reported as DUPLICATE_SIGNAL.
   */
  private checkExposure(signal: CandidateSignal, symbol: string, config: ConfigSnapshot): Check {
    this.cache.prune(config.signalTtlMs);
    const own = new Set([0, -1]
      .map(offset => signalFingerprint(signal, config.fingerprintBucketMs, offset))
      .filter(fingerprint => this.cache.firstSeen(fingerprint) !== undefined));
    if (!config.allowHedging && this.exposure.hasExposure(symbol, signal.marketType, own)) {
      return fail('DUPLICATE_POSITION', `A ${signal.marketType} position for ${symbol} is already open`);
    }
    const limit = maxPositionsFor(config, signal.marketType);
    if (this.exposure.exposureCount(signal.marketType, own) >= limit) {
      return fail('MAX_POSITIONS_REACHED', `Maximum of ${limit} ${signal.marketType} positions reached`);
    }
    return pass;
  }

  private reject(signal: CandidateSignal, reason: RejectionReason, message: string): Rejection {
    logger.warn(`Signal rejected (${reason}): ${message}`, { messageId: signal.sourceMessageId });
    return { verdict: 'rejected', reason, message, signal };
  }
}

/** The usable stop price, or why there is none. */
function checkStopLoss(signal: CandidateSignal, entryPrice: number): number | { message: string } {
  const stop = signal.stopLoss;
  if (stop === undefined || !Number.isFinite(stop) || stop <= 0) {
    return { message: 'Stop loss is missing' };
  }
  const correctSide = signal.direction === 'long' ? stop < entryPrice : stop > entryPrice;
  if (!correctSide) {
    const expected = signal.direction === 'long' ? 'below' : 'above';
    return { message: `Stop loss ${stop} must be ${expected} entry ${entryPrice} for a ${signal.direction}` };
  }
  return stop;
}

export default SignalValidator;

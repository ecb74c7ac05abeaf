import { MarketType, TradingMode } from '../types/trading';
import { ConfigValidationError } from '../services/trading/errors';

/**
 * Immutable trading policy snapshot. One snapshot is read per decision;
 * a newer snapshot only affects decisions that start after it is published.
 */
export interface ConfigSnapshot {
  readonly mode: TradingMode;
  /** Leverage override; 0 means "use the signal's leverage". */
  readonly leverage: number;
  readonly defaultLeverage: number;
  readonly futuresPositionSize: number;
  readonly spotPositionSize: number;
  readonly maxFuturesPositions: number;
  readonly maxSpotPositions: number;
  readonly maxDailyLoss: number;
  readonly blacklist: ReadonlySet<string>;
  readonly minConfidenceThreshold: number;
  readonly maxRiskRewardRatio: number;
  readonly tradingEnabled: boolean;
  readonly allowHedging: boolean;
  readonly adoptUntrackedPositions: boolean;
  readonly entryPriceTolerance: number;
  readonly takeProfitOffset: number;
  readonly entryFillTimeoutMs: number;
  readonly entryPollIntervalMs: number;
  readonly protectiveOrderRetries: number;
  readonly signalTtlMs: number;
  readonly fingerprintBucketMs: number;
  readonly reconcileIntervalMs: number;
  readonly quantityTolerance: number;
  readonly aiRequestsPerMinute: number;
}

type NumericKey = {
  [K in keyof ConfigSnapshot]: ConfigSnapshot[K] extends number ? K : never;
}[keyof ConfigSnapshot];

type BooleanKey = {
  [K in keyof ConfigSnapshot]: ConfigSnapshot[K] extends boolean ? K : never;
}[keyof ConfigSnapshot];

/** JSON shape of the config file: same keys, blacklist as an array. */
export type RawTradingConfig = Partial<Omit<ConfigSnapshot, 'blacklist'> & { blacklist: string[] }>;

export const DEFAULT_TRADING_CONFIG: Omit<ConfigSnapshot, 'blacklist'> & { blacklist: string[] } = {
  mode: 'demo',
  leverage: 0,
  defaultLeverage: 1,
  futuresPositionSize: 150,
  spotPositionSize: 100,
  maxFuturesPositions: 2,
  maxSpotPositions: 1,
  maxDailyLoss: 300,
  blacklist: [],
  minConfidenceThreshold: 0.7,
  maxRiskRewardRatio: 3.0,
  tradingEnabled: true,
  allowHedging: false,
  adoptUntrackedPositions: false,
  entryPriceTolerance: 0,
  takeProfitOffset: 0.0005,
  entryFillTimeoutMs: 15 * 60 * 1000,
  entryPollIntervalMs: 2000,
  protectiveOrderRetries: 3,
  signalTtlMs: 5 * 60 * 1000,
  fingerprintBucketMs: 60 * 1000,
  reconcileIntervalMs: 10 * 1000,
  quantityTolerance: 0.01,
  aiRequestsPerMinute: 60,
};

const NUMERIC_RULES: Record<NumericKey, { min: number; max?: number; integer?: boolean }> = {
  leverage: { min: 0, max: 125, integer: true },
  defaultLeverage: { min: 1, max: 125, integer: true },
  futuresPositionSize: { min: 0 },
  spotPositionSize: { min: 0 },
  maxFuturesPositions: { min: 0, integer: true },
  maxSpotPositions: { min: 0, integer: true },
  maxDailyLoss: { min: 0 },
  minConfidenceThreshold: { min: 0, max: 1 },
  maxRiskRewardRatio: { min: 0 },
  entryPriceTolerance: { min: 0, max: 0.05 },
  takeProfitOffset: { min: 0, max: 0.05 },
  entryFillTimeoutMs: { min: 1000 },
  entryPollIntervalMs: { min: 10 },
  protectiveOrderRetries: { min: 1, max: 10, integer: true },
  signalTtlMs: { min: 1000 },
  fingerprintBucketMs: { min: 1000 },
  reconcileIntervalMs: { min: 1000 },
  quantityTolerance: { min: 0, max: 1 },
  aiRequestsPerMinute: { min: 1, integer: true },
};

const BOOLEAN_KEYS: readonly BooleanKey[] = [
  'tradingEnabled',
  'allowHedging',
  'adoptUntrackedPositions',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumericKey(key: string): key is NumericKey {
  return Object.prototype.hasOwnProperty.call(NUMERIC_RULES, key);
}

/**
 * Validate raw config (parsed JSON or a programmatic patch) and freeze it.
 * Unknown keys are ignored; every problem is collected before throwing.
 */
export function buildConfigSnapshot(raw: unknown, base: ConfigSnapshot = defaultSnapshot()): ConfigSnapshot {
  if (!isRecord(raw)) {
    throw new ConfigValidationError(['configuration must be a JSON object']);
  }

  const problems: string[] = [];
  const numbers: Record<NumericKey, number> = {
    leverage: base.leverage,
    defaultLeverage: base.defaultLeverage,
    futuresPositionSize: base.futuresPositionSize,
    spotPositionSize: base.spotPositionSize,
    maxFuturesPositions: base.maxFuturesPositions,
    maxSpotPositions: base.maxSpotPositions,
    maxDailyLoss: base.maxDailyLoss,
    minConfidenceThreshold: base.minConfidenceThreshold,
    maxRiskRewardRatio: base.maxRiskRewardRatio,
    entryPriceTolerance: base.entryPriceTolerance,
    takeProfitOffset: base.takeProfitOffset,
    entryFillTimeoutMs: base.entryFillTimeoutMs,
    entryPollIntervalMs: base.entryPollIntervalMs,
    protectiveOrderRetries: base.protectiveOrderRetries,
    signalTtlMs: base.signalTtlMs,
    fingerprintBucketMs: base.fingerprintBucketMs,
    reconcileIntervalMs: base.reconcileIntervalMs,
    quantityTolerance: base.quantityTolerance,
    aiRequestsPerMinute: base.aiRequestsPerMinute,
  };
  const flags: Record<BooleanKey, boolean> = {
    tradingEnabled: base.tradingEnabled,
    allowHedging: base.allowHedging,
    adoptUntrackedPositions: base.adoptUntrackedPositions,
  };

  for (const [key, value] of Object.entries(raw)) {
    if (!isNumericKey(key)) continue;
    const rule = NUMERIC_RULES[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      problems.push(`${key} must be a number`);
    } else if (value < rule.min || (rule.max !== undefined && value > rule.max)) {
      problems.push(`${key} must be between ${rule.min} and ${rule.max ?? 'infinity'}`);
    } else if (rule.integer && !Number.isInteger(value)) {
      problems.push(`${key} must be an integer`);
    } else {
      numbers[key] = value;
    }
  }

  if (numbers.signalTtlMs < numbers.fingerprintBucketMs) {
    problems.push('signalTtlMs must be at least fingerprintBucketMs');
  }

  for (const key of BOOLEAN_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      problems.push(`${key} must be a boolean`);
    } else {
      flags[key] = value;
    }
  }

  let mode: TradingMode = base.mode;
  if (raw.mode !== undefined) {
    if (raw.mode === 'demo' || raw.mode === 'live') {
      mode = raw.mode;
    } else {
      problems.push('mode must be "demo" or "live"');
    }
  }

  let blacklist: ReadonlySet<string> = base.blacklist;
  if (raw.blacklist !== undefined) {
    const list = raw.blacklist;
    if (Array.isArray(list) && list.every((item): item is string => typeof item === 'string')) {
      blacklist = new Set(list.map(symbol => symbol.toUpperCase()));
    } else {
      problems.push('blacklist must be an array of symbols');
    }
  }

  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }

  return Object.freeze({ mode, blacklist, ...numbers, ...flags });
}

export function defaultSnapshot(): ConfigSnapshot {
  const { blacklist, ...rest } = DEFAULT_TRADING_CONFIG;
  return Object.freeze({ ...rest, blacklist: new Set(blacklist) });
}

/** Serialisable form of a snapshot, used for persistence and the ops API. */
export function toRawConfig(config: ConfigSnapshot): Required<RawTradingConfig> {
  return { ...config, blacklist: [...config.blacklist] };
}

export function positionSizeFor(config: ConfigSnapshot, marketType: MarketType): number {
  return marketType === 'futures' ? config.futuresPositionSize : config.spotPositionSize;
}

export function maxPositionsFor(config: ConfigSnapshot, marketType: MarketType): number {
  return marketType === 'futures' ? config.maxFuturesPositions : config.maxSpotPositions;
}

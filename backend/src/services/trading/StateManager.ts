import Redis from 'ioredis';
import logger from '../../utils/logger';
import { Position, RiskSnapshot } from '../../types/trading';
import { PersistenceAdapter } from '../persistence/PersistenceAdapter';
import { RedisSettings } from '../../config/secrets';

/** The subset of the ioredis client the state manager talks to. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  sadd(key: string, member: string): Promise<number>;
  srem(key: string, member: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
  publish(channel: string, message: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

/**
 * Redis-backed persistence for the risk ledger and open positions.
 */
export class StateManager implements PersistenceAdapter {
  private readonly redis: RedisLike;
  private isInitialized: boolean = false;

  // Redis key layout
  private readonly KEYS: { RISK: string; POSITION: string; POSITION_INDEX: string };

  private readonly CHANNELS = {
    POSITIONS: 'trading:positions',
    RISK: 'trading:risk',
  };

  constructor(settings: RedisSettings, client?: RedisLike) {
    this.KEYS = {
      RISK: `${settings.keyPrefix}risk`,
      POSITION: `${settings.keyPrefix}position:`,
      POSITION_INDEX: `${settings.keyPrefix}positions`,
    };

    if (client) {
      this.redis = client;
      return;
    }

    const redis = new Redis({
      host: settings.host,
      port: settings.port,
      password: settings.password,
      lazyConnect: true,
      retryStrategy: (times: number) => Math.min(times * 50, 2000),
    });
    redis.on('connect', () => logger.info('Redis connected'));
    redis.on('error', (err: Error) => logger.error('Redis error:', err));
    this.redis = redis;
  }

  async initialize(): Promise<void> {
    if (this.isInitialized) return;

    try {
      await this.redis.ping();
      this.isInitialized = true;
      logger.info('State Manager initialized with Redis');
    } catch (error) {
      logger.error('Failed to initialize State Manager:', error);
      throw error;
    }
  }

  // Risk ledger
  async loadRiskState(): Promise<RiskSnapshot | null> {
    const data = await this.redis.get(this.KEYS.RISK);
    return data ? parseRiskSnapshot(data) : null;
  }

  async saveRiskState(state: RiskSnapshot): Promise<void> {
    const payload = JSON.stringify(state);
    await this.redis.set(this.KEYS.RISK, payload);
    await this.redis.publish(this.CHANNELS.RISK, payload);
  }

  // Positions
  async loadPositions(): Promise<Position[]> {
    const ids = await this.redis.smembers(this.KEYS.POSITION_INDEX);
    const positions: Position[] = [];

    for (const id of ids) {
      const data = await this.redis.get(this.KEYS.POSITION + id);
      const position = data ? parsePosition(data) : null;
      if (position) {
        positions.push(position);
      } else {
        logger.warn(`Dropping unreadable position record ${id}`);
        await this.redis.srem(this.KEYS.POSITION_INDEX, id);
      }
    }

    return positions;
  }

  async savePosition(position: Position): Promise<void> {
    await this.redis.set(this.KEYS.POSITION + position.id, JSON.stringify(position));
    await this.redis.sadd(this.KEYS.POSITION_INDEX, position.id);

    await this.redis.publish(this.CHANNELS.POSITIONS, JSON.stringify({
      type: 'position_update',
      position,
    }));
  }

  async removePosition(positionId: string): Promise<void> {
    await this.redis.del(this.KEYS.POSITION + positionId);
    await this.redis.srem(this.KEYS.POSITION_INDEX, positionId);

    await this.redis.publish(this.CHANNELS.POSITIONS, JSON.stringify({
      type: 'position_removed',
      positionId,
    }));
  }

  async cleanup(): Promise<void> {
    await this.redis.quit();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseRiskSnapshot(data: string): RiskSnapshot | null {
  const parsed: unknown = JSON.parse(data);
  if (!isRecord(parsed) || !isRecord(parsed.openPositions)) return null;

  const { tradingDay, dailyRealizedPnL, tradingEnabled, haltReason, openPositions } = parsed;
  if (typeof tradingDay !== 'string' || typeof dailyRealizedPnL !== 'number' || typeof tradingEnabled !== 'boolean') {
    return null;
  }

  return {
    tradingDay,
    dailyRealizedPnL,
    tradingEnabled,
    haltReason: typeof haltReason === 'string' ? haltReason : undefined,
    openPositions: {
      futures: typeof openPositions.futures === 'number' ? openPositions.futures : 0,
      spot: typeof openPositions.spot === 'number' ? openPositions.spot : 0,
    },
  };
}

function parsePosition(data: string): Position | null {
  const parsed: unknown = JSON.parse(data);
  if (!isRecord(parsed)) return null;

  const {
    id, symbol, marketType, side, entryPrice, quantity, initialQuantity, leverage,
    stopLossOrderId, takeProfitOrderIds, openedAt, signalId, status, realizedPnL, lastMarkPrice, adopted,
  } = parsed;

  if (
    typeof id !== 'string' || typeof symbol !== 'string' || typeof signalId !== 'string' ||
    (marketType !== 'futures' && marketType !== 'spot') ||
    (side !== 'long' && side !== 'short') ||
    (status !== 'open' && status !== 'partially_closed' && status !== 'unprotected' && status !== 'closed') ||
    typeof entryPrice !== 'number' || typeof quantity !== 'number' || typeof openedAt !== 'number'
  ) {
    return null;
  }

  return {
    id,
    symbol,
    marketType,
    side,
    entryPrice,
    quantity,
    initialQuantity: typeof initialQuantity === 'number' ? initialQuantity : quantity,
    leverage: typeof leverage === 'number' ? leverage : 1,
    stopLossOrderId: typeof stopLossOrderId === 'string' ? stopLossOrderId : undefined,
    takeProfitOrderIds: Array.isArray(takeProfitOrderIds)
      ? takeProfitOrderIds.filter((orderId): orderId is string => typeof orderId === 'string')
      : [],
    openedAt,
    signalId,
    status,
    realizedPnL: typeof realizedPnL === 'number' ? realizedPnL : 0,
    lastMarkPrice: typeof lastMarkPrice === 'number' ? lastMarkPrice : undefined,
    adopted: adopted === true ? true : undefined,
  };
}

export default StateManager;

import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import KeyedMutex from '../../utils/KeyedMutex';
import {
  Direction,
  FillEvent,
  MARKET_TYPES,
  MarketType,
  Position,
  positionKey,
} from '../../types/trading';
import { PersistenceAdapter } from '../persistence/PersistenceAdapter';
import { ConfigStore } from '../../config/ConfigStore';
import { RiskState } from './RiskState';
import { InvariantViolationError, errorMessage } from './errors';

const QUANTITY_EPSILON = 1e-12;

export interface ClosedPosition {
  position: Position;
  exitPrice: number;
  realizedPnL: number;
}

export interface MutationResult {
  position: Position;
  realizedPnL: number;
  closed: boolean;
}

/**
 * Read side used by the validator for duplicate-position and
 * position-count checks. Accepted trades that have not filled yet are
 * held as reservations so they count as exposure too.
 */
export interface ExposureView {
  /** `ignoreFingerprints` excludes reservations made for those signal fingerprints. */
  hasExposure(symbol: string, marketType: MarketType, ignoreFingerprints?: ReadonlySet<string>): boolean;
  exposureCount(marketType: MarketType, ignoreFingerprints?: ReadonlySet<string>): number;
  reserve(tradeId: string, symbol: string, marketType: MarketType, fingerprint?: string): void;
  release(tradeId: string): void;
}

interface Reservation {
  key: string;
  fingerprint: string;
}

export function realizedPnLFor(side: Direction, entryPrice: number, exitPrice: number, quantity: number): number {
  const move = side === 'long' ? exitPrice - entryPrice : entryPrice - exitPrice;
  return move * quantity;
}

/**
 * Owns the map of open positions. Writers for the same (symbol, market)
 * key run one at a time; every change is persisted and the open counts
 * and realized PnL are pushed into RiskState.
 *
 * Events: `opened`, `updated`, `closed`.
 */
export class PositionTracker extends EventEmitter implements ExposureView {
  private positions: Map<string, Position> = new Map();
  private reservations: Map<string, Reservation> = new Map();

  constructor(
    private readonly persistence: PersistenceAdapter,
    private readonly riskState: RiskState,
    private readonly config: ConfigStore,
    private readonly mutex: KeyedMutex = new KeyedMutex()
  ) {
    super();
  }

  /** Reload persisted positions at startup. */
  async restore(): Promise<Position[]> {
    const stored = await this.persistence.loadPositions();
    this.positions.clear();
    for (const position of stored) {
      if (position.status !== 'closed') {
        this.positions.set(position.id, position);
      }
    }
    this.syncCounts();
    logger.info(`Restored ${this.positions.size} tracked positions`);
    return this.snapshot();
  }

  async open(position: Position): Promise<Position> {
    const key = positionKey(position.symbol, position.marketType);

    return this.mutex.runExclusive(key, async () => {
      if (this.positions.has(position.id)) {
        const message = `Position ${position.id} is already tracked`;
        logger.error(message);
        throw new InvariantViolationError(message);
      }
      if (!this.config.get().allowHedging && this.findByKey(key).length > 0) {
        const message = `Duplicate position for ${position.symbol} (${position.marketType})`;
        logger.error(message);
        throw new InvariantViolationError(message);
      }

      const stored: Position = { ...position, takeProfitOrderIds: [...position.takeProfitOrderIds] };
      this.positions.set(stored.id, stored);
      this.reservations.delete(stored.signalId);
      this.syncCounts();
      await this.save(stored);

      logger.info(`Position opened: ${stored.side} ${stored.quantity} ${stored.symbol} @ ${stored.entryPrice}`);
      this.emit('opened', copyOf(stored));
      return copyOf(stored);
    });
  }

  /**
   * Apply a protective-order fill. Quantity is reduced; at zero the
   * position is closed and its PnL realized.
   */
  async mutate(
    symbol: string,
    marketType: MarketType,
    fill: FillEvent,
    positionId?: string
  ): Promise<MutationResult> {
    const key = positionKey(symbol, marketType);

    return this.mutex.runExclusive(key, async () => {
      const position = this.resolve(key, positionId);
      const filled = Math.min(fill.quantity, position.quantity);
      const pnl = realizedPnLFor(position.side, position.entryPrice, fill.price, filled);

      position.quantity -= filled;
      position.realizedPnL += pnl;
      position.lastMarkPrice = fill.price;

      if (position.quantity <= QUANTITY_EPSILON) {
        position.quantity = 0;
        await this.finish(position, pnl);
        return { position: copyOf(position), realizedPnL: pnl, closed: true };
      }

      if (position.status === 'open') {
        position.status = 'partially_closed';
      }
      this.recordPnL(pnl);
      await this.save(position);
      this.emit('updated', copyOf(position));
      return { position: copyOf(position), realizedPnL: pnl, closed: false };
    });
  }

  /**
   * Close whatever quantity remains at the given exit price, or at the
   * last known mark (entry price when no mark is known).
   */
  async close(
    symbol: string,
    marketType: MarketType,
    exitPrice?: number,
    positionId?: string
  ): Promise<ClosedPosition> {
    const key = positionKey(symbol, marketType);

    return this.mutex.runExclusive(key, async () => {
      const position = this.resolve(key, positionId);
      const price = exitPrice ?? position.lastMarkPrice ?? position.entryPrice;
      const pnl = realizedPnLFor(position.side, position.entryPrice, price, position.quantity);

      position.realizedPnL += pnl;
      position.lastMarkPrice = price;
      position.quantity = 0;
      await this.finish(position, pnl);
      return { position: copyOf(position), exitPrice: price, realizedPnL: pnl };
    });
  }

  /** Bookkeeping change that does not realize PnL (order ids, status, quantity correction). */
  async amend(positionId: string, change: (position: Position) => void): Promise<Position> {
    const current = this.positions.get(positionId);
    if (!current) {
      throw new InvariantViolationError(`Position ${positionId} is not tracked`);
    }
    const key = positionKey(current.symbol, current.marketType);

    return this.mutex.runExclusive(key, async () => {
      const position = this.positions.get(positionId);
      if (!position) {
        throw new InvariantViolationError(`Position ${positionId} closed while being amended`);
      }
      change(position);
      await this.save(position);
      this.emit('updated', copyOf(position));
      return copyOf(position);
    });
  }

  snapshot(): Position[] {
    return [...this.positions.values()].map(copyOf);
  }

  get(symbol: string, marketType: MarketType): Position | undefined {
    const [first] = this.findByKey(positionKey(symbol, marketType));
    return first ? copyOf(first) : undefined;
  }

  getById(positionId: string): Position | undefined {
    const position = this.positions.get(positionId);
    return position ? copyOf(position) : undefined;
  }

  hasExposure(symbol: string, marketType: MarketType, ignoreFingerprints?: ReadonlySet<string>): boolean {
    const key = positionKey(symbol, marketType);
    return this.findByKey(key).length > 0 || this.reservedKeys(ignoreFingerprints).includes(key);
  }

  exposureCount(marketType: MarketType, ignoreFingerprints?: ReadonlySet<string>): number {
    const prefix = `${marketType}:`;
    const reserved = this.reservedKeys(ignoreFingerprints).filter(key => key.startsWith(prefix)).length;
    return this.openCount(marketType) + reserved;
  }

  reserve(tradeId: string, symbol: string, marketType: MarketType, fingerprint: string = tradeId): void {
    this.reservations.set(tradeId, { key: positionKey(symbol, marketType), fingerprint });
  }

  release(tradeId: string): void {
    this.reservations.delete(tradeId);
  }

  openCount(marketType: MarketType): number {
    let count = 0;
    for (const position of this.positions.values()) {
      if (position.marketType === marketType) count++;
    }
    return count;
  }

  private reservedKeys(ignoreFingerprints?: ReadonlySet<string>): string[] {
    return [...this.reservations.values()]
      .filter(reservation => !ignoreFingerprints?.has(reservation.fingerprint))
      .map(reservation => reservation.key);
  }

  private resolve(key: string, positionId?: string): Position {
    const position = positionId
      ? this.positions.get(positionId)
      : this.findByKey(key)[0];
    if (!position) {
      const message = `No tracked position for ${key}${positionId ? ` (${positionId})` : ''}`;
      logger.error(message);
      throw new InvariantViolationError(message);
    }
    return position;
  }

  private findByKey(key: string): Position[] {
    return [...this.positions.values()].filter(
      position => positionKey(position.symbol, position.marketType) === key
    );
  }

  private async finish(position: Position, pnl: number): Promise<void> {
    position.status = 'closed';
    this.positions.delete(position.id);
    this.syncCounts();
    this.recordPnL(pnl);

    try {
      await this.persistence.removePosition(position.id);
    } catch (error) {
      logger.error(`Failed to remove persisted position ${position.id}: ${errorMessage(error)}`);
    }

    logger.info(`Position closed: ${position.symbol} realized PnL ${position.realizedPnL.toFixed(2)}`);
    this.emit('closed', copyOf(position));
  }

  private recordPnL(pnl: number): void {
    if (pnl !== 0) {
      this.riskState.recordRealizedPnL(pnl, this.config.get().maxDailyLoss);
    }
  }

  private syncCounts(): void {
    const counts: Record<MarketType, number> = { futures: 0, spot: 0 };
    for (const marketType of MARKET_TYPES) {
      counts[marketType] = this.openCount(marketType);
    }
    this.riskState.setOpenCounts(counts);
  }

  private async save(position: Position): Promise<void> {
    try {
      await this.persistence.savePosition(position);
    } catch (error) {
      logger.error(`Failed to persist position ${position.id}: ${errorMessage(error)}`);
    }
  }
}

function copyOf(position: Position): Position {
  return { ...position, takeProfitOrderIds: [...position.takeProfitOrderIds] };
}

export default PositionTracker;

import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import { MarketType, RiskSnapshot } from '../../types/trading';
import { PersistenceAdapter } from '../persistence/PersistenceAdapter';
import { Clock, systemClock, tradingDayOf } from '../../utils/time';

/**
 * Process-wide risk ledger: realized PnL for the current UTC trading day,
 * open-position counts per market type and the trading-enabled breaker.
 *
 * The breaker trips when the day's realized PnL reaches -maxDailyLoss and
 * stays tripped until the day rolls over or `resume()` is called.
 *
 * Events: `halted` (reason, snapshot), `dailyLossHalt` (reason, snapshot),
 * `resumed` (snapshot), `dayRolled` (snapshot).
 */
export class RiskState extends EventEmitter {
  private state: RiskSnapshot;
  private pendingSave: Promise<void> = Promise.resolve();

  constructor(
    private readonly persistence: PersistenceAdapter,
    private readonly clock: Clock = systemClock
  ) {
    super();
    this.state = RiskState.freshState(tradingDayOf(clock()));
  }

  private static freshState(tradingDay: string): RiskSnapshot {
    return {
      tradingDay,
      dailyRealizedPnL: 0,
      openPositions: { futures: 0, spot: 0 },
      tradingEnabled: true,
    };
  }

  async initialize(): Promise<void> {
    const stored = await this.persistence.loadRiskState();
    if (stored) {
      this.state = stored;
      logger.info(
        `Risk state restored: day ${stored.tradingDay}, PnL ${stored.dailyRealizedPnL.toFixed(2)}, ` +
        `trading ${stored.tradingEnabled ? 'enabled' : 'halted'}`
      );
    }
    this.rollDayIfNeeded();
  }

  snapshot(): RiskSnapshot {
    this.rollDayIfNeeded();
    return {
      ...this.state,
      openPositions: { ...this.state.openPositions },
    };
  }

  isTradingEnabled(): boolean {
    this.rollDayIfNeeded();
    return this.state.tradingEnabled;
  }

  dailyPnL(): number {
    this.rollDayIfNeeded();
    return this.state.dailyRealizedPnL;
  }

  /**
   * Add realized PnL for a closed position and trip the breaker if the
   * day's loss reaches the limit. Returns true when this call tripped it.
   */
  recordRealizedPnL(pnl: number, maxDailyLoss: number): boolean {
    this.rollDayIfNeeded();
    this.state.dailyRealizedPnL += pnl;

    let tripped = false;
    if (this.state.tradingEnabled && this.state.dailyRealizedPnL <= -maxDailyLoss) {
      this.state.tradingEnabled = false;
      this.state.haltReason =
        `Daily loss limit reached: ${this.state.dailyRealizedPnL.toFixed(2)} (max ${maxDailyLoss.toFixed(2)})`;
      tripped = true;
      logger.error(this.state.haltReason);
    }

    this.persist();
    if (tripped) {
      const snapshot = this.snapshot();
      this.emit('halted', snapshot.haltReason, snapshot);
      this.emit('dailyLossHalt', snapshot.haltReason, snapshot);
    }
    return tripped;
  }

  setOpenCounts(counts: Record<MarketType, number>): void {
    this.state.openPositions = { ...counts };
    this.persist();
  }

  /** Manual halt from the control surface. */
  halt(reason: string): void {
    this.rollDayIfNeeded();
    if (!this.state.tradingEnabled) return;

    this.state.tradingEnabled = false;
    this.state.haltReason = reason;
    logger.warn(`Trading halted: ${reason}`);
    this.persist();
    this.emit('halted', reason, this.snapshot());
  }

  /** Manual re-enable. The day's PnL is kept. */
  resume(): void {
    this.rollDayIfNeeded();
    if (this.state.tradingEnabled) return;

    this.state.tradingEnabled = true;
    this.state.haltReason = undefined;
    logger.info('Trading re-enabled manually');
    this.persist();
    this.emit('resumed', this.snapshot());
  }

  /** Resolves once every state change so far has been written. */
  flush(): Promise<void> {
    return this.pendingSave;
  }

  private rollDayIfNeeded(): void {
    const today = tradingDayOf(this.clock());
    if (today === this.state.tradingDay) return;

    logger.info(
      `Trading day rolled from ${this.state.tradingDay} to ${today}, ` +
      `closing PnL ${this.state.dailyRealizedPnL.toFixed(2)}`
    );
    const openPositions = { ...this.state.openPositions };
    this.state = { ...RiskState.freshState(today), openPositions };
    this.persist();
    this.emit('dayRolled', { ...this.state, openPositions: { ...openPositions } });
  }

  private persist(): void {
    const copy: RiskSnapshot = { ...this.state, openPositions: { ...this.state.openPositions } };
    this.pendingSave = this.pendingSave
      .then(() => this.persistence.saveRiskState(copy))
      .catch(error => {
        logger.error('Failed to persist risk state:', error);
      });
  }
}

export default RiskState;

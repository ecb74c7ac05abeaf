import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import { Clock, systemClock } from '../../utils/time';
import { Position, positionKey } from '../../types/trading';
import { ConfigStore } from '../../config/ConfigStore';
import { ExchangeCapability, ExchangePosition } from '../brokers/ExchangeCapability';
import { NotificationService } from '../notifications/NotificationService';
import { PositionTracker } from './PositionTracker';
import { ReconciliationDiscrepancy, errorMessage } from './errors';

const QUANTITY_EPSILON = 1e-12;

export interface ReconciliationReport {
  untracked: string[];
  adopted: string[];
  closed: string[];
  corrected: string[];
  protectiveFills: number;
}

/** Anything that can turn resting protective orders into fills. */
export interface ProtectiveOrderPoller {
  pollProtectiveOrders(): Promise<number>;
}

/**
 * Compares tracked positions with the exchange's list and corrects the
 * bookkeeping. Never places orders.
 *
 * Events: `discrepancy` (ReconciliationDiscrepancy), `completed` (report).
 */
export class ReconciliationLoop extends EventEmitter {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<ReconciliationReport> | null = null;
  private warned: Set<string> = new Set();
  private lastMarks: Map<string, number> = new Map();

  constructor(
    private readonly exchange: ExchangeCapability,
    private readonly tracker: PositionTracker,
    private readonly notifications: NotificationService,
    private readonly config: ConfigStore,
    private readonly poller?: ProtectiveOrderPoller,
    private readonly clock: Clock = systemClock
  ) {
    super();
  }

  /** Reconcile once now, then on every interval tick. */
  async start(): Promise<ReconciliationReport> {
    const first = await this.runOnce();
    this.schedule();
    return first;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Reconciliation loop stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Overlapping calls share the run already in progress. */
  runOnce(): Promise<ReconciliationReport> {
    if (!this.running) {
      this.running = this.reconcile().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private schedule(): void {
    this.stop();
    const interval = this.config.get().reconcileIntervalMs;
    this.timer = setInterval(() => {
      this.runOnce().catch(error => {
        logger.error(`Reconciliation run failed: ${errorMessage(error)}`);
      });
    }, interval);
    logger.info(`Reconciliation loop started (every ${interval}ms)`);
  }

  private async reconcile(): Promise<ReconciliationReport> {
    const config = this.config.get();
    const report: ReconciliationReport = { untracked: [], adopted: [], closed: [], corrected: [], protectiveFills: 0 };

    if (this.poller) {
      try {
        report.protectiveFills = await this.poller.pollProtectiveOrders();
      } catch (error) {
        logger.warn(`Protective order poll failed: ${errorMessage(error)}`);
      }
    }

    const markets = this.exchange.reportedMarkets;
    const remote = (await this.exchange.fetchOpenPositions())
      .filter(position => position.quantity > QUANTITY_EPSILON && markets.includes(position.marketType));
    const remoteIds = new Set(remote.map(position => position.id));
    const remoteKeys = new Set(remote.map(position => positionKey(position.symbol, position.marketType)));

    for (const position of remote) {
      const tracked = this.tracker.get(position.symbol, position.marketType);
      if (!tracked) {
        await this.handleUntracked(position, config.adoptUntrackedPositions, report);
        continue;
      }
      this.lastMarks.set(tracked.id, position.markPrice);
      await this.correctQuantity(tracked, position, config.quantityTolerance, report);
    }

    const graceCutoff = this.clock() - config.reconcileIntervalMs;
    for (const tracked of this.tracker.snapshot()) {
      if (!markets.includes(tracked.marketType)) continue;
      if (remoteKeys.has(positionKey(tracked.symbol, tracked.marketType))) continue;
      if (tracked.openedAt > graceCutoff) continue;
      await this.closeMissing(tracked, report);
    }

    for (const id of this.warned) {
      if (!remoteIds.has(id)) this.warned.delete(id);
    }

    const changes = report.untracked.length + report.adopted.length + report.closed.length + report.corrected.length;
    if (changes > 0) {
      logger.info('Reconciliation applied corrections', report);
    } else {
      logger.debug('Reconciliation found no discrepancies');
    }
    this.emit('completed', report);
    return report;
  }

  private async handleUntracked(position: ExchangePosition, adopt: boolean, report: ReconciliationReport): Promise<void> {
    if (adopt) {
      const adopted = await this.tracker.open({
        id: `adopted:${position.id}`,
        symbol: position.symbol,
        marketType: position.marketType,
        side: position.side,
        entryPrice: position.entryPrice,
        quantity: position.quantity,
        initialQuantity: position.quantity,
        leverage: position.leverage ?? 1,
        takeProfitOrderIds: [],
        openedAt: this.clock(),
        signalId: `adopted:${position.id}`,
        status: 'unprotected',
        realizedPnL: 0,
        lastMarkPrice: position.markPrice,
        adopted: true,
      });
      report.adopted.push(adopted.id);
      this.surface(new ReconciliationDiscrepancy(
        'untracked_position',
        position.symbol,
        `Adopted untracked ${position.side} ${position.quantity} ${position.symbol} (no protective orders)`
      ));
      return;
    }

    if (this.warned.has(position.id)) return;
    this.warned.add(position.id);
    report.untracked.push(position.id);
    this.surface(new ReconciliationDiscrepancy(
      'untracked_position',
      position.symbol,
      `Untracked ${position.side} position ${position.quantity} ${position.symbol} on ${this.exchange.name}`
    ));
  }

  private async correctQuantity(
    tracked: Position,
    position: ExchangePosition,
    tolerance: number,
    report: ReconciliationReport
  ): Promise<void> {
    const difference = Math.abs(tracked.quantity - position.quantity);
    if (difference <= QUANTITY_EPSILON) return;

    await this.tracker.amend(tracked.id, current => {
      current.quantity = position.quantity;
      current.lastMarkPrice = position.markPrice;
    });
    report.corrected.push(tracked.id);

    const relative = tracked.quantity > 0 ? difference / tracked.quantity : 1;
    const message = `Quantity for ${tracked.symbol} corrected from ${tracked.quantity} to ${position.quantity}`;
    if (relative > tolerance) {
      this.surface(new ReconciliationDiscrepancy('quantity_mismatch', tracked.symbol, message));
    } else {
      logger.info(message);
    }
  }

  private async closeMissing(tracked: Position, report: ReconciliationReport): Promise<void> {
    const exitPrice = this.lastMarks.get(tracked.id);
    const closed = await this.tracker.close(tracked.symbol, tracked.marketType, exitPrice, tracked.id);
    this.lastMarks.delete(tracked.id);
    report.closed.push(tracked.id);

    this.surface(new ReconciliationDiscrepancy(
      'missing_on_exchange',
      tracked.symbol,
      `${tracked.symbol} closed outside the bot; realized PnL inferred at ${closed.exitPrice}: ${closed.realizedPnL.toFixed(2)}`
    ));
    this.notifications.notify({
      type: 'position_closed',
      positionId: tracked.id,
      symbol: tracked.symbol,
      marketType: tracked.marketType,
      realizedPnL: closed.position.realizedPnL,
    });
  }

  private surface(discrepancy: ReconciliationDiscrepancy): void {
    logger.warn(`Reconciliation discrepancy (${discrepancy.kind}): ${discrepancy.message}`);
    this.emit('discrepancy', discrepancy);
    this.notifications.notify({
      type: 'reconciliation_discrepancy',
      kind: discrepancy.kind,
      symbol: discrepancy.symbol,
      message: discrepancy.message,
    });
  }
}

export default ReconciliationLoop;

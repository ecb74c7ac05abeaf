import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import KeyedMutex from '../../utils/KeyedMutex';
import { Clock, Sleeper, delay, systemClock } from '../../utils/time';
import {
  FillEvent,
  FillKind,
  OrderPlan,
  PlannedOrder,
  Position,
  leverageOf,
} from '../../types/trading';
import { ConfigSnapshot } from '../../config/TradingConfig';
import {
  DEFAULT_CONSTRAINTS,
  ExchangeCapability,
  ExchangeOrder,
  MarketConstraints,
  OrderRef,
} from '../brokers/ExchangeCapability';
import { ExchangeError, ExchangeErrorCode, isAmbiguousCode, toExchangeError } from '../brokers/ExchangeError';
import { RetryPolicy } from '../resilience/RetryPolicy';
import { NotificationService } from '../notifications/NotificationService';
import { PositionTracker } from './PositionTracker';
import { resizePlan } from './OrderPlanner';
import { CANCELLABLE_STATES, TradeState, assertTransition, isTerminalState } from './tradeStates';
import { InvariantViolationError, errorMessage } from './errors';

export type AbortReason =
  | 'EXCHANGE_REJECTED'
  | 'ENTRY_TIMEOUT'
  | 'ENTRY_CANCELED'
  | 'CANCELLED';

interface ProtectiveOrder {
  kind: Exclude<FillKind, 'manual'>;
  quantity: number;
  filled: number;
}

interface TradeRecord {
  tradeId: string;
  plan: OrderPlan;
  state: TradeState;
  history: Array<{ from: TradeState; to: TradeState; at: number }>;
  entryOrderId?: string;
  positionId?: string;
  stopLossOrderId?: string;
  takeProfitOrderIds: string[];
  protectiveOrders: Map<string, ProtectiveOrder>;
  cancelRequested: boolean;
  abortReason?: AbortReason;
  message?: string;
}

export interface TradeSnapshot {
  tradeId: string;
  symbol: string;
  marketType: OrderPlan['marketType'];
  state: TradeState;
  entryOrderId?: string;
  positionId?: string;
  stopLossOrderId?: string;
  takeProfitOrderIds: string[];
  abortReason?: AbortReason;
  message?: string;
  history: Array<{ from: TradeState; to: TradeState; at: number }>;
}

export type ExecutionResult =
  | {
      status: 'aborted';
      trade: TradeSnapshot;
      reason: AbortReason;
      message: string;
      exchangeCode?: ExchangeErrorCode;
    }
  | { status: 'protected'; trade: TradeSnapshot; position: Position }
  | { status: 'unprotected'; trade: TradeSnapshot; position?: Position; failures: string[] };

export interface ExecutionEngineOptions {
  clock?: Clock;
  sleep?: Sleeper;
  /** Supplies the backoff schedule for protective-order retries. */
  retryPolicy?: RetryPolicy;
}

type EntryOutcome =
  | { filled: true; order: ExchangeOrder; quantity: number }
  | { filled: false; reason: AbortReason; message: string };

type Placement =
  | { placed: true; order: ExchangeOrder }
  | { placed: false; error: string };

/** Closed and aborted trades kept for lookup after they leave the live set. */
const FINISHED_TRADES_KEPT = 100;

/** Exchange client order ids are limited to 36 characters. */
export function clientOrderIdFor(tradeId: string, suffix: string): string {
  return `sx-${tradeId.slice(0, 24)}-${suffix}`;
}

/**
 * Drives one trade from plan to close:
 *
 *   PLANNED -> ENTRY_SUBMITTED -> ENTRY_FILLED -> PROTECTED -> (PARTIALLY_CLOSED)* -> CLOSED
 *
 * with ABORTED reachable before the fill and UNPROTECTED when protection
 * could not be placed. Transitions for one trade are serialized; a trade id
 * is accepted at most once per process. Trades leave the live set when
 * they reach CLOSED or ABORTED.
 *
 * Events: `stateChanged` (snapshot, from, to).
 */
export class ExecutionEngine extends EventEmitter {
  private trades: Map<string, TradeRecord> = new Map();
  private finished: Map<string, TradeRecord> = new Map();
  private orderIndex: Map<string, string> = new Map();
  private readonly mutex = new KeyedMutex();
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly exchange: ExchangeCapability,
    private readonly tracker: PositionTracker,
    private readonly notifications: NotificationService,
    options: ExecutionEngineOptions = {}
  ) {
    super();
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? delay;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy({ sleep: this.sleep, clock: this.clock });

    this.tracker.on('closed', (position: Position) => {
      this.onPositionClosed(position).catch(error => {
        logger.error(`Failed to settle trade for closed position ${position.id}: ${errorMessage(error)}`);
      });
    });
  }

  /**
   * Run a planned trade through entry and protection. Resolves once the
   * trade is protected, unprotected or aborted; closing happens later
   * through protective fills.
   */
  async execute(
    plan: OrderPlan,
    config: ConfigSnapshot,
    constraints: MarketConstraints = DEFAULT_CONSTRAINTS[plan.marketType]
  ): Promise<ExecutionResult> {
    if (this.trades.has(plan.tradeId) || this.finished.has(plan.tradeId)) {
      const message = `Trade ${plan.tradeId} already entered execution`;
      logger.error(message);
      throw new InvariantViolationError(message);
    }

    const record: TradeRecord = {
      tradeId: plan.tradeId,
      plan,
      state: 'PLANNED',
      history: [],
      takeProfitOrderIds: [],
      protectiveOrders: new Map(),
      cancelRequested: false,
    };
    this.trades.set(plan.tradeId, record);

    return this.mutex.runExclusive(plan.tradeId, () => this.run(record, config, constraints));
  }

  /** External cancel; only honoured before the entry has filled. */
  async cancel(tradeId: string): Promise<boolean> {
    const record = this.trades.get(tradeId);
    if (!record || !CANCELLABLE_STATES.includes(record.state)) {
      logger.warn(`Cancel refused for trade ${tradeId} in state ${record?.state ?? 'unknown'}`);
      return false;
    }

    record.cancelRequested = true;
    if (record.state === 'ENTRY_SUBMITTED' && record.entryOrderId) {
      await this.cancelQuietly(this.refFor(record, record.entryOrderId));
    }
    logger.info(`Cancel requested for trade ${tradeId}`);
    return true;
  }

  /**
   * Cancel every entry that has not filled yet. Open positions keep their
   * protective orders. Returns the number of trades cancelled.
   */
  async cancelAll(): Promise<number> {
    let cancelled = 0;
    const pending = [...this.trades.values()].filter(record => CANCELLABLE_STATES.includes(record.state));
    for (const record of pending) {
      if (await this.cancel(record.tradeId)) cancelled++;
    }
    return cancelled;
  }

  /**
   * Apply a fill of a stop-loss or take-profit order. At zero quantity the
   * remaining sibling orders are cancelled and the trade is CLOSED.
   */
  async onProtectiveFill(fill: FillEvent): Promise<void> {
    const tradeId = this.orderIndex.get(fill.orderId);
    const known = tradeId ? this.trades.get(tradeId) : undefined;
    if (!tradeId || !known) {
      logger.warn(`Fill for unknown protective order ${fill.orderId} ignored`);
      return;
    }

    await this.mutex.runExclusive(tradeId, async () => {
      const record = known;
      if (record.state === 'CLOSED') return;
      if (!record.positionId) {
        throw new InvariantViolationError(`Protective fill for trade ${tradeId} without a position`);
      }

      const order = record.protectiveOrders.get(fill.orderId);
      if (order) {
        order.filled += fill.quantity;
      }

      const { plan } = record;
      const result = await this.tracker.mutate(plan.symbol, plan.marketType, fill, record.positionId);

      if (order && order.filled >= order.quantity) {
        record.protectiveOrders.delete(fill.orderId);
      }

      if (result.closed) {
        await this.cancelSiblings(record);
        this.transition(record, 'CLOSED');
        this.notifications.notify({
          type: 'position_closed',
          positionId: result.position.id,
          symbol: plan.symbol,
          marketType: plan.marketType,
          realizedPnL: result.position.realizedPnL,
        });
      } else if (record.state !== 'UNPROTECTED') {
        this.transition(record, 'PARTIALLY_CLOSED');
      }
    });
  }

  /**
   * Poll every resting protective order once and turn newly filled
   * quantity into fills. Used where no fill stream is available.
   */
  async pollProtectiveOrders(): Promise<number> {
    let fills = 0;
    for (const record of this.trades.values()) {
      if (isTerminalState(record.state)) continue;

      for (const [orderId, order] of [...record.protectiveOrders]) {
        let status: ExchangeOrder;
        try {
          status = await this.exchange.fetchOrderStatus(this.refFor(record, orderId));
        } catch (error) {
          logger.warn(`Could not poll protective order ${orderId}: ${errorMessage(error)}`);
          continue;
        }

        const newlyFilled = status.filledQuantity - order.filled;
        if (newlyFilled > 0) {
          fills++;
          await this.onProtectiveFill({
            orderId,
            kind: order.kind,
            price: status.averagePrice ?? status.price,
            quantity: newlyFilled,
            timestamp: status.updatedAt ?? this.clock(),
          });
        } else if (status.status === 'canceled' || status.status === 'expired' || status.status === 'rejected') {
          logger.warn(`Protective order ${orderId} for ${record.plan.symbol} is ${status.status}`);
          record.protectiveOrders.delete(orderId);
        }
      }
    }
    return fills;
  }

  getTrade(tradeId: string): TradeSnapshot | undefined {
    const record = this.trades.get(tradeId) ?? this.finished.get(tradeId);
    return record ? this.snapshotOf(record) : undefined;
  }

  activeTrades(): TradeSnapshot[] {
    return [...this.trades.values()]
      .filter(record => !isTerminalState(record.state))
      .map(record => this.snapshotOf(record));
  }

  private async run(record: TradeRecord, config: ConfigSnapshot, constraints: MarketConstraints): Promise<ExecutionResult> {
    const { plan } = record;

    if (plan.marketType === 'futures') {
      try {
        await this.exchange.setLeverage(plan.symbol, plan.leverage);
      } catch (error) {
        return this.abort(record, 'EXCHANGE_REJECTED', `Setting leverage failed: ${errorMessage(error)}`, error);
      }
    }

    if (record.cancelRequested) {
      return this.abort(record, 'CANCELLED', 'Cancelled before submission');
    }

    const entryClientId = clientOrderIdFor(plan.tradeId, 'e');
    let entryOrder: ExchangeOrder;
    try {
      entryOrder = await this.exchange.placeLimitOrder({
        symbol: plan.symbol,
        marketType: plan.marketType,
        side: plan.side,
        quantity: plan.entry.quantity,
        price: plan.entry.price,
        clientOrderId: entryClientId,
      });
    } catch (error) {
      const recovered = await this.recoverPlacement(plan, entryClientId, 'entry', error);
      if (!recovered.placed) {
        return this.abort(record, 'EXCHANGE_REJECTED', `Entry order rejected: ${recovered.error}`, error);
      }
      entryOrder = recovered.order;
    }

    record.entryOrderId = entryOrder.id;
    this.transition(record, 'ENTRY_SUBMITTED');
    logger.info(`Entry submitted for ${plan.symbol}: ${plan.side} ${plan.entry.quantity} @ ${plan.entry.price}`);

    const entry = await this.awaitEntryFill(record, entryOrder, config);
    if (!entry.filled) {
      return this.abort(record, entry.reason, entry.message);
    }

    this.transition(record, 'ENTRY_FILLED');
    const protectedPlan = entry.quantity < plan.entry.quantity
      ? resizePlan(plan, entry.quantity, constraints)
      : plan;
    const fillPrice = entry.order.averagePrice ?? plan.entry.price;

    let position: Position;
    try {
      position = await this.tracker.open({
        id: plan.tradeId,
        symbol: plan.symbol,
        marketType: plan.marketType,
        side: plan.direction,
        entryPrice: fillPrice,
        quantity: protectedPlan.entry.quantity,
        initialQuantity: protectedPlan.entry.quantity,
        leverage: leverageOf(plan),
        takeProfitOrderIds: [],
        openedAt: this.clock(),
        signalId: plan.tradeId,
        status: 'open',
        realizedPnL: 0,
      });
    } catch (error) {
      return this.escalate(record, undefined, [`position could not be tracked: ${errorMessage(error)}`]);
    }
    record.positionId = position.id;

    this.notifications.notify({
      type: 'trade_entered',
      tradeId: plan.tradeId,
      symbol: plan.symbol,
      marketType: plan.marketType,
      direction: plan.direction,
      price: fillPrice,
      quantity: position.quantity,
      leverage: position.leverage,
    });

    return this.protect(record, protectedPlan, config);
  }

  private async awaitEntryFill(record: TradeRecord, order: ExchangeOrder, config: ConfigSnapshot): Promise<EntryOutcome> {
    const deadline = this.clock() + config.entryFillTimeoutMs;
    let latest = order;

    while (latest.status !== 'filled') {
      if (latest.status === 'canceled' || latest.status === 'expired' || latest.status === 'rejected') {
        return this.settleUnfilled(latest, record.cancelRequested ? 'CANCELLED' : 'ENTRY_CANCELED',
          `Entry order ${latest.status} before filling`);
      }

      if (record.cancelRequested || this.clock() >= deadline) {
        const reason: AbortReason = record.cancelRequested ? 'CANCELLED' : 'ENTRY_TIMEOUT';
        await this.cancelQuietly(this.refFor(record, order.id));
        const final = await this.fetchQuietly(this.refFor(record, order.id));
        if (final?.status === 'filled') {
          latest = final;
          break;
        }
        return this.settleUnfilled(final ?? latest, reason,
          reason === 'CANCELLED' ? 'Entry cancelled on request' : `Entry not filled within ${config.entryFillTimeoutMs}ms`);
      }

      await this.sleep(config.entryPollIntervalMs);
      latest = (await this.fetchQuietly(this.refFor(record, order.id))) ?? latest;
    }

    return { filled: true, order: latest, quantity: latest.filledQuantity || record.plan.entry.quantity };
  }

  /** An entry that stopped resting with some quantity filled still opened a position. */
  private settleUnfilled(order: ExchangeOrder, reason: AbortReason, message: string): EntryOutcome {
    if (order.filledQuantity > 0) {
      logger.warn(`Entry ${order.id} ended ${order.status} with ${order.filledQuantity} filled; protecting the filled part`);
      return { filled: true, order, quantity: order.filledQuantity };
    }
    return { filled: false, reason, message };
  }

  private async protect(record: TradeRecord, plan: OrderPlan, config: ConfigSnapshot): Promise<ExecutionResult> {
    const failures: string[] = [];
    const attempts = config.protectiveOrderRetries;

    const stop = await this.placeWithRetry(plan, 'stop_loss', plan.stopLoss, attempts, clientOrderIdFor(plan.tradeId, 'sl'));
    if (typeof stop === 'string') {
      record.stopLossOrderId = stop;
      this.registerProtective(record, stop, { kind: 'stop_loss', quantity: plan.stopLoss.quantity, filled: 0 });
    } else {
      failures.push(`stop loss: ${stop.error}`);
    }

    for (const level of plan.takeProfits) {
      const placed = await this.placeWithRetry(
        plan, 'take_profit', level, attempts, clientOrderIdFor(plan.tradeId, `tp${level.level}`)
      );
      if (typeof placed === 'string') {
        record.takeProfitOrderIds.push(placed);
        this.registerProtective(record, placed, { kind: 'take_profit', quantity: level.quantity, filled: 0 });
      } else {
        failures.push(`take profit ${level.level}: ${placed.error}`);
      }
    }

    const positionId = record.positionId;
    if (!positionId) {
      throw new InvariantViolationError(`Trade ${record.tradeId} reached protection without a position`);
    }

    const position = await this.tracker.amend(positionId, tracked => {
      tracked.stopLossOrderId = record.stopLossOrderId;
      tracked.takeProfitOrderIds = [...record.takeProfitOrderIds];
      if (failures.length > 0) tracked.status = 'unprotected';
    });

    if (failures.length > 0) {
      return this.escalate(record, position, failures);
    }

    this.transition(record, 'PROTECTED');
    this.notifications.notify({
      type: 'position_protected',
      tradeId: record.tradeId,
      symbol: plan.symbol,
      stopLossOrderId: position.stopLossOrderId ?? '',
      takeProfitOrderIds: position.takeProfitOrderIds,
    });
    return { status: 'protected', trade: this.snapshotOf(record), position };
  }

  private registerProtective(record: TradeRecord, orderId: string, order: ProtectiveOrder): void {
    record.protectiveOrders.set(orderId, order);
    this.orderIndex.set(orderId, record.tradeId);
  }

  private async placeWithRetry(
    plan: OrderPlan,
    kind: ProtectiveOrder['kind'],
    order: PlannedOrder,
    attempts: number,
    clientOrderId: string
  ): Promise<string | { error: string }> {
    const request = {
      symbol: plan.symbol,
      marketType: plan.marketType,
      side: plan.closeSide,
      quantity: order.quantity,
      triggerPrice: order.price,
      clientOrderId,
    };
    let lastError = '';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const placed = kind === 'stop_loss'
          ? await this.exchange.placeStopOrder(request)
          : await this.exchange.placeTakeProfitOrder(request);
        return placed.id;
      } catch (error) {
        const recovered = await this.recoverPlacement(plan, clientOrderId, kind, error);
        if (recovered.placed) return recovered.order.id;
        lastError = recovered.error;
        logger.warn(`Placing ${kind} for ${plan.symbol} failed (attempt ${attempt}/${attempts}): ${lastError}`);
        if (attempt < attempts) {
          await this.sleep(this.retryPolicy.calculateRetryDelay(attempt));
        }
      }
    }

    return { error: lastError };
  }

  /**
   * After a failure that leaves it unknown whether the venue took the order,
   * look it up by client order id and adopt it if it exists.
   */
  private async recoverPlacement(
    plan: OrderPlan,
    clientOrderId: string,
    label: string,
    error: unknown
  ): Promise<Placement> {
    const failure = toExchangeError(this.exchange.name, error);
    if (!isAmbiguousCode(failure.exchangeCode)) {
      return { placed: false, error: failure.message };
    }

    try {
      const found = await this.exchange.fetchOrderByClientId({
        symbol: plan.symbol,
        marketType: plan.marketType,
        clientOrderId,
      });
      if (!found) {
        return { placed: false, error: failure.message };
      }
      logger.warn(`${label} order ${clientOrderId} for ${plan.symbol} was accepted despite "${failure.message}"; adopting ${found.id}`);
      return { placed: true, order: found };
    } catch (lookupError) {
      const message = `${failure.message}; looking up ${clientOrderId} failed: ${errorMessage(lookupError)}`;
      logger.error(`${label} order for ${plan.symbol} may be resting unseen: ${message}`);
      return { placed: false, error: message };
    }
  }

  /** The position stays open without full protection: stop automation and raise the alarm. */
  private escalate(record: TradeRecord, position: Position | undefined, failures: string[]): ExecutionResult {
    this.transition(record, 'UNPROTECTED');
    record.message = failures.join('; ');
    logger.error(`Position ${record.plan.symbol} left UNPROTECTED: ${record.message}`);
    this.notifications.notify({
      type: 'position_unprotected',
      tradeId: record.tradeId,
      symbol: record.plan.symbol,
      reason: record.message,
    });
    return { status: 'unprotected', trade: this.snapshotOf(record), position, failures };
  }

  private abort(record: TradeRecord, reason: AbortReason, message: string, cause?: unknown): ExecutionResult {
    record.abortReason = reason;
    record.message = message;
    this.transition(record, 'ABORTED');
    this.tracker.release(record.tradeId);
    logger.warn(`Trade ${record.plan.symbol} aborted (${reason}): ${message}`);

    return {
      status: 'aborted',
      trade: this.snapshotOf(record),
      reason,
      message,
      exchangeCode: cause instanceof ExchangeError ? cause.exchangeCode : undefined,
    };
  }

  private async onPositionClosed(position: Position): Promise<void> {
    const record = this.trades.get(position.signalId);
    if (!record) return;

    await this.mutex.runExclusive(record.tradeId, async () => {
      if (isTerminalState(record.state)) return;
      logger.info(`Position for trade ${record.tradeId} closed outside the fill flow`);
      await this.cancelSiblings(record);
      this.transition(record, 'CLOSED');
    });
  }

  private async cancelSiblings(record: TradeRecord): Promise<void> {
    for (const orderId of record.protectiveOrders.keys()) {
      await this.cancelQuietly(this.refFor(record, orderId));
    }
    record.protectiveOrders.clear();
  }

  /** Cancellation of an order that may already be gone; failures are logged only. */
  private async cancelQuietly(ref: OrderRef): Promise<void> {
    try {
      await this.exchange.cancelOrder(ref);
    } catch (error) {
      const gone = error instanceof ExchangeError && error.exchangeCode === ExchangeErrorCode.ORDER_NOT_FOUND;
      if (gone) {
        logger.debug(`Order ${ref.orderId} already gone`);
      } else {
        logger.warn(`Cancelling order ${ref.orderId} on ${ref.symbol} failed: ${errorMessage(error)}`);
      }
    }
  }

  private async fetchQuietly(ref: OrderRef): Promise<ExchangeOrder | undefined> {
    try {
      return await this.exchange.fetchOrderStatus(ref);
    } catch (error) {
      logger.warn(`Fetching order ${ref.orderId} failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private refFor(record: TradeRecord, orderId: string): OrderRef {
    return { symbol: record.plan.symbol, marketType: record.plan.marketType, orderId };
  }

  private transition(record: TradeRecord, to: TradeState): void {
    const from = record.state;
    assertTransition(record.tradeId, from, to);
    record.state = to;
    record.history.push({ from, to, at: this.clock() });
    if (isTerminalState(to)) {
      this.retire(record);
    }
    this.emit('stateChanged', this.snapshotOf(record), from, to);
  }

  private retire(record: TradeRecord): void {
    this.trades.delete(record.tradeId);
    for (const [orderId, tradeId] of this.orderIndex) {
      if (tradeId === record.tradeId) this.orderIndex.delete(orderId);
    }
    this.finished.set(record.tradeId, record);
    if (this.finished.size > FINISHED_TRADES_KEPT) {
      const oldest = this.finished.keys().next();
      if (!oldest.done) this.finished.delete(oldest.value);
    }
  }

  /** Live trades and protective-order index entries held in memory. */
  get trackedCounts(): { trades: number; protectiveOrders: number } {
    return { trades: this.trades.size, protectiveOrders: this.orderIndex.size };
  }

  private snapshotOf(record: TradeRecord): TradeSnapshot {
    return {
      tradeId: record.tradeId,
      symbol: record.plan.symbol,
      marketType: record.plan.marketType,
      state: record.state,
      entryOrderId: record.entryOrderId,
      positionId: record.positionId,
      stopLossOrderId: record.stopLossOrderId,
      takeProfitOrderIds: [...record.takeProfitOrderIds],
      abortReason: record.abortReason,
      message: record.message,
      history: record.history.map(entry => ({ ...entry })),
    };
  }
}

export default ExecutionEngine;

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { ExecutionEngine, clientOrderIdFor } from '../../services/trading/ExecutionEngine';
import { PositionTracker } from '../../services/trading/PositionTracker';
import { RiskState } from '../../services/trading/RiskState';
import { plan } from '../../services/trading/OrderPlanner';
import { InvariantViolationError } from '../../services/trading/errors';
import { MemoryPersistenceAdapter } from '../../services/persistence/PersistenceAdapter';
import { DeliveredNotification, NotificationService } from '../../services/notifications/NotificationService';
import { DEFAULT_CONSTRAINTS } from '../../services/brokers/ExchangeCapability';
import { ExchangeErrorCode, ExchangeRejection } from '../../services/brokers/ExchangeError';
import { ConfigStore } from '../../config/ConfigStore';
import { ConfigSnapshot, buildConfigSnapshot } from '../../config/TradingConfig';
import { OrderPlan, ValidatedTrade } from '../../types/trading';
import { FakeExchange, ManualClock, candidate } from '../utils/fakes';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn()
  }
}));

const TRADE_ID = 'a1b2c3d4e5f60718293a4b5c6d7e8f90';

const trade: ValidatedTrade = {
  verdict: 'accepted',
  tradeId: TRADE_ID,
  fingerprint: 'fingerprint-1',
  signal: candidate(),
  symbol: 'BTCUSDT',
  direction: 'long',
  entryPrice: 50000,
  stopLoss: 49000,
  takeProfits: [50500, 51000, 51500, 52000, 52500],
  riskReward: 0.5,
  positionSize: 150,
  marketType: 'futures',
  leverage: 10,
};

describe('ExecutionEngine', () => {
  let clock: ManualClock;
  let exchange: FakeExchange;
  let riskState: RiskState;
  let tracker: PositionTracker;
  let notifications: DeliveredNotification[];
  let engine: ExecutionEngine;
  let config: ConfigSnapshot;
  let orderPlan: OrderPlan;

  function setup(sleep?: (ms: number) => Promise<void>): void {
    clock = new ManualClock();
    exchange = new FakeExchange();
    const persistence = new MemoryPersistenceAdapter();
    riskState = new RiskState(persistence, clock.clock);
    config = buildConfigSnapshot({ entryFillTimeoutMs: 10000, entryPollIntervalMs: 1000, protectiveOrderRetries: 2 });
    tracker = new PositionTracker(persistence, riskState, new ConfigStore(config));

    const service = new NotificationService(clock.clock);
    notifications = [];
    service.on('notification', (notification: DeliveredNotification) => notifications.push(notification));

    engine = new ExecutionEngine(exchange, tracker, service, { clock: clock.clock, sleep: sleep ?? clock.sleep });
    orderPlan = plan(trade, DEFAULT_CONSTRAINTS.futures, { entryPriceTolerance: 0, takeProfitOffset: 0.0005 });
    tracker.reserve(TRADE_ID, 'BTCUSDT', 'futures');
  }

  beforeEach(() => setup());

  describe('entry and protection', () => {
    it('enters, then places one stop and three take profits', async () => {
      const result = await engine.execute(orderPlan, config);

      expect(result.status).toBe('protected');
      expect(exchange.callsTo('setLeverage')).toHaveLength(1);
      expect(exchange.callsTo('placeLimitOrder')).toEqual([{
        method: 'placeLimitOrder',
        symbol: 'BTCUSDT',
        quantity: 0.003,
        price: 50000,
        clientOrderId: clientOrderIdFor(TRADE_ID, 'e'),
      }]);
      expect(exchange.callsTo('placeStopOrder').map(call => [call.price, call.quantity])).toEqual([[49000, 0.003]]);
      expect(exchange.callsTo('placeTakeProfitOrder').map(call => [call.price, call.quantity])).toEqual([
        [50474.75, 0.001],
        [51474.25, 0.001],
        [52473.75, 0.001],
      ]);

      const snapshot = engine.getTrade(TRADE_ID);
      expect(snapshot?.state).toBe('PROTECTED');
      expect(snapshot?.history.map(step => step.to)).toEqual(['ENTRY_SUBMITTED', 'ENTRY_FILLED', 'PROTECTED']);
      expect(snapshot?.stopLossOrderId).toBe('order-2');
      expect(snapshot?.takeProfitOrderIds).toEqual(['order-3', 'order-4', 'order-5']);

      const position = tracker.get('BTCUSDT', 'futures');
      expect(position?.quantity).toBe(0.003);
      expect(position?.stopLossOrderId).toBe('order-2');
      expect(position?.leverage).toBe(10);
      expect(tracker.exposureCount('futures')).toBe(1);

      expect(notifications.map(notification => notification.type)).toEqual(['trade_entered', 'position_protected']);
    });

    it('keeps client order ids within the exchange limit', () => {
      expect(clientOrderIdFor(TRADE_ID, 'tp5')).toBe('sx-a1b2c3d4e5f60718293a4b5c-tp5');
      expect(clientOrderIdFor(TRADE_ID, 'tp5').length).toBeLessThanOrEqual(36);
    });

    it('refuses to execute the same trade twice', async () => {
      await engine.execute(orderPlan, config);

      await expect(engine.execute(orderPlan, config)).rejects.toBeInstanceOf(InvariantViolationError);
      expect(exchange.callsTo('placeLimitOrder')).toHaveLength(1);
    });

    it('leaves the position UNPROTECTED when the stop cannot be placed', async () => {
      exchange.failNext('placeStopOrder', new Error('margin check failed'), 2);

      const result = await engine.execute(orderPlan, config);

      expect(result.status).toBe('unprotected');
      if (result.status === 'unprotected') {
        expect(result.failures).toEqual(['stop loss: margin check failed']);
      }
      expect(exchange.callsTo('placeStopOrder')).toHaveLength(2);
      expect(engine.getTrade(TRADE_ID)?.state).toBe('UNPROTECTED');
      expect(tracker.get('BTCUSDT', 'futures')?.status).toBe('unprotected');

      const critical = notifications.filter(notification => notification.severity === 'critical');
      expect(critical).toHaveLength(1);
      expect(critical[0].type).toBe('position_unprotected');
    });

    it('adopts a stop loss whose placement timed out after the venue took it', async () => {
      exchange.loseNextResponse('placeStopOrder', new Error('ETIMEDOUT'));

      const result = await engine.execute(orderPlan, config);

      expect(result.status).toBe('protected');
      expect(exchange.callsTo('placeStopOrder')).toHaveLength(1);
      expect(engine.getTrade(TRADE_ID)?.stopLossOrderId).toBe('order-2');
      expect(tracker.get('BTCUSDT', 'futures')?.stopLossOrderId).toBe('order-2');
    });

    it('retries a failed take profit within the attempt budget', async () => {
      exchange.failNext('placeTakeProfitOrder', new Error('temporary'), 1);

      const result = await engine.execute(orderPlan, config);

      expect(result.status).toBe('protected');
      expect(exchange.callsTo('placeTakeProfitOrder')).toHaveLength(4);
    });
  });

  describe('entry failures', () => {
    it('aborts with the exchange code when the entry is rejected', async () => {
      exchange.failNext('placeLimitOrder', new ExchangeRejection({
        exchange: 'fake',
        code: ExchangeErrorCode.INSUFFICIENT_FUNDS,
        message: 'Margin is insufficient',
      }));

      const result = await engine.execute(orderPlan, config);

      expect(result.status).toBe('aborted');
      if (result.status === 'aborted') {
        expect(result.reason).toBe('EXCHANGE_REJECTED');
        expect(result.exchangeCode).toBe(ExchangeErrorCode.INSUFFICIENT_FUNDS);
      }
      expect(engine.getTrade(TRADE_ID)?.state).toBe('ABORTED');
      expect(tracker.hasExposure('BTCUSDT', 'futures')).toBe(false);
      expect(exchange.callsTo('placeStopOrder')).toHaveLength(0);
      expect(exchange.callsTo('fetchOrderByClientId')).toHaveLength(0);
    });

    it('adopts an entry the venue accepted although the response was lost', async () => {
      exchange.loseNextResponse('placeLimitOrder', new Error('socket hang up'));

      const result = await engine.execute(orderPlan, config);

      expect(result.status).toBe('protected');
      expect(exchange.callsTo('placeLimitOrder')).toHaveLength(1);
      expect(exchange.callsTo('fetchOrderByClientId')).toEqual([{
        method: 'fetchOrderByClientId',
        symbol: 'BTCUSDT',
        clientOrderId: clientOrderIdFor(TRADE_ID, 'e'),
      }]);
      expect(engine.getTrade(TRADE_ID)?.entryOrderId).toBe('order-1');
      expect(exchange.restingOrders().map(order => order.id)).toEqual(['order-2', 'order-3', 'order-4', 'order-5']);
      expect(exchange.callsTo('cancelOrder')).toEqual([]);
    });

    it('aborts when a lost entry response cannot be looked up', async () => {
      exchange.loseNextResponse('placeLimitOrder', new Error('socket hang up'));
      exchange.failNext('fetchOrderByClientId', new Error('read ECONNRESET'));

      const result = await engine.execute(orderPlan, config);

      expect(result.status).toBe('aborted');
      if (result.status === 'aborted') {
        expect(result.message).toBe(
          `Entry order rejected: socket hang up; looking up ${clientOrderIdFor(TRADE_ID, 'e')} failed: read ECONNRESET`
        );
      }
      expect(exchange.callsTo('placeLimitOrder')).toHaveLength(1);
    });

    it('cancels an entry that does not fill before the timeout', async () => {
      exchange.fillEntriesImmediately = false;

      const result = await engine.execute(orderPlan, config);

      expect(result.status).toBe('aborted');
      if (result.status === 'aborted') {
        expect(result.reason).toBe('ENTRY_TIMEOUT');
        expect(result.message).toBe('Entry not filled within 10000ms');
      }
      expect(exchange.callsTo('cancelOrder').map(call => call.orderId)).toEqual(['order-1']);
      expect(exchange.callsTo('fetchOrderStatus')).toHaveLength(11);
      expect(tracker.exposureCount('futures')).toBe(0);
    });

    it('protects the filled part of an entry that times out partially filled', async () => {
      exchange.fillEntriesImmediately = false;
      exchange.entryFillQuantity = 0.002;

      const result = await engine.execute(orderPlan, config);

      expect(result.status).toBe('protected');
      expect(tracker.get('BTCUSDT', 'futures')?.quantity).toBe(0.002);
      expect(exchange.callsTo('placeStopOrder').map(call => call.quantity)).toEqual([0.002]);
      expect(exchange.callsTo('placeTakeProfitOrder').map(call => call.quantity)).toEqual([0.000666, 0.000666, 0.000668]);
    });

    it('honours a cancel while the entry rests', async () => {
      const yieldingSleep = async (ms: number): Promise<void> => {
        clock.advance(ms);
        await new Promise<void>(resolve => setImmediate(resolve));
      };
      setup(yieldingSleep);
      exchange.fillEntriesImmediately = false;

      const running = engine.execute(orderPlan, config);
      while (engine.getTrade(TRADE_ID)?.state !== 'ENTRY_SUBMITTED') {
        await new Promise<void>(resolve => setImmediate(resolve));
      }

      expect(await engine.cancel(TRADE_ID)).toBe(true);
      const result = await running;

      expect(result.status).toBe('aborted');
      if (result.status === 'aborted') {
        expect(result.reason).toBe('CANCELLED');
      }
      expect(await engine.cancel(TRADE_ID)).toBe(false);
    });

    it('cancels every pending entry on cancel-all', async () => {
      const yieldingSleep = async (ms: number): Promise<void> => {
        clock.advance(ms);
        await new Promise<void>(resolve => setImmediate(resolve));
      };
      setup(yieldingSleep);
      exchange.fillEntriesImmediately = false;

      const running = engine.execute(orderPlan, config);
      while (engine.getTrade(TRADE_ID)?.state !== 'ENTRY_SUBMITTED') {
        await new Promise<void>(resolve => setImmediate(resolve));
      }

      expect(await engine.cancelAll()).toBe(1);
      const result = await running;

      expect(result.status === 'aborted' && result.reason).toBe('CANCELLED');
      expect(exchange.orders.get('order-1')?.status).toBe('canceled');
      expect(await engine.cancelAll()).toBe(0);
    });

    it('leaves protected positions alone on cancel-all', async () => {
      await engine.execute(orderPlan, config);

      expect(await engine.cancelAll()).toBe(0);
      expect(exchange.callsTo('cancelOrder')).toEqual([]);
      expect(engine.getTrade(TRADE_ID)?.state).toBe('PROTECTED');
    });
  });

  describe('protective fills', () => {
    it('walks the ladder to CLOSED and cancels the stop', async () => {
      await engine.execute(orderPlan, config);

      exchange.fill('order-3');
      expect(await engine.pollProtectiveOrders()).toBe(1);
      expect(engine.getTrade(TRADE_ID)?.state).toBe('PARTIALLY_CLOSED');
      expect(tracker.get('BTCUSDT', 'futures')?.quantity).toBe(0.002);

      exchange.fill('order-4');
      exchange.fill('order-5');
      expect(await engine.pollProtectiveOrders()).toBe(2);

      expect(engine.getTrade(TRADE_ID)?.state).toBe('CLOSED');
      expect(tracker.get('BTCUSDT', 'futures')).toBeUndefined();
      expect(exchange.callsTo('cancelOrder').map(call => call.orderId)).toEqual(['order-2']);
      expect(riskState.dailyPnL()).toBeCloseTo(4.42275, 8);

      const closed = notifications.find(notification => notification.type === 'position_closed');
      expect(closed?.type === 'position_closed' && closed.realizedPnL).toBeCloseTo(4.42275, 8);
    });

    it('closes on the stop and cancels every take profit', async () => {
      await engine.execute(orderPlan, config);

      exchange.fill('order-2', undefined, 49000);
      await engine.pollProtectiveOrders();

      expect(engine.getTrade(TRADE_ID)?.state).toBe('CLOSED');
      expect(exchange.callsTo('cancelOrder').map(call => call.orderId)).toEqual(['order-3', 'order-4', 'order-5']);
      expect(riskState.dailyPnL()).toBeCloseTo(-3, 8);
    });

    it('ignores fills for orders it does not know', async () => {
      await engine.onProtectiveFill({ orderId: 'unknown', kind: 'take_profit', price: 1, quantity: 1, timestamp: clock.now });

      expect(tracker.snapshot()).toEqual([]);
    });

    it('lists only trades still in flight', async () => {
      await engine.execute(orderPlan, config);
      expect(engine.activeTrades().map(active => active.tradeId)).toEqual([TRADE_ID]);

      exchange.fill('order-2', undefined, 49000);
      await engine.pollProtectiveOrders();

      expect(engine.activeTrades()).toEqual([]);
    });

    it('drops finished trades and their order index from the live set', async () => {
      await engine.execute(orderPlan, config);
      expect(engine.trackedCounts).toEqual({ trades: 1, protectiveOrders: 4 });

      exchange.fill('order-2', undefined, 49000);
      await engine.pollProtectiveOrders();

      expect(engine.trackedCounts).toEqual({ trades: 0, protectiveOrders: 0 });
      expect(engine.getTrade(TRADE_ID)?.state).toBe('CLOSED');
      await expect(engine.execute(orderPlan, config)).rejects.toBeInstanceOf(InvariantViolationError);
    });

    it('drops aborted trades from the live set', async () => {
      exchange.failNext('setLeverage', new Error('leverage not allowed'));

      await engine.execute(orderPlan, config);

      expect(engine.trackedCounts).toEqual({ trades: 0, protectiveOrders: 0 });
      expect(engine.getTrade(TRADE_ID)?.abortReason).toBe('EXCHANGE_REJECTED');
    });
  });
});

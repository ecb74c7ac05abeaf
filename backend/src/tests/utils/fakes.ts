import {
  ClientOrderRef,
  ExchangeBalance,
  ExchangeCapability,
  ExchangeOrder,
  ExchangeOrderType,
  ExchangePosition,
  LimitOrderRequest,
  MarketConstraints,
  OrderRef,
  TriggerOrderRequest,
} from '../../services/brokers/ExchangeCapability';
import { ExchangeErrorCode, ExchangeRejection } from '../../services/brokers/ExchangeError';
import { RedisLike } from '../../services/trading/StateManager';
import { CandidateSignal, MarketType } from '../../types/trading';

/** Controllable time: `sleep` advances the clock instead of waiting. */
export class ManualClock {
  constructor(public now: number = Date.UTC(2024, 0, 15, 12, 0, 0)) {}

  readonly clock = (): number => this.now;

  readonly sleep = async (ms: number): Promise<void> => {
    this.now += ms;
  };

  advance(ms: number): void {
    this.now += ms;
  }
}

type FakeMethod =
  | 'placeLimitOrder'
  | 'placeStopOrder'
  | 'placeTakeProfitOrder'
  | 'cancelOrder'
  | 'setLeverage'
  | 'fetchOpenPositions'
  | 'fetchOrderStatus'
  | 'fetchOrderByClientId';

type PlacementMethod = Extract<FakeMethod, 'placeLimitOrder' | 'placeStopOrder' | 'placeTakeProfitOrder'>;

export interface RecordedCall {
  method: FakeMethod;
  symbol?: string;
  type?: ExchangeOrderType;
  quantity?: number;
  price?: number;
  orderId?: string;
  clientOrderId?: string;
}

/**
 * In-process exchange. Orders rest until filled by the test, unless
 * `fillEntriesImmediately` is set; failures are queued per method.
 * A reused client order id is refused the way a venue does.
 */
export class FakeExchange implements ExchangeCapability {
  readonly name = 'fake';
  tradableMarkets: readonly MarketType[] = ['futures', 'spot'];
  readonly reportedMarkets: readonly MarketType[] = ['futures', 'spot'];

  fillEntriesImmediately = true;
  /** When set, entries come back partially filled by this quantity. */
  entryFillQuantity?: number;
  positions: ExchangePosition[] = [];
  constraints?: MarketConstraints;
  readonly calls: RecordedCall[] = [];
  readonly orders: Map<string, ExchangeOrder> = new Map();
  private failures: Map<FakeMethod, Error[]> = new Map();
  private lostResponses: Map<PlacementMethod, Error[]> = new Map();
  private nextId = 1;

  failNext(method: FakeMethod, error: Error, times: number = 1): void {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < times; i++) queue.push(error);
    this.failures.set(method, queue);
  }

  /** The next placement is accepted by the venue, but the caller sees `error`. */
  loseNextResponse(method: PlacementMethod, error: Error): void {
    const queue = this.lostResponses.get(method) ?? [];
    queue.push(error);
    this.lostResponses.set(method, queue);
  }

  /** Orders that are neither filled nor finished. */
  restingOrders(): ExchangeOrder[] {
    return [...this.orders.values()].filter(order => order.status === 'new' || order.status === 'partially_filled');
  }

  callsTo(method: FakeMethod): RecordedCall[] {
    return this.calls.filter(call => call.method === method);
  }

  /** Fill a resting order (fully by default). */
  fill(orderId: string, quantity?: number, price?: number): ExchangeOrder {
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`unknown order ${orderId}`);
    const filled = Math.min(order.quantity, order.filledQuantity + (quantity ?? order.quantity));
    const updated: ExchangeOrder = {
      ...order,
      filledQuantity: filled,
      averagePrice: price ?? order.price,
      status: filled >= order.quantity ? 'filled' : 'partially_filled',
    };
    this.orders.set(orderId, updated);
    return updated;
  }

  async placeLimitOrder(request: LimitOrderRequest): Promise<ExchangeOrder> {
    this.record({ method: 'placeLimitOrder', symbol: request.symbol, quantity: request.quantity, price: request.price, clientOrderId: request.clientOrderId });
    this.throwIfQueued('placeLimitOrder');
    const order = this.create('limit', request.symbol, request.side, request.price, request.quantity, request.clientOrderId);
    let placed = order;
    if (this.entryFillQuantity !== undefined) {
      placed = this.fill(order.id, this.entryFillQuantity);
    } else if (this.fillEntriesImmediately) {
      placed = this.fill(order.id);
    }
    this.throwIfLost('placeLimitOrder');
    return placed;
  }

  async placeStopOrder(request: TriggerOrderRequest): Promise<ExchangeOrder> {
    this.record({ method: 'placeStopOrder', symbol: request.symbol, type: 'stop', quantity: request.quantity, price: request.triggerPrice, clientOrderId: request.clientOrderId });
    this.throwIfQueued('placeStopOrder');
    const order = this.create('stop', request.symbol, request.side, request.triggerPrice, request.quantity, request.clientOrderId);
    this.throwIfLost('placeStopOrder');
    return order;
  }

  async placeTakeProfitOrder(request: TriggerOrderRequest): Promise<ExchangeOrder> {
    this.record({ method: 'placeTakeProfitOrder', symbol: request.symbol, type: 'take_profit', quantity: request.quantity, price: request.triggerPrice, clientOrderId: request.clientOrderId });
    this.throwIfQueued('placeTakeProfitOrder');
    const order = this.create('take_profit', request.symbol, request.side, request.triggerPrice, request.quantity, request.clientOrderId);
    this.throwIfLost('placeTakeProfitOrder');
    return order;
  }

  async cancelOrder(ref: OrderRef): Promise<void> {
    this.record({ method: 'cancelOrder', symbol: ref.symbol, orderId: ref.orderId });
    this.throwIfQueued('cancelOrder');
    const order = this.orders.get(ref.orderId);
    if (order && order.status !== 'filled') {
      this.orders.set(ref.orderId, { ...order, status: 'canceled' });
    }
  }

  async setLeverage(symbol: string): Promise<void> {
    this.record({ method: 'setLeverage', symbol });
    this.throwIfQueued('setLeverage');
  }

  async fetchOpenPositions(): Promise<ExchangePosition[]> {
    this.record({ method: 'fetchOpenPositions' });
    this.throwIfQueued('fetchOpenPositions');
    return this.positions.map(position => ({ ...position }));
  }

  async fetchOrderStatus(ref: OrderRef): Promise<ExchangeOrder> {
    this.record({ method: 'fetchOrderStatus', symbol: ref.symbol, orderId: ref.orderId });
    this.throwIfQueued('fetchOrderStatus');
    const order = this.orders.get(ref.orderId);
    if (!order) throw new Error(`unknown order ${ref.orderId}`);
    return { ...order };
  }

  async fetchOrderByClientId(ref: ClientOrderRef): Promise<ExchangeOrder | null> {
    this.record({ method: 'fetchOrderByClientId', symbol: ref.symbol, clientOrderId: ref.clientOrderId });
    this.throwIfQueued('fetchOrderByClientId');
    const order = [...this.orders.values()].find(
      candidate => candidate.symbol === ref.symbol && candidate.clientOrderId === ref.clientOrderId
    );
    return order ? { ...order } : null;
  }

  async fetchBalance(): Promise<ExchangeBalance[]> {
    return [{ asset: 'USDT', free: 1000, total: 1000 }];
  }

  async getMarketConstraints(): Promise<MarketConstraints> {
    if (!this.constraints) throw new Error('no constraints configured');
    return this.constraints;
  }

  private create(
    type: ExchangeOrderType,
    symbol: string,
    side: ExchangeOrder['side'],
    price: number,
    quantity: number,
    clientOrderId?: string
  ): ExchangeOrder {
    if (clientOrderId && [...this.orders.values()].some(existing => existing.clientOrderId === clientOrderId)) {
      throw new ExchangeRejection({ exchange: this.name, code: ExchangeErrorCode.REJECTED, message: 'Duplicate clientOrderId' });
    }
    const order: ExchangeOrder = {
      id: `order-${this.nextId++}`,
      clientOrderId,
      symbol,
      side,
      type,
      status: 'new',
      price,
      quantity,
      filledQuantity: 0,
    };
    this.orders.set(order.id, order);
    return { ...order };
  }

  private record(call: RecordedCall): void {
    this.calls.push(call);
  }

  private throwIfQueued(method: FakeMethod): void {
    const queue = this.failures.get(method);
    const error = queue?.shift();
    if (error) throw error;
  }

  private throwIfLost(method: PlacementMethod): void {
    const error = this.lostResponses.get(method)?.shift();
    if (error) throw error;
  }
}

/** Map-backed stand-in for the ioredis commands the state manager uses. */
export class FakeRedis implements RedisLike {
  readonly values: Map<string, string> = new Map();
  readonly sets: Map<string, Set<string>> = new Map();
  readonly published: Array<{ channel: string; message: string }> = [];
  quitCalled = false;

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<unknown> {
    this.values.set(key, value);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.values.delete(key)) removed++;
    }
    return removed;
  }

  async sadd(key: string, member: string): Promise<number> {
    const set = this.sets.get(key) ?? new Set<string>();
    const added = set.has(member) ? 0 : 1;
    set.add(member);
    this.sets.set(key, set);
    return added;
  }

  async srem(key: string, member: string): Promise<number> {
    return this.sets.get(key)?.delete(member) ? 1 : 0;
  }

  async smembers(key: string): Promise<string[]> {
    return [...(this.sets.get(key) ?? [])];
  }

  async publish(channel: string, message: string): Promise<number> {
    this.published.push({ channel, message });
    return 0;
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  async quit(): Promise<unknown> {
    this.quitCalled = true;
    return 'OK';
  }
}

export function candidate(overrides: Partial<CandidateSignal> = {}): CandidateSignal {
  return {
    symbol: 'BTCUSDT',
    direction: 'long',
    marketType: 'futures',
    entry: { kind: 'limit', price: 50000 },
    stopLoss: 49000,
    takeProfits: [50500, 51000, 51500, 52000, 52500],
    leverage: 10,
    confidence: 0.9,
    sourceMessageId: 'msg-1',
    channelId: 'alerts',
    receivedAt: Date.UTC(2024, 0, 15, 12, 0, 0),
    ...overrides,
  };
}

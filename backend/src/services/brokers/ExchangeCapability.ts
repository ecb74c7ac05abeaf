/**
 * Exchange capability interface - everything the execution pipeline needs
 * from a venue. Transport details (REST signing, websockets) live behind it.
 */

import { Direction, MarketType, OrderSide } from '../../types/trading';

export type ExchangeOrderStatus =
  | 'new'
  | 'partially_filled'
  | 'filled'
  | 'canceled'
  | 'expired'
  | 'rejected';

export type ExchangeOrderType = 'limit' | 'stop' | 'take_profit';

export interface ExchangeOrder {
  id: string;
  clientOrderId?: string;
  symbol: string;
  side: OrderSide;
  type: ExchangeOrderType;
  status: ExchangeOrderStatus;
  price: number;
  quantity: number;
  filledQuantity: number;
  averagePrice?: number;
  updatedAt?: number;
}

export interface ExchangePosition {
  /** Venue-side identifier, stable for the lifetime of the position. */
  id: string;
  symbol: string;
  marketType: MarketType;
  side: Direction;
  quantity: number;
  entryPrice: number;
  markPrice: number;
  unrealizedPnL: number;
  leverage?: number;
}

export interface ExchangeBalance {
  asset: string;
  free: number;
  total: number;
}

export interface MarketConstraints {
  stepSize: number;
  tickSize: number;
  minQuantity: number;
  minNotional: number;
}

export interface LimitOrderRequest {
  symbol: string;
  marketType: MarketType;
  side: OrderSide;
  quantity: number;
  price: number;
  clientOrderId?: string;
}

export interface TriggerOrderRequest {
  symbol: string;
  marketType: MarketType;
  side: OrderSide;
  quantity: number;
  triggerPrice: number;
  clientOrderId?: string;
}

export interface OrderRef {
  symbol: string;
  marketType: MarketType;
  orderId: string;
}

export interface ClientOrderRef {
  symbol: string;
  marketType: MarketType;
  clientOrderId: string;
}

export interface ExchangeCapability {
  readonly name: string;
  /** Market types orders can be placed on. */
  readonly tradableMarkets: readonly MarketType[];
  /** Market types whose positions fetchOpenPositions reports. */
  readonly reportedMarkets: readonly MarketType[];

  placeLimitOrder(request: LimitOrderRequest): Promise<ExchangeOrder>;
  placeStopOrder(request: TriggerOrderRequest): Promise<ExchangeOrder>;
  placeTakeProfitOrder(request: TriggerOrderRequest): Promise<ExchangeOrder>;
  cancelOrder(ref: OrderRef): Promise<void>;
  setLeverage(symbol: string, leverage: number): Promise<void>;
  fetchOpenPositions(): Promise<ExchangePosition[]>;
  fetchOrderStatus(ref: OrderRef): Promise<ExchangeOrder>;
  /** Resolves null when the venue holds no order under that client id. */
  fetchOrderByClientId(ref: ClientOrderRef): Promise<ExchangeOrder | null>;
  fetchBalance(): Promise<ExchangeBalance[]>;
  getMarketConstraints?(symbol: string, marketType: MarketType): Promise<MarketConstraints>;
}

export const DEFAULT_CONSTRAINTS: Record<MarketType, MarketConstraints> = {
  futures: { stepSize: 0.000001, tickSize: 0, minQuantity: 0, minNotional: 5 },
  spot: { stepSize: 0.00000001, tickSize: 0, minQuantity: 0, minNotional: 5 },
};

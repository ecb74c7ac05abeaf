/**
 * Binance USDⓈ-M futures adapter.
 * Signed REST calls over node-fetch; every venue failure is mapped onto the
 * ExchangeError taxonomy before it leaves this file.
 */

import fetch from 'node-fetch';
import * as crypto from 'crypto';
import logger from '../../utils/logger';
import { ExchangeCredentials } from '../../config/secrets';
import { Direction, MarketType, OrderSide } from '../../types/trading';
import {
  ClientOrderRef,
  ExchangeBalance,
  ExchangeCapability,
  ExchangeOrder,
  ExchangeOrderStatus,
  ExchangeOrderType,
  ExchangePosition,
  LimitOrderRequest,
  MarketConstraints,
  OrderRef,
  TriggerOrderRequest,
} from './ExchangeCapability';
import { ExchangeError, ExchangeErrorCode, ExchangeRejection, createExchangeError, toExchangeError } from './ExchangeError';

const EXCHANGE = 'binance-futures';
const DEFAULT_BASE_URL = 'https://fapi.binance.com';

type HttpMethod = 'GET' | 'POST' | 'DELETE';
type Params = Record<string, string | number | boolean | undefined>;

interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

/** The part of node-fetch the broker calls. */
export type FetchLike = (
  url: string,
  init?: { method?: string; headers?: Record<string, string>; body?: string }
) => Promise<FetchResponse>;

export interface BinanceFuturesOptions {
  recvWindow?: number;
  fetch?: FetchLike;
  now?: () => number;
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown, what: string): JsonObject {
  if (!isRecord(value)) {
    throw createExchangeError({ exchange: EXCHANGE, code: ExchangeErrorCode.UNKNOWN, message: `Unexpected ${what} response` });
  }
  return value;
}

function asArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw createExchangeError({ exchange: EXCHANGE, code: ExchangeErrorCode.UNKNOWN, message: `Unexpected ${what} response` });
  }
  return value;
}

function str(obj: JsonObject, key: string): string {
  const value = obj[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function num(obj: JsonObject, key: string): number {
  const parsed = parseFloat(str(obj, key));
  return Number.isFinite(parsed) ? parsed : 0;
}

/** Plain decimal notation, never exponent form. */
export function formatDecimal(value: number): string {
  return value.toFixed(8).replace(/\.?0+$/, '');
}

const ORDER_STATUS: Record<string, ExchangeOrderStatus> = {
  NEW: 'new',
  PARTIALLY_FILLED: 'partially_filled',
  FILLED: 'filled',
  CANCELED: 'canceled',
  EXPIRED: 'expired',
  EXPIRED_IN_MATCH: 'expired',
  REJECTED: 'rejected',
};

function orderType(raw: string): ExchangeOrderType {
  if (raw.startsWith('TAKE_PROFIT')) return 'take_profit';
  if (raw.startsWith('STOP')) return 'stop';
  return 'limit';
}

function errorCodeFor(status: number, venueCode: number | undefined): ExchangeErrorCode {
  if (status === 429 || status === 418 || venueCode === -1003) return ExchangeErrorCode.RATE_LIMITED;
  switch (venueCode) {
    case -2019:
      return ExchangeErrorCode.INSUFFICIENT_FUNDS;
    case -2011:
    case -2013:
      return ExchangeErrorCode.ORDER_NOT_FOUND;
    case -1121:
      return ExchangeErrorCode.SYMBOL_SUSPENDED;
  }
  if (status >= 500) return ExchangeErrorCode.NETWORK;
  return ExchangeErrorCode.REJECTED;
}

export class BinanceFuturesBroker implements ExchangeCapability {
  readonly name = EXCHANGE;
  readonly tradableMarkets: readonly MarketType[] = ['futures'];
  readonly reportedMarkets: readonly MarketType[] = ['futures'];

  private readonly baseUrl: string;
  private readonly recvWindow: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private serverTimeOffsetMs: number = 0;
  private timeSynced: boolean = false;
  private constraintsCache: Map<string, MarketConstraints> = new Map();

  constructor(private readonly credentials: ExchangeCredentials, options: BinanceFuturesOptions = {}) {
    this.baseUrl = credentials.baseUrl || DEFAULT_BASE_URL;
    this.recvWindow = options.recvWindow ?? 5000;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async placeLimitOrder(request: LimitOrderRequest): Promise<ExchangeOrder> {
    this.assertFutures(request.marketType, request.symbol);
    const raw = await this.request('/fapi/v1/order', {
      method: 'POST',
      signed: true,
      params: {
        symbol: request.symbol,
        side: this.side(request.side),
        type: 'LIMIT',
        timeInForce: 'GTC',
        quantity: formatDecimal(request.quantity),
        price: formatDecimal(request.price),
        newClientOrderId: request.clientOrderId,
      },
    });
    return this.mapOrder(asRecord(raw, 'order'));
  }

  placeStopOrder(request: TriggerOrderRequest): Promise<ExchangeOrder> {
    return this.placeTrigger('STOP_MARKET', request);
  }

  placeTakeProfitOrder(request: TriggerOrderRequest): Promise<ExchangeOrder> {
    return this.placeTrigger('TAKE_PROFIT_MARKET', request);
  }

  async cancelOrder(ref: OrderRef): Promise<void> {
    this.assertFutures(ref.marketType, ref.symbol);
    await this.request('/fapi/v1/order', {
      method: 'DELETE',
      signed: true,
      params: { symbol: ref.symbol, orderId: ref.orderId },
    });
  }

  async setLeverage(symbol: string, leverage: number): Promise<void> {
    await this.request('/fapi/v1/leverage', {
      method: 'POST',
      signed: true,
      params: { symbol, leverage },
    });
    logger.info(`Leverage for ${symbol} set to ${leverage}x`);
  }

  async fetchOpenPositions(): Promise<ExchangePosition[]> {
    const raw = asArray(await this.request('/fapi/v2/positionRisk', { signed: true }), 'positionRisk');
    const positions: ExchangePosition[] = [];

    for (const item of raw) {
      if (!isRecord(item)) continue;
      const amount = num(item, 'positionAmt');
      if (amount === 0) continue;

      const symbol = str(item, 'symbol');
      const side: Direction = amount > 0 ? 'long' : 'short';
      const leverage = num(item, 'leverage');
      positions.push({
        id: `${symbol}:${str(item, 'positionSide') || 'BOTH'}`,
        symbol,
        marketType: 'futures',
        side,
        quantity: Math.abs(amount),
        entryPrice: num(item, 'entryPrice'),
        markPrice: num(item, 'markPrice'),
        unrealizedPnL: num(item, 'unRealizedProfit'),
        leverage: leverage > 0 ? leverage : undefined,
      });
    }

    return positions;
  }

  async fetchOrderStatus(ref: OrderRef): Promise<ExchangeOrder> {
    this.assertFutures(ref.marketType, ref.symbol);
    const raw = await this.request('/fapi/v1/order', {
      signed: true,
      params: { symbol: ref.symbol, orderId: ref.orderId },
    });
    return this.mapOrder(asRecord(raw, 'order'));
  }

  async fetchOrderByClientId(ref: ClientOrderRef): Promise<ExchangeOrder | null> {
    this.assertFutures(ref.marketType, ref.symbol);
    try {
      const raw = await this.request('/fapi/v1/order', {
        signed: true,
        params: { symbol: ref.symbol, origClientOrderId: ref.clientOrderId },
      });
      return this.mapOrder(asRecord(raw, 'order'));
    } catch (error) {
      if (error instanceof ExchangeError && error.exchangeCode === ExchangeErrorCode.ORDER_NOT_FOUND) {
        return null;
      }
      throw error;
    }
  }

  async fetchBalance(): Promise<ExchangeBalance[]> {
    const raw = asArray(await this.request('/fapi/v2/balance', { signed: true }), 'balance');
    return raw.filter(isRecord).map(item => ({
      asset: str(item, 'asset'),
      free: num(item, 'availableBalance'),
      total: num(item, 'balance'),
    }));
  }

  async getMarketConstraints(symbol: string, marketType: MarketType): Promise<MarketConstraints> {
    this.assertFutures(marketType, symbol);
    const cached = this.constraintsCache.get(symbol);
    if (cached) return cached;

    const info = asRecord(await this.request('/fapi/v1/exchangeInfo'), 'exchangeInfo');
    const symbols = asArray(info.symbols, 'exchangeInfo').filter(isRecord);
    const entry = symbols.find(s => str(s, 'symbol') === symbol);

    if (!entry) {
      throw createExchangeError({ exchange: EXCHANGE, code: ExchangeErrorCode.SYMBOL_SUSPENDED, message: `Unknown symbol ${symbol}` });
    }
    if (str(entry, 'status') !== 'TRADING') {
      throw createExchangeError({
        exchange: EXCHANGE,
        code: ExchangeErrorCode.SYMBOL_SUSPENDED,
        message: `${symbol} is not trading (status ${str(entry, 'status')})`,
      });
    }

    const constraints: MarketConstraints = { stepSize: 0, tickSize: 0, minQuantity: 0, minNotional: 0 };
    for (const filter of asArray(entry.filters, 'filters').filter(isRecord)) {
      switch (str(filter, 'filterType')) {
        case 'LOT_SIZE':
          constraints.stepSize = num(filter, 'stepSize');
          constraints.minQuantity = num(filter, 'minQty');
          break;
        case 'PRICE_FILTER':
          constraints.tickSize = num(filter, 'tickSize');
          break;
        case 'MIN_NOTIONAL':
          constraints.minNotional = num(filter, 'notional') || num(filter, 'minNotional');
          break;
      }
    }

    this.constraintsCache.set(symbol, constraints);
    return constraints;
  }

  private async placeTrigger(type: 'STOP_MARKET' | 'TAKE_PROFIT_MARKET', request: TriggerOrderRequest): Promise<ExchangeOrder> {
    this.assertFutures(request.marketType, request.symbol);
    const raw = await this.request('/fapi/v1/order', {
      method: 'POST',
      signed: true,
      params: {
        symbol: request.symbol,
        side: this.side(request.side),
        type,
        quantity: formatDecimal(request.quantity),
        stopPrice: formatDecimal(request.triggerPrice),
        reduceOnly: true,
        workingType: 'MARK_PRICE',
        newClientOrderId: request.clientOrderId,
      },
    });
    return this.mapOrder(asRecord(raw, 'order'));
  }

  private mapOrder(raw: JsonObject): ExchangeOrder {
    const status = ORDER_STATUS[str(raw, 'status')];
    if (!status) {
      throw createExchangeError({
        exchange: EXCHANGE,
        code: ExchangeErrorCode.UNKNOWN,
        message: `Unknown order status ${str(raw, 'status')}`,
      });
    }
    const averagePrice = num(raw, 'avgPrice');
    const price = num(raw, 'price') || num(raw, 'stopPrice');
    return {
      id: str(raw, 'orderId'),
      clientOrderId: str(raw, 'clientOrderId') || undefined,
      symbol: str(raw, 'symbol'),
      side: str(raw, 'side') === 'SELL' ? 'sell' : 'buy',
      type: orderType(str(raw, 'type')),
      status,
      price,
      quantity: num(raw, 'origQty'),
      filledQuantity: num(raw, 'executedQty'),
      averagePrice: averagePrice > 0 ? averagePrice : undefined,
      updatedAt: num(raw, 'updateTime') || undefined,
    };
  }

  private side(side: OrderSide): 'BUY' | 'SELL' {
    return side === 'buy' ? 'BUY' : 'SELL';
  }

  private assertFutures(marketType: MarketType, symbol: string): void {
    if (marketType !== 'futures') {
      throw new ExchangeRejection({
        exchange: EXCHANGE,
        code: ExchangeErrorCode.REJECTED,
        message: `${symbol}: ${marketType} markets are not supported by ${EXCHANGE}`,
      });
    }
  }

  private async syncServerTime(): Promise<void> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/fapi/v1/time`);
      if (!response.ok) return;
      const data = await response.json();
      if (isRecord(data) && typeof data.serverTime === 'number') {
        this.serverTimeOffsetMs = data.serverTime - this.now();
        this.timeSynced = true;
        logger.debug(`Binance server time synced, offset ${this.serverTimeOffsetMs}ms`);
      }
    } catch (error) {
      logger.warn(`Failed to sync Binance server time: ${toExchangeError(EXCHANGE, error).message}`);
    }
  }

  private generateSignature(queryString: string): string {
    return crypto
      .createHmac('sha256', this.credentials.secretKey)
      .update(queryString)
      .digest('hex');
  }

  private async request(
    path: string,
    options: { method?: HttpMethod; params?: Params; signed?: boolean; retryOnTimeSkew?: boolean } = {}
  ): Promise<unknown> {
    const method = options.method || 'GET';
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(options.params ?? {})) {
      if (value !== undefined) params.append(key, String(value));
    }

    const headers: Record<string, string> = {};
    let body: string | undefined;
    let url = `${this.baseUrl}${path}`;

    if (options.signed) {
      if (!this.timeSynced) await this.syncServerTime();
      params.set('timestamp', Math.floor(this.now() + this.serverTimeOffsetMs).toString());
      params.set('recvWindow', this.recvWindow.toString());
      params.set('signature', this.generateSignature(params.toString()));
      headers['X-MBX-APIKEY'] = this.credentials.apiKey;
    }

    if (method === 'POST') {
      body = params.toString();
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    } else if (params.toString()) {
      url += `?${params.toString()}`;
    }

    let response: FetchResponse;
    try {
      response = await this.fetchImpl(url, { method, headers, body });
    } catch (error) {
      throw toExchangeError(EXCHANGE, error);
    }

    if (response.ok) {
      return response.json();
    }

    const text = await response.text();
    let venueCode: number | undefined;
    let venueMessage = text;
    try {
      const parsed: unknown = JSON.parse(text);
      if (isRecord(parsed)) {
        if (typeof parsed.code === 'number') venueCode = parsed.code;
        if (typeof parsed.msg === 'string') venueMessage = parsed.msg;
      }
    } catch {
      logger.debug(`Non-JSON error body from ${path}`);
    }

    if (venueCode === -1021 && options.signed && options.retryOnTimeSkew !== false) {
      await this.syncServerTime();
      return this.request(path, { ...options, retryOnTimeSkew: false });
    }

    throw createExchangeError({
      exchange: EXCHANGE,
      code: errorCodeFor(response.status, venueCode),
      message: `Binance API error ${venueCode ?? response.status}: ${venueMessage}`,
      originalCode: venueCode ?? response.status,
      metadata: { path, method },
    });
  }
}

export default BinanceFuturesBroker;

// Trading System Type Definitions

export type MarketType = 'futures' | 'spot';
export type Direction = 'long' | 'short';
export type OrderSide = 'buy' | 'sell';
export type TradingMode = 'demo' | 'live';

export const MARKET_TYPES: readonly MarketType[] = ['futures', 'spot'];

export type EntryInstruction =
  | { kind: 'limit'; price: number }
  | { kind: 'market' };

/**
 * Structured trade instruction produced by the AI extraction step.
 * Never mutated after it has been produced.
 */
export interface CandidateSignal {
  readonly symbol: string;
  readonly direction: Direction;
  readonly marketType: MarketType;
  readonly entry: EntryInstruction;
  readonly stopLoss?: number;
  readonly takeProfits: readonly number[];
  readonly leverage?: number;
  readonly confidence: number;
  readonly sourceMessageId: string;
  readonly channelId?: string;
  /** Epoch milliseconds at which the alert arrived. */
  readonly receivedAt: number;
}

export type RejectionReason =
  | 'TRADING_HALTED'
  | 'BLACKLISTED'
  | 'LOW_CONFIDENCE'
  | 'MARKET_UNSUPPORTED'
  | 'MARKET_ENTRY_REJECTED'
  | 'INVALID_STOP_LOSS'
  | 'RISK_REWARD_EXCEEDED'
  | 'DUPLICATE_POSITION'
  | 'MAX_POSITIONS_REACHED'
  | 'DUPLICATE_SIGNAL'
  | 'NO_TAKE_PROFIT'
  | 'QUANTITY_TOO_SMALL'
  | 'EXCHANGE_REJECTED';

export interface Rejection {
  readonly verdict: 'rejected';
  readonly reason: RejectionReason;
  readonly message: string;
  readonly signal: CandidateSignal;
}

interface ValidatedTradeBase {
  readonly verdict: 'accepted';
  /** Unique per acceptance; the same alert accepted twice gets two ids. */
  readonly tradeId: string;
  /** Content fingerprint the duplicate checks match on. */
  readonly fingerprint: string;
  readonly signal: CandidateSignal;
  readonly symbol: string;
  readonly direction: Direction;
  readonly entryPrice: number;
  readonly stopLoss: number;
  readonly takeProfits: readonly number[];
  readonly riskReward: number;
  /** Position size in quote currency. */
  readonly positionSize: number;
}

export interface FuturesTrade extends ValidatedTradeBase {
  readonly marketType: 'futures';
  readonly leverage: number;
}

export interface SpotTrade extends ValidatedTradeBase {
  readonly marketType: 'spot';
}

export type ValidatedTrade = FuturesTrade | SpotTrade;

export type ValidationResult = ValidatedTrade | Rejection;

export interface PlannedOrder {
  readonly price: number;
  readonly quantity: number;
}

export interface TakeProfitLevel extends PlannedOrder {
  /** 1-based position of the level in the signal's TP list. */
  readonly level: number;
  readonly fraction: number;
}

interface OrderPlanBase {
  readonly tradeId: string;
  readonly symbol: string;
  readonly direction: Direction;
  readonly side: OrderSide;
  readonly closeSide: OrderSide;
  /** Entry is always a limit order. */
  readonly entry: PlannedOrder;
  readonly stopLoss: PlannedOrder;
  readonly takeProfits: readonly TakeProfitLevel[];
}

export type OrderPlan =
  | (OrderPlanBase & { readonly marketType: 'futures'; readonly leverage: number })
  | (OrderPlanBase & { readonly marketType: 'spot' });

export type PositionStatus = 'open' | 'partially_closed' | 'unprotected' | 'closed';

export interface Position {
  id: string;
  symbol: string;
  marketType: MarketType;
  side: Direction;
  entryPrice: number;
  quantity: number;
  initialQuantity: number;
  leverage: number;
  stopLossOrderId?: string;
  takeProfitOrderIds: string[];
  openedAt: number;
  signalId: string;
  status: PositionStatus;
  realizedPnL: number;
  lastMarkPrice?: number;
  /** Set when the position was adopted from the exchange rather than opened by a signal. */
  adopted?: boolean;
}

export type FillKind = 'take_profit' | 'stop_loss' | 'manual';

export interface FillEvent {
  readonly orderId: string;
  readonly kind: FillKind;
  readonly price: number;
  readonly quantity: number;
  readonly timestamp: number;
}

export interface RiskSnapshot {
  tradingDay: string;
  dailyRealizedPnL: number;
  openPositions: Record<MarketType, number>;
  tradingEnabled: boolean;
  haltReason?: string;
}

export function positionKey(symbol: string, marketType: MarketType): string {
  return `${marketType}:${symbol}`;
}

export function leverageOf(trade: ValidatedTrade | OrderPlan): number {
  return trade.marketType === 'futures' ? trade.leverage : 1;
}

import { Position } from '../../types/trading';
import { Clock, systemClock } from '../../utils/time';

export interface TradeStats {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  /** Percent of closed trades with positive PnL, one decimal. */
  winRate: number;
  totalPnL: number;
  largestWin: number;
  largestLoss: number;
  averageHoldHours: number;
}

interface ClosedTrade {
  symbol: string;
  realizedPnL: number;
  holdMs: number;
}

const HOUR_MS = 60 * 60 * 1000;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** In-memory summary of positions closed since startup. */
export class TradeStatistics {
  private closed: ClosedTrade[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  record(position: Position): void {
    this.closed.push({
      symbol: position.symbol,
      realizedPnL: position.realizedPnL,
      holdMs: Math.max(0, this.clock() - position.openedAt),
    });
  }

  summary(): TradeStats {
    const trades = this.closed;
    if (trades.length === 0) {
      return this.getEmptyStats();
    }

    const wins = trades.filter(trade => trade.realizedPnL > 0);
    const losses = trades.filter(trade => trade.realizedPnL < 0);
    const totalHold = trades.reduce((sum, trade) => sum + trade.holdMs, 0);

    return {
      totalTrades: trades.length,
      winningTrades: wins.length,
      losingTrades: losses.length,
      winRate: round((wins.length / trades.length) * 100, 1),
      totalPnL: round(trades.reduce((sum, trade) => sum + trade.realizedPnL, 0), 2),
      largestWin: round(Math.max(...wins.map(trade => trade.realizedPnL), 0), 2),
      largestLoss: round(Math.min(...losses.map(trade => trade.realizedPnL), 0), 2),
      averageHoldHours: round(totalHold / trades.length / HOUR_MS, 2),
    };
  }

  private getEmptyStats(): TradeStats {
    return {
      totalTrades: 0,
      winningTrades: 0,
      losingTrades: 0,
      winRate: 0,
      totalPnL: 0,
      largestWin: 0,
      largestLoss: 0,
      averageHoldHours: 0,
    };
  }
}

export default TradeStatistics;

export type Clock = () => number;
export type Sleeper = (ms: number) => Promise<void>;

export const systemClock: Clock = () => Date.now();

export const delay: Sleeper = (ms: number) =>
  new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));

/** UTC calendar day (YYYY-MM-DD) used as the trading-day boundary. */
export function tradingDayOf(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

import {
  OrderPlan,
  PlannedOrder,
  TakeProfitLevel,
  ValidatedTrade,
} from '../../types/trading';
import { MarketConstraints } from '../brokers/ExchangeCapability';
import { PlanningError } from './errors';

/** Take-profit levels used from the signal: 1st, 3rd and 5th. */
export const TAKE_PROFIT_INDICES: readonly number[] = [0, 2, 4];

const FALLBACK_PRICE_DECIMALS = 8;

export interface PlannerSettings {
  entryPriceTolerance: number;
  takeProfitOffset: number;
}

/** Number of decimals needed to print a step or tick size exactly. */
export function decimalsOf(step: number): number {
  let decimals = 0;
  while (decimals < 12) {
    const scaled = step * 10 ** decimals;
    if (Math.abs(Math.round(scaled) - scaled) < 1e-9) break;
    decimals++;
  }
  return decimals;
}

function toFixedNumber(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

export function floorToStep(value: number, step: number): number {
  if (step <= 0) return value;
  const units = Math.floor(value / step + 1e-9);
  return toFixedNumber(units * step, decimalsOf(step));
}

export function roundToTick(price: number, tick: number): number {
  if (tick <= 0) return toFixedNumber(price, FALLBACK_PRICE_DECIMALS);
  return toFixedNumber(Math.round(price / tick) * tick, decimalsOf(tick));
}

export function selectTakeProfits(takeProfits: readonly number[]): number[] {
  return TAKE_PROFIT_INDICES
    .filter(index => index < takeProfits.length)
    .map(index => takeProfits[index]);
}

function meetsMinimums(quantity: number, price: number, constraints: MarketConstraints): boolean {
  return quantity > 0 && quantity >= constraints.minQuantity && quantity * price >= constraints.minNotional;
}

/**
 * Split `quantity` across `prices` in equal step-rounded shares, the last
 * level taking the remainder. Levels are dropped from the far end until
 * every share meets the market minimums.
 */
function buildLadder(
  quantity: number,
  prices: readonly number[],
  constraints: MarketConstraints
): TakeProfitLevel[] {
  const step = constraints.stepSize > 0 ? constraints.stepSize : 10 ** -FALLBACK_PRICE_DECIMALS;
  const decimals = decimalsOf(step);
  const totalUnits = Math.floor(quantity / step + 1e-9);

  for (let count = prices.length; count > 0; count--) {
    const perUnits = Math.floor(totalUnits / count);
    const lastUnits = totalUnits - perUnits * (count - 1);
    const levels = prices.slice(0, count).map((price, index): TakeProfitLevel => {
      const units = index === count - 1 ? lastUnits : perUnits;
      const levelQuantity = toFixedNumber(units * step, decimals);
      return {
        level: TAKE_PROFIT_INDICES[index] + 1,
        price,
        quantity: levelQuantity,
        fraction: levelQuantity / quantity,
      };
    });

    if (levels.every(level => meetsMinimums(level.quantity, level.price, constraints))) {
      return levels;
    }
  }

  return [];
}

/**
 * Turn an accepted trade into concrete orders: a limit entry, a stop for
 * the full quantity and the take-profit ladder. Pure.
 */
export function plan(
  trade: ValidatedTrade,
  constraints: MarketConstraints,
  settings: PlannerSettings
): OrderPlan {
  const isLong = trade.direction === 'long';
  const tick = constraints.tickSize;

  const entryPrice = roundToTick(
    isLong
      ? trade.entryPrice * (1 - settings.entryPriceTolerance)
      : trade.entryPrice * (1 + settings.entryPriceTolerance),
    tick
  );
  const quantity = floorToStep(trade.positionSize / entryPrice, constraints.stepSize);
  if (!meetsMinimums(quantity, entryPrice, constraints)) {
    throw new PlanningError(
      'QUANTITY_TOO_SMALL',
      `Quantity ${quantity} ${trade.symbol} at ${entryPrice} is below the market minimums ` +
      `(min qty ${constraints.minQuantity}, min notional ${constraints.minNotional})`
    );
  }

  const selected = selectTakeProfits(trade.takeProfits).map(price =>
    roundToTick(
      isLong ? price * (1 - settings.takeProfitOffset) : price * (1 + settings.takeProfitOffset),
      tick
    )
  );
  if (selected.length === 0) {
    throw new PlanningError('NO_TAKE_PROFIT', `No take-profit level available for ${trade.symbol}`);
  }

  const takeProfits = buildLadder(quantity, selected, constraints);
  if (takeProfits.length === 0) {
    throw new PlanningError(
      'QUANTITY_TOO_SMALL',
      `Quantity ${quantity} ${trade.symbol} cannot fund a single take-profit order above the market minimums`
    );
  }

  const entry: PlannedOrder = { price: entryPrice, quantity };
  const stopLoss: PlannedOrder = { price: roundToTick(trade.stopLoss, tick), quantity };
  const base = {
    tradeId: trade.tradeId,
    symbol: trade.symbol,
    direction: trade.direction,
    side: isLong ? 'buy' as const : 'sell' as const,
    closeSide: isLong ? 'sell' as const : 'buy' as const,
    entry,
    stopLoss,
    takeProfits,
  };

  return trade.marketType === 'futures'
    ? { ...base, marketType: 'futures', leverage: trade.leverage }
    : { ...base, marketType: 'spot' };
}

/**
 * Re-fit protection to a partially filled entry. The stop covers what was
 * filled; the ladder keeps as many levels as the minimums allow, possibly none.
 */
export function resizePlan(orderPlan: OrderPlan, filledQuantity: number, constraints: MarketConstraints): OrderPlan {
  const quantity = floorToStep(filledQuantity, constraints.stepSize);
  return {
    ...orderPlan,
    entry: { ...orderPlan.entry, quantity },
    stopLoss: { ...orderPlan.stopLoss, quantity },
    takeProfits: buildLadder(quantity, orderPlan.takeProfits.map(level => level.price), constraints),
  };
}

export default plan;

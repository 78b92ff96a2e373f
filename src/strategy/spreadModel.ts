import { Decimal } from '../core/decimal.js';
import type { IndicatorSnapshot, InventoryState, SpreadResult } from './types.js';

export interface SpreadModelConfig {
  bidNatrScalar: Decimal;
  askNatrScalar: Decimal;
  /** Spread shift per unit of MACD histogram. */
  macdWeight: Decimal;
  /** Spread shift per unit of normalized inventory. */
  inventoryPhi: Decimal;
  maxInventory: Decimal;
  minSpread: Decimal;
}

const MINUS_ONE = Decimal.ONE.negated();

export const normalizeInventory = (balance: Decimal, maxInventory: Decimal): Decimal => {
  if (!maxInventory.isPositive()) {
    throw new RangeError('maxInventory must be positive');
  }
  return balance.div(maxInventory).clamp(MINUS_ONE, Decimal.ONE);
};

/**
 * Bid/ask spreads as fractions of the reference price.
 *
 * Stages apply in order, each adjusting the previous result:
 *   volatility base → trend skew → inventory penalty → floor
 */
export class SpreadModel {
  constructor(private readonly config: SpreadModelConfig) {}

  compute(snapshot: IndicatorSnapshot, inventory: InventoryState): SpreadResult {
    const { bidNatrScalar, askNatrScalar, macdWeight, inventoryPhi, maxInventory, minSpread } = this.config;

    const baseBid = snapshot.natr.times(bidNatrScalar);
    const baseAsk = snapshot.natr.times(askNatrScalar);

    // Bullish momentum pulls the bid in and pushes the ask out.
    const trendShift = macdWeight.times(snapshot.macdHist);
    let bid = baseBid.minus(trendShift);
    let ask = baseAsk.plus(trendShift);

    // Long inventory widens the bid and tightens the ask.
    const invNorm = normalizeInventory(inventory.baseBalance, maxInventory);
    const inventoryShift = inventoryPhi.times(invNorm);
    bid = bid.plus(inventoryShift);
    ask = ask.minus(inventoryShift);

    return {
      bidSpread: Decimal.max(bid, minSpread),
      askSpread: Decimal.max(ask, minSpread),
      invNorm,
      rawBidSpread: bid,
      rawAskSpread: ask
    };
  }
}

import { Decimal } from '../core/decimal.js';
import { parseTradingPair } from '../core/tradingPair.js';
import type { OrderIntent } from './connector.js';

/** Shrunk amounts are floored to this many fractional digits. */
export const AMOUNT_DIGITS = 8;

/**
 * Funding adjustment for a batch of order intents.
 *
 * Buys draw on the quote asset (amount × price), sells on the base asset.
 * Intents are funded in order, each one consuming what it uses, so two legs on
 * the same asset cannot both claim the same balance.
 *
 * With `allOrNone` any shortfall empties the batch. Without it each intent is
 * shrunk to what is affordable and dropped when nothing is.
 */
export const adjustForFunding = (
  intents: readonly OrderIntent[],
  available: (asset: string) => Decimal,
  allOrNone: boolean
): OrderIntent[] => {
  const remaining = new Map<string, Decimal>();
  const funds = (asset: string): Decimal =>
    remaining.get(asset) ?? Decimal.max(available(asset), Decimal.ZERO);

  const funded: OrderIntent[] = [];
  for (const intent of intents) {
    if (!intent.amount.isPositive() || !intent.price.isPositive()) {
      if (allOrNone) return [];
      continue;
    }

    const { base, quote } = parseTradingPair(intent.symbol);
    const asset = intent.side === 'buy' ? quote : base;
    const balance = funds(asset);
    const affordable = intent.side === 'buy' ? balance.div(intent.price) : balance;

    const amount = intent.amount.lte(affordable) ? intent.amount : affordable.truncate(AMOUNT_DIGITS);
    if (allOrNone && amount.lt(intent.amount)) return [];
    if (!amount.isPositive()) continue;

    const used = intent.side === 'buy' ? amount.times(intent.price) : amount;
    remaining.set(asset, Decimal.max(balance.minus(used), Decimal.ZERO));
    funded.push(amount === intent.amount ? intent : { ...intent, amount });
  }
  return funded;
};

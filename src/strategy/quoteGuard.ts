import { Decimal } from '../core/decimal.js';
import type { BookTop, QuotePair } from './types.js';

/**
 * Turns spreads into absolute prices around `refPrice`, then clips them so the
 * buy never sits above the best bid and the sell never below the best ask.
 *
 * A crossed external book gets the same literal clip; the pair is flagged so
 * the caller can report it.
 */
export const deriveQuotes = (
  refPrice: Decimal,
  spreads: { bidSpread: Decimal; askSpread: Decimal },
  book: BookTop
): QuotePair => {
  const rawBuy = refPrice.times(Decimal.ONE.minus(spreads.bidSpread));
  const rawSell = refPrice.times(Decimal.ONE.plus(spreads.askSpread));

  return {
    buyPrice: Decimal.min(rawBuy, book.bestBid),
    sellPrice: Decimal.max(rawSell, book.bestAsk),
    crossedBook: book.bestBid.gt(book.bestAsk)
  };
};

import type { Decimal } from '../core/decimal.js';
import type { Side } from '../core/types.js';

export type PriceType = 'mid' | 'best_bid' | 'best_ask' | 'last';

export interface OrderIntent {
  symbol: string;
  side: Side;
  amount: Decimal;
  price: Decimal;
}

export interface OpenOrder extends OrderIntent {
  orderId: string;
  filled: Decimal;
}

export interface FillEvent {
  orderId: string;
  symbol: string;
  side: Side;
  amount: Decimal;
  price: Decimal;
  time: number;
}

export type FillListener = (event: FillEvent) => void;

/**
 * Everything the quoting cycle needs from a venue.
 *
 * Reads are served from the snapshot taken by the last `sync()`; only order
 * cancellation and submission go to the venue during a cycle.
 */
export interface TradingConnector {
  readonly name: string;
  sync(): Promise<void>;
  isReady(): boolean;
  /** Total holding of `asset`, including amounts locked in open orders. */
  getBalance(asset: string): Decimal;
  getPriceByType(symbol: string, type: PriceType): Decimal;
  listOpenOrders(symbol: string): OpenOrder[];
  cancelOrder(symbol: string, orderId: string): Promise<void>;
  /** Shrinks or drops intents that the available balances cannot fund. */
  adjustForFunding(intents: readonly OrderIntent[], allOrNone: boolean): OrderIntent[];
  submitBuy(symbol: string, amount: Decimal, price: Decimal): Promise<string>;
  submitSell(symbol: string, amount: Decimal, price: Decimal): Promise<string>;
  onFill(listener: FillListener): void;
}

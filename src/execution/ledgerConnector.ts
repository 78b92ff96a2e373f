import * as crypto from 'node:crypto';
import { Decimal } from '../core/decimal.js';
import { AppError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { parseTradingPair } from '../core/tradingPair.js';
import type { Side } from '../core/types.js';
import { BalanceLedger } from './balanceLedger.js';
import { adjustForFunding } from './budgetChecker.js';
import type {
  FillEvent,
  FillListener,
  OpenOrder,
  OrderIntent,
  PriceType,
  TradingConnector
} from './connector.js';

export interface BookSnapshot {
  bid: Decimal;
  ask: Decimal;
  last: Decimal;
  time: number;
}

/**
 * Shared state for connectors: cached top of book, balances with order
 * reservations, tracked open orders and fill listeners. Subclasses decide how
 * orders reach the venue and how `sync()` refreshes the snapshot.
 */
export abstract class LedgerConnector implements TradingConnector {
  protected readonly ledger = new BalanceLedger();
  protected readonly books = new Map<string, BookSnapshot>();
  protected readonly openOrders = new Map<string, OpenOrder>();
  protected ready = false;
  private readonly listeners: FillListener[] = [];

  constructor(
    readonly name: string,
    protected readonly symbols: readonly string[],
    protected readonly logger: Logger,
    protected readonly metrics: Metrics
  ) {}

  abstract sync(): Promise<void>;
  protected abstract placeLimit(intent: OrderIntent, clientOrderId: string): Promise<string>;
  protected abstract cancelRemote(order: OpenOrder): Promise<void>;

  isReady(): boolean {
    return this.ready && this.symbols.every((s) => this.books.has(s));
  }

  getBalance(asset: string): Decimal {
    return this.ledger.total(asset);
  }

  getPriceByType(symbol: string, type: PriceType): Decimal {
    const book = this.books.get(symbol);
    if (!book) {
      throw new AppError(`no market data for ${symbol}`, 'MARKET_DATA_UNAVAILABLE', { symbol, connector: this.name });
    }
    switch (type) {
      case 'best_bid':
        return book.bid;
      case 'best_ask':
        return book.ask;
      case 'last':
        return book.last;
      case 'mid':
        return book.bid.plus(book.ask).div(2);
    }
  }

  listOpenOrders(symbol: string): OpenOrder[] {
    return [...this.openOrders.values()].filter((o) => o.symbol === symbol);
  }

  async cancelOrder(symbol: string, orderId: string): Promise<void> {
    const order = this.openOrders.get(orderId);
    if (!order || order.symbol !== symbol) {
      this.logger.debug('cancel skipped, order not tracked', { symbol, orderId });
      return;
    }
    await this.cancelRemote(order);
    this.openOrders.delete(orderId);
    this.ledger.release(orderId);
    this.metrics.increment('connector.cancel');
  }

  adjustForFunding(intents: readonly OrderIntent[], allOrNone: boolean): OrderIntent[] {
    return adjustForFunding(intents, (asset) => this.ledger.available(asset), allOrNone);
  }

  submitBuy(symbol: string, amount: Decimal, price: Decimal): Promise<string> {
    return this.submit({ symbol, side: 'buy', amount, price });
  }

  submitSell(symbol: string, amount: Decimal, price: Decimal): Promise<string> {
    return this.submit({ symbol, side: 'sell', amount, price });
  }

  onFill(listener: FillListener): void {
    this.listeners.push(listener);
  }

  balances(): ReturnType<BalanceLedger['snapshot']> {
    return this.ledger.snapshot();
  }

  protected createClientOrderId(symbol: string, side: Side): string {
    return `${symbol}-${side}-${Date.now()}-${crypto.randomUUID().slice(0, 8)}`;
  }

  protected async submit(intent: OrderIntent): Promise<string> {
    const orderId = await this.placeLimit(intent, this.createClientOrderId(intent.symbol, intent.side));
    this.track({ ...intent, orderId, filled: Decimal.ZERO });
    this.metrics.increment(`connector.submit.${intent.side}`);
    return orderId;
  }

  protected track(order: OpenOrder): void {
    this.openOrders.set(order.orderId, order);
    this.reserveRemaining(order);
  }

  /**
   * Records `amount` more filled on a tracked order and notifies listeners.
   * With `settle` the ledger balances move as well; connectors that re-read
   * balances from the venue pass false.
   */
  protected recordFill(order: OpenOrder, amount: Decimal, price: Decimal, time: number, settle: boolean): void {
    if (!amount.isPositive()) return;

    if (settle) {
      const { base, quote } = parseTradingPair(order.symbol);
      const notional = amount.times(price);
      if (order.side === 'buy') {
        this.ledger.credit(base, amount);
        this.ledger.debit(quote, notional);
      } else {
        this.ledger.debit(base, amount);
        this.ledger.credit(quote, notional);
      }
    }

    const updated: OpenOrder = { ...order, filled: order.filled.plus(amount) };
    if (updated.filled.gte(updated.amount)) {
      this.openOrders.delete(order.orderId);
      this.ledger.release(order.orderId);
    } else {
      this.track(updated);
    }

    this.metrics.increment(`connector.fill.${order.side}`);
    this.emitFill({ orderId: order.orderId, symbol: order.symbol, side: order.side, amount, price, time });
  }

  private reserveRemaining(order: OpenOrder): void {
    const { base, quote } = parseTradingPair(order.symbol);
    const remaining = Decimal.max(order.amount.minus(order.filled), Decimal.ZERO);
    if (order.side === 'buy') {
      this.ledger.reserve(order.orderId, quote, remaining.times(order.price));
    } else {
      this.ledger.reserve(order.orderId, base, remaining);
    }
  }

  private emitFill(event: FillEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error('fill listener failed', { orderId: event.orderId, err: String(err) });
      }
    }
  }
}

import * as crypto from 'node:crypto';
import { Decimal } from '../core/decimal.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { ExchangeAdapter } from '../exchanges/adapter.js';
import type { OpenOrder, OrderIntent } from './connector.js';
import { LedgerConnector, type BookSnapshot } from './ledgerConnector.js';

export interface PaperConnectorOptions {
  symbols: readonly string[];
  balances: ReadonlyMap<string, Decimal>;
}

/**
 * Paper trading against a real ticker.
 *
 * Limit orders rest locally and fill in full at their own price once the
 * market trades through them: a buy when the best ask drops to it, a sell when
 * the best bid rises to it. An order that is already marketable when placed
 * fills immediately.
 */
export class PaperConnector extends LedgerConnector {
  constructor(
    private readonly market: ExchangeAdapter,
    options: PaperConnectorOptions,
    logger: Logger,
    metrics: Metrics
  ) {
    super(`${market.id}_paper_trade`, options.symbols, logger, metrics);
    for (const [asset, amount] of options.balances) {
      this.ledger.setTotal(asset, amount);
    }
  }

  async sync(): Promise<void> {
    try {
      for (const symbol of this.symbols) {
        const ticker = await this.market.getTicker(symbol);
        this.books.set(symbol, {
          bid: Decimal.fromNumber(ticker.bid),
          ask: Decimal.fromNumber(ticker.ask),
          last: Decimal.fromNumber(ticker.last),
          time: ticker.time
        });
      }
      this.ready = true;
    } catch (err) {
      this.ready = false;
      this.logger.warn('paper market sync failed', { connector: this.name, err: String(err) });
      this.metrics.increment('connector.sync.error');
      return;
    }

    for (const order of [...this.openOrders.values()]) {
      this.matchAgainstBook(order);
    }
  }

  protected async placeLimit(_intent: OrderIntent, _clientOrderId: string): Promise<string> {
    return `paper-${crypto.randomUUID()}`;
  }

  protected async cancelRemote(_order: OpenOrder): Promise<void> {
    // Resting paper orders only exist locally.
  }

  protected override async submit(intent: OrderIntent): Promise<string> {
    const orderId = await super.submit(intent);
    const order = this.openOrders.get(orderId);
    if (order) this.matchAgainstBook(order);
    return orderId;
  }

  private matchAgainstBook(order: OpenOrder): void {
    const book: BookSnapshot | undefined = this.books.get(order.symbol);
    if (!book) return;
    const marketable = order.side === 'buy' ? book.ask.lte(order.price) : book.bid.gte(order.price);
    if (!marketable) return;
    const remaining = order.amount.minus(order.filled);
    this.recordFill(order, remaining, order.price, book.time, true);
  }
}

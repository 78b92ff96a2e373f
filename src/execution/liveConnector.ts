import { Decimal } from '../core/decimal.js';
import { ExecutionError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { Balance, Order } from '../core/types.js';
import type { ExchangeAdapter } from '../exchanges/adapter.js';
import type { OpenOrder, OrderIntent } from './connector.js';
import { LedgerConnector } from './ledgerConnector.js';

const filledOf = (order: Order): Decimal => Decimal.fromNumber(order.filledQuantity);

const venueLockKey = (asset: string): string => `venue-locked:${asset.toUpperCase()}`;

/**
 * Connector backed by a real exchange account.
 *
 * `sync()` pulls tickers, balances and open orders, then reconciles tracked
 * orders against what the venue reports: fill deltas are emitted, orders that
 * left the book are looked up once and dropped, and resting orders on a quoted
 * symbol that this process did not place are adopted so they get canceled.
 *
 * Totals are `free + locked`. Whatever the venue locks beyond this process's
 * own reservations is reserved under a per-asset key, so available funds never
 * exceed the venue's `free`.
 */
export class LiveConnector extends LedgerConnector {
  constructor(
    private readonly exchange: ExchangeAdapter,
    symbols: readonly string[],
    logger: Logger,
    metrics: Metrics
  ) {
    super(exchange.id, symbols, logger, metrics);
  }

  async sync(): Promise<void> {
    try {
      for (const symbol of this.symbols) {
        const ticker = await this.exchange.getTicker(symbol);
        this.books.set(symbol, {
          bid: Decimal.fromNumber(ticker.bid),
          ask: Decimal.fromNumber(ticker.ask),
          last: Decimal.fromNumber(ticker.last),
          time: ticker.time
        });
      }

      const balances = await this.exchange.getBalances();
      for (const symbol of this.symbols) {
        await this.reconcileSymbol(symbol);
      }
      this.applyBalances(balances);
      this.ready = true;
    } catch (err) {
      this.ready = false;
      this.logger.warn('live account sync failed', { connector: this.name, err: String(err) });
      this.metrics.increment('connector.sync.error');
    }
  }

  protected async placeLimit(intent: OrderIntent, clientOrderId: string): Promise<string> {
    try {
      const order = await this.exchange.placeOrder({
        symbol: intent.symbol,
        side: intent.side,
        type: 'limit',
        quantity: intent.amount.toNumber(),
        price: intent.price.toNumber(),
        clientOrderId
      });
      if (order.status === 'rejected') {
        throw new ExecutionError('order rejected by exchange', { clientOrderId, orderId: order.orderId });
      }
      return order.orderId;
    } catch (err) {
      if (err instanceof ExecutionError) throw err;
      throw new ExecutionError(`order placement failed: ${String(err)}`, {
        symbol: intent.symbol,
        side: intent.side,
        clientOrderId
      });
    }
  }

  protected async cancelRemote(order: OpenOrder): Promise<void> {
    try {
      await this.exchange.cancelOrder(order.orderId, order.symbol);
    } catch (err) {
      throw new ExecutionError(`order cancel failed: ${String(err)}`, {
        symbol: order.symbol,
        orderId: order.orderId
      });
    }
  }

  private async reconcileSymbol(symbol: string): Promise<void> {
    const remoteOpen = await this.exchange.listOpenOrders(symbol);
    const remoteById = new Map(remoteOpen.map((o) => [o.orderId, o]));

    const tracked = this.listOpenOrders(symbol);
    const known = new Set(tracked.map((o) => o.orderId));

    for (const local of tracked) {
      const remote = remoteById.get(local.orderId);
      if (remote) {
        this.applyRemoteFill(local, remote);
        continue;
      }

      try {
        const latest = await this.exchange.getOrder(local.orderId, symbol);
        this.applyRemoteFill(local, latest);
        this.metrics.increment('reconciler.order_updated');
      } catch (err) {
        this.logger.warn('reconciliation lookup failed', { symbol, orderId: local.orderId, err: String(err) });
        this.metrics.increment('reconciler.errors');
      }
      this.forget(local.orderId);
    }

    for (const remote of remoteOpen) {
      if (known.has(remote.orderId) || remote.price === undefined) continue;
      this.track({
        orderId: remote.orderId,
        symbol,
        side: remote.side,
        amount: Decimal.fromNumber(remote.quantity),
        price: Decimal.fromNumber(remote.price),
        filled: filledOf(remote)
      });
      this.logger.info('venue order adopted', { symbol, orderId: remote.orderId, side: remote.side });
      this.metrics.increment('reconciler.order_adopted');
    }
  }

  private applyBalances(balances: readonly Balance[]): void {
    for (const balance of balances) {
      const key = venueLockKey(balance.asset);
      const locked = Decimal.fromNumber(balance.locked);
      this.ledger.release(key);
      this.ledger.setTotal(balance.asset, Decimal.fromNumber(balance.free).plus(locked));
      const untracked = locked.minus(this.ledger.reserved(balance.asset));
      if (untracked.isPositive()) {
        this.ledger.reserve(key, balance.asset, untracked);
      }
    }
  }

  private applyRemoteFill(local: OpenOrder, remote: Order): void {
    const delta = filledOf(remote).minus(local.filled);
    if (!delta.isPositive()) return;
    const price = remote.avgFillPrice !== undefined ? Decimal.fromNumber(remote.avgFillPrice) : local.price;
    this.recordFill(local, delta, price, remote.updatedAt, false);
  }

  private forget(orderId: string): void {
    this.openOrders.delete(orderId);
    this.ledger.release(orderId);
  }
}

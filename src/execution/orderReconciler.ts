/**
 * OrderReconciler replaces the instrument's resting orders with a fresh pair.
 *
 *   cancel all open → BUY@buyPrice + SELL@sellPrice → funding adjustment → submit
 *
 * Legs are funded independently: a leg the account cannot fund is shrunk or
 * dropped without affecting the other. Venue failures propagate to the caller
 * as-is; nothing is retried and an already-submitted leg is not rolled back.
 */

import type { Decimal } from '../core/decimal.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { Side } from '../core/types.js';
import type { QuotePair } from '../strategy/types.js';
import type { OrderIntent, TradingConnector } from './connector.js';

export interface ReconcilerConfig {
  symbol: string;
  orderAmount: Decimal;
}

export interface SubmittedOrder {
  side: Side;
  orderId: string;
  amount: Decimal;
  price: Decimal;
}

export interface ReconcileResult {
  canceled: string[];
  submitted: SubmittedOrder[];
  dropped: Side[];
}

export class OrderReconciler {
  constructor(
    private readonly connector: TradingConnector,
    private readonly config: ReconcilerConfig,
    private readonly logger: Logger,
    private readonly metrics: Metrics
  ) {}

  async reconcile(quotes: QuotePair): Promise<ReconcileResult> {
    const { symbol, orderAmount } = this.config;
    const result: ReconcileResult = { canceled: [], submitted: [], dropped: [] };

    // ── Cancel ──
    for (const order of this.connector.listOpenOrders(symbol)) {
      await this.connector.cancelOrder(symbol, order.orderId);
      result.canceled.push(order.orderId);
      this.metrics.increment('orders.canceled');
    }

    // ── Build + fund ──
    const intents: OrderIntent[] = [
      { symbol, side: 'buy', amount: orderAmount, price: quotes.buyPrice },
      { symbol, side: 'sell', amount: orderAmount, price: quotes.sellPrice }
    ];
    const funded = this.connector.adjustForFunding(intents, false);

    for (const side of ['buy', 'sell'] as const) {
      const leg = funded.find((i) => i.side === side);
      if (!leg || !leg.amount.isPositive()) {
        result.dropped.push(side);
        this.metrics.increment('orders.leg_dropped');
        this.logger.info('order leg dropped, insufficient funds', { symbol, side });
      }
    }

    // ── Submit ──
    for (const intent of funded) {
      if (!intent.amount.isPositive()) continue;
      const orderId =
        intent.side === 'buy'
          ? await this.connector.submitBuy(symbol, intent.amount, intent.price)
          : await this.connector.submitSell(symbol, intent.amount, intent.price);
      result.submitted.push({ side: intent.side, orderId, amount: intent.amount, price: intent.price });
      this.metrics.increment('orders.submitted');
    }

    return result;
  }
}

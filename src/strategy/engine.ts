import type { AlertService } from '../alerts/interface.js';
import { Decimal } from '../core/decimal.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { parseTradingPair } from '../core/tradingPair.js';
import type { CandleSource } from '../data/candleFeed.js';
import type { FillEvent, TradingConnector } from '../execution/connector.js';
import type { OrderReconciler } from '../execution/orderReconciler.js';
import type { IndicatorEngine } from './indicatorEngine.js';
import { deriveQuotes } from './quoteGuard.js';
import type { SpreadModel } from './spreadModel.js';
import type { CycleResult, StrategyStatusMetrics } from './types.js';

const BPS = Decimal.from(10_000);

export interface MarketMakingDeps {
  symbol: string;
  candles: CandleSource;
  connector: TradingConnector;
  indicators: IndicatorEngine;
  spreads: SpreadModel;
  reconciler: OrderReconciler;
  alert: AlertService;
  logger: Logger;
  metrics: Metrics;
}

/**
 * One quoting cycle:
 *
 *   candle window → indicators → spreads (+ inventory) → quotes → reconcile
 *
 * Not-ready indicator data ends the cycle quietly; the scheduler retries on its
 * next invocation.
 */
export class MarketMakingStrategy {
  private status: StrategyStatusMetrics = {
    bidSpread: Decimal.ZERO,
    askSpread: Decimal.ZERO,
    invNorm: Decimal.ZERO
  };
  private readonly base: string;

  constructor(private readonly deps: MarketMakingDeps) {
    this.base = parseTradingPair(deps.symbol).base;
  }

  async runCycle(): Promise<CycleResult> {
    const { symbol, candles, connector, indicators, spreads, reconciler, logger, metrics } = this.deps;

    const indicatorResult = indicators.compute(candles.getCandleWindow());
    if (indicatorResult.status === 'not_ready') {
      metrics.increment(`cycle.skipped.${indicatorResult.reason}`);
      return { kind: 'skipped', reason: indicatorResult.reason };
    }

    const spreadResult = spreads.compute(indicatorResult.snapshot, {
      baseBalance: connector.getBalance(this.base)
    });
    // Status reports the model's spreads before the min-spread floor.
    this.status = {
      bidSpread: spreadResult.rawBidSpread,
      askSpread: spreadResult.rawAskSpread,
      invNorm: spreadResult.invNorm
    };
    metrics.gauge('quote.bid_spread_bps', spreadResult.rawBidSpread.times(BPS).toNumber());
    metrics.gauge('quote.ask_spread_bps', spreadResult.rawAskSpread.times(BPS).toNumber());
    metrics.gauge('quote.inv_norm', spreadResult.invNorm.toNumber());

    const refPrice = connector.getPriceByType(symbol, 'mid');
    const quotes = deriveQuotes(refPrice, spreadResult, {
      bestBid: connector.getPriceByType(symbol, 'best_bid'),
      bestAsk: connector.getPriceByType(symbol, 'best_ask')
    });
    if (quotes.crossedBook) {
      logger.warn('external book is crossed, quotes clipped as-is', {
        symbol,
        buyPrice: quotes.buyPrice,
        sellPrice: quotes.sellPrice
      });
      metrics.increment('cycle.crossed_book');
    }

    const reconcile = await reconciler.reconcile(quotes);
    metrics.increment('cycle.quoted');
    logger.info('quotes refreshed', {
      symbol,
      natr: indicatorResult.snapshot.natr,
      macdHist: indicatorResult.snapshot.macdHist,
      bidSpread: spreadResult.bidSpread,
      askSpread: spreadResult.askSpread,
      invNorm: spreadResult.invNorm,
      refPrice,
      buyPrice: quotes.buyPrice,
      sellPrice: quotes.sellPrice,
      canceled: reconcile.canceled.length,
      submitted: reconcile.submitted.length,
      dropped: reconcile.dropped
    });

    return { kind: 'quoted', spreads: spreadResult, quotes, reconcile };
  }

  getStatusMetrics(): StrategyStatusMetrics {
    return this.status;
  }

  formatStatus(): string {
    if (!this.deps.connector.isReady()) {
      return 'Market connectors are not ready.';
    }
    const { bidSpread, askSpread, invNorm } = this.status;
    return [
      `Bid spread: ${bidSpread.times(BPS).toFixed(2)} bps`,
      `Ask spread: ${askSpread.times(BPS).toFixed(2)} bps`,
      `Inv norm: ${invNorm.toFixed(3)}`
    ].join(' | ');
  }

  async onOrderFilled(event: FillEvent): Promise<void> {
    const message = `${event.side.toUpperCase()} ${event.amount.toFixed(4)} ${event.symbol} @ ${event.price.toFixed(2)}`;
    this.deps.logger.info('order filled', { orderId: event.orderId, message });
    await this.deps.alert.notify('Order filled', message, { orderId: event.orderId, symbol: event.symbol });
  }
}

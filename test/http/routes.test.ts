import { beforeEach, describe, expect, it } from 'vitest';
import { configSchema } from '../../src/config/schema.js';
import { InMemoryMetrics } from '../../src/core/metrics.js';
import { PrometheusMetrics } from '../../src/core/prometheusMetrics.js';
import { CandleFeed } from '../../src/data/candleFeed.js';
import { OrderReconciler } from '../../src/execution/orderReconciler.js';
import { handleRoute, type RouteContext } from '../../src/http/routes.js';
import { TradingLoops } from '../../src/jobs/loops.js';
import { TickScheduler } from '../../src/jobs/tickScheduler.js';
import { MarketMakingStrategy } from '../../src/strategy/engine.js';
import { IndicatorEngine } from '../../src/strategy/indicatorEngine.js';
import { SpreadModel } from '../../src/strategy/spreadModel.js';
import { createMockAlert, createMockLogger, FakeConnector, FakeExchange } from '../helpers.js';

const buildContext = (metrics: PrometheusMetrics | InMemoryMetrics): RouteContext => {
  const config = configSchema.parse({});
  const logger = createMockLogger();
  const connector = new FakeConnector();
  const feed = new CandleFeed(new FakeExchange(), { symbol: 'ETH-USDT', interval: '1m', maxRecords: 100 }, logger, metrics);
  const strategy = new MarketMakingStrategy({
    symbol: 'ETH-USDT',
    candles: feed,
    connector,
    indicators: new IndicatorEngine(config.indicators),
    spreads: new SpreadModel(config.spreads),
    reconciler: new OrderReconciler(connector, { symbol: 'ETH-USDT', orderAmount: config.trading.orderAmount }, logger, metrics),
    alert: createMockAlert(),
    logger,
    metrics
  });
  const ticks = new TickScheduler(connector, strategy, config.trading.refreshIntervalMs, logger, metrics);
  const loops = new TradingLoops(feed, connector, ticks, strategy, logger);
  return { config, logger, metrics, loops, strategy, connector, startedAt: 1_000, now: () => 6_000 };
};

describe('http routes', () => {
  let ctx: RouteContext;

  beforeEach(() => {
    ctx = buildContext(new InMemoryMetrics());
  });

  it('reports health', () => {
    const res = handleRoute('GET', '/health', ctx);
    expect(res.status).toBe(200);
    expect(JSON.parse(res.body)).toEqual({
      ok: true,
      mode: 'paper',
      exchange: 'binance',
      connectorReady: true,
      uptime: 5
    });
  });

  it('reports quoting status', async () => {
    await ctx.loops.tickLoop(() => 20_000);
    const body: unknown = JSON.parse(handleRoute('GET', '/status?verbose=1', ctx).body);
    expect(body).toMatchObject({
      symbol: 'ETH-USDT',
      connector: 'fake_connector',
      summary: 'Bid spread: 0.00 bps | Ask spread: 0.00 bps | Inv norm: 0.000',
      bidSpread: '0',
      lastTickAt: 20_000,
      lastOutcome: 'cycle',
      cycles: 1,
      failedCycles: 0,
      lastCandleTime: null
    });
  });

  it('renders prometheus metrics when available', () => {
    const metrics = new PrometheusMetrics();
    metrics.increment('orders.submitted', 2);
    const res = handleRoute('GET', '/metrics', buildContext(metrics));
    expect(res.contentType).toBe('text/plain; version=0.0.4');
    expect(res.body).toBe('# TYPE spreadsmith_orders_submitted counter\nspreadsmith_orders_submitted 2\n');
  });

  it('falls back to a JSON snapshot', () => {
    if (ctx.metrics instanceof InMemoryMetrics) ctx.metrics.increment('cycle.quoted');
    const res = handleRoute('GET', '/metrics', ctx);
    expect(JSON.parse(res.body)).toEqual({ counters: { 'cycle.quoted': 1 }, gauges: {} });
  });

  it('answers unknown paths and methods', () => {
    expect(handleRoute('GET', '/nope', ctx).status).toBe(404);
    expect(handleRoute('POST', '/health', ctx).status).toBe(405);
  });
});

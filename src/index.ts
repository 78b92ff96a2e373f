import http from 'node:http';
import { loadConfig } from './config/load.js';
import { ConsoleAlertService } from './alerts/console.js';
import { ConfigError } from './core/errors.js';
import { JsonLogger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { PrometheusMetrics } from './core/prometheusMetrics.js';
import { CandleFeed } from './data/candleFeed.js';
import { CCXTAdapter } from './exchanges/ccxt/adapter.js';
import type { ExchangeAdapter } from './exchanges/adapter.js';
import { LiveConnector } from './execution/liveConnector.js';
import { OrderReconciler } from './execution/orderReconciler.js';
import { PaperConnector } from './execution/paperConnector.js';
import type { LedgerConnector } from './execution/ledgerConnector.js';
import { createRequestHandler } from './http/routes.js';
import { TradingLoops } from './jobs/loops.js';
import { Scheduler } from './jobs/scheduler.js';
import { TickScheduler } from './jobs/tickScheduler.js';
import { MarketMakingStrategy } from './strategy/engine.js';
import { IndicatorEngine } from './strategy/indicatorEngine.js';
import { SpreadModel } from './strategy/spreadModel.js';

const main = async (): Promise<void> => {
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel);
  const metrics = config.nodeEnv === 'test' ? new InMemoryMetrics() : new PrometheusMetrics();
  const startedAt = Date.now();
  const { symbol } = config.trading;

  if (config.mode === 'live' && !config.allowLiveTrading) {
    throw new ConfigError('live mode requires ALLOW_LIVE_TRADING=true');
  }

  // ── Exchanges ──
  const candleExchange: ExchangeAdapter = new CCXTAdapter({ exchange: config.candles.exchange });

  let connector: LedgerConnector;
  if (config.mode === 'live') {
    const tradingExchange = new CCXTAdapter({
      exchange: config.exchange.id,
      apiKey: config.exchange.apiKey,
      secret: config.exchange.apiSecret
    });
    connector = new LiveConnector(tradingExchange, [symbol], logger.child({ component: 'connector' }), metrics);
  } else {
    const market =
      config.exchange.id === config.candles.exchange
        ? candleExchange
        : new CCXTAdapter({ exchange: config.exchange.id });
    connector = new PaperConnector(
      market,
      { symbols: [symbol], balances: config.paper.balances },
      logger.child({ component: 'connector' }),
      metrics
    );
  }

  // ── Quoting pipeline ──
  const feed = new CandleFeed(
    candleExchange,
    { symbol, interval: config.candles.interval, maxRecords: config.candles.maxRecords },
    logger.child({ component: 'candles' }),
    metrics
  );
  const alert = new ConsoleAlertService();
  const strategyLogger = logger.child({ component: 'strategy' });
  const strategy = new MarketMakingStrategy({
    symbol,
    candles: feed,
    connector,
    indicators: new IndicatorEngine(config.indicators),
    spreads: new SpreadModel(config.spreads),
    reconciler: new OrderReconciler(
      connector,
      { symbol, orderAmount: config.trading.orderAmount },
      logger.child({ component: 'reconciler' }),
      metrics
    ),
    alert,
    logger: strategyLogger,
    metrics
  });
  connector.onFill((event) => {
    void strategy.onOrderFilled(event).catch((err: unknown) => {
      strategyLogger.error('fill notification failed', { orderId: event.orderId, err: String(err) });
    });
  });

  const ticks = new TickScheduler(
    connector,
    strategy,
    config.trading.refreshIntervalMs,
    logger.child({ component: 'tick' }),
    metrics
  );
  const loops = new TradingLoops(feed, connector, ticks, strategy, logger);

  // ── Jobs ──
  const scheduler = new Scheduler(logger);
  scheduler.add('candles', config.candles.pollIntervalMs, async () => loops.candleLoop());
  scheduler.add('tick', config.trading.tickIntervalMs, async () => loops.tickLoop());
  scheduler.add('status', config.statusLogIntervalMs, async () => loops.statusLoop());
  scheduler.run('candles');

  const server = http.createServer(
    createRequestHandler({ config, logger, metrics, loops, strategy, connector, startedAt })
  );

  server.listen(config.httpPort, () => {
    logger.info('service started', {
      port: config.httpPort,
      mode: config.mode,
      exchange: config.exchange.id,
      connector: connector.name,
      symbol,
      requiredCandles: Math.max(
        config.indicators.natrLength,
        config.indicators.macdSlow + config.indicators.macdSignal
      )
    });
  });

  const shutdown = (): void => {
    logger.info('shutdown initiated');
    scheduler.shutdown();
    server.close(() => {
      logger.info('http server closed');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

void main().catch((err) => {
  process.stderr.write(`Fatal startup error: ${String(err)}\n`);
  process.exit(1);
});

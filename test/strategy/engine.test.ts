import { beforeEach, describe, expect, it } from 'vitest';
import { Decimal } from '../../src/core/decimal.js';
import type { Candle } from '../../src/core/types.js';
import { OrderReconciler } from '../../src/execution/orderReconciler.js';
import { MarketMakingStrategy } from '../../src/strategy/engine.js';
import { IndicatorEngine } from '../../src/strategy/indicatorEngine.js';
import { SpreadModel } from '../../src/strategy/spreadModel.js';
import { createMockAlert, createMockLogger, createMockMetrics, d, FakeConnector, makeFlatCandles } from '../helpers.js';

describe('MarketMakingStrategy', () => {
  let window: Candle[];
  let connector: FakeConnector;
  let logger: ReturnType<typeof createMockLogger>;
  let metrics: ReturnType<typeof createMockMetrics>;
  let alert: ReturnType<typeof createMockAlert>;
  let strategy: MarketMakingStrategy;

  beforeEach(() => {
    window = makeFlatCandles(60);
    connector = new FakeConnector();
    connector.balances = new Map([['ETH', d('0.5')], ['USDT', d('10000')]]);
    logger = createMockLogger();
    metrics = createMockMetrics();
    alert = createMockAlert();
    strategy = new MarketMakingStrategy({
      symbol: 'ETH-USDT',
      candles: { getCandleWindow: () => window },
      connector,
      indicators: new IndicatorEngine({ natrLength: 30, macdFast: 12, macdSlow: 26, macdSignal: 9 }),
      spreads: new SpreadModel({
        bidNatrScalar: d('0.012'),
        askNatrScalar: d('0.006'),
        macdWeight: d('0.5'),
        inventoryPhi: d('0.01'),
        maxInventory: d('1'),
        minSpread: d('0.00001')
      }),
      reconciler: new OrderReconciler(connector, { symbol: 'ETH-USDT', orderAmount: d('0.01') }, logger, metrics),
      alert,
      logger,
      metrics
    });
  });

  it('quotes both legs from indicators and inventory', async () => {
    const result = await strategy.runCycle();

    expect(result.kind).toBe('quoted');
    if (result.kind !== 'quoted') return;
    // natr 0.02 → base bid 0.00024; inventory 0.5 adds 0.005; ask floors at the minimum.
    expect(result.spreads.bidSpread.toString()).toBe('0.00524');
    expect(result.spreads.askSpread.toString()).toBe('0.00001');
    expect(result.quotes.buyPrice.toString()).toBe('1989.52');
    expect(result.quotes.sellPrice.toString()).toBe('2001');
    expect(connector.calls).toEqual([
      { op: 'buy', amount: '0.01', price: '1989.52' },
      { op: 'sell', amount: '0.01', price: '2001' }
    ]);
    expect(logger.records.filter((r) => r.message === 'quotes refreshed')).toHaveLength(1);
  });

  it('records status metrics and gauges before the min-spread floor', async () => {
    await strategy.runCycle();
    // ask: 0.00012 - 0.005 inventory shift; quoted at the floor, reported raw.
    expect(strategy.formatStatus()).toBe('Bid spread: 52.40 bps | Ask spread: -48.80 bps | Inv norm: 0.500');
    expect(strategy.getStatusMetrics().askSpread.toString()).toBe('-0.00488');
    expect(strategy.getStatusMetrics().invNorm.toString()).toBe('0.5');
    expect(metrics.gauges.get('quote.bid_spread_bps')).toBe(52.4);
    expect(metrics.gauges.get('quote.ask_spread_bps')).toBe(-48.8);
    expect(metrics.gauges.get('quote.inv_norm')).toBe(0.5);
  });

  it('does nothing on insufficient history', async () => {
    window = makeFlatCandles(10);
    connector.open = [
      { orderId: 'old-1', symbol: 'ETH-USDT', side: 'buy', amount: d('0.01'), price: d('1990'), filled: Decimal.ZERO }
    ];
    const result = await strategy.runCycle();

    expect(result).toEqual({ kind: 'skipped', reason: 'insufficient_history' });
    expect(connector.calls).toEqual([]);
    expect(metrics.counters.get('cycle.skipped.insufficient_history')).toBe(1);
    expect(logger.records).toEqual([]);
  });

  it('warns when the external book is crossed', async () => {
    connector.prices = { ...connector.prices, best_bid: d('2002'), best_ask: d('1998') };
    const result = await strategy.runCycle();
    expect(result.kind === 'quoted' && result.quotes.crossedBook).toBe(true);
    expect(logger.records.some((r) => r.level === 'warn' && r.message === 'external book is crossed, quotes clipped as-is')).toBe(true);
  });

  it('reports zeroed metrics before the first cycle', () => {
    expect(strategy.formatStatus()).toBe('Bid spread: 0.00 bps | Ask spread: 0.00 bps | Inv norm: 0.000');
  });

  it('reports connectors not ready', () => {
    connector.ready = false;
    expect(strategy.formatStatus()).toBe('Market connectors are not ready.');
  });

  it('announces fills', async () => {
    await strategy.onOrderFilled({
      orderId: 'fake-1',
      symbol: 'ETH-USDT',
      side: 'buy',
      amount: d('0.01'),
      price: d('1989.52'),
      time: 0
    });
    expect(alert.calls).toEqual([{ title: 'Order filled', message: 'BUY 0.0100 ETH-USDT @ 1989.52' }]);
  });
});

import { describe, expect, it } from 'vitest';
import { InMemoryMetrics } from '../../src/core/metrics.js';
import { PrometheusMetrics } from '../../src/core/prometheusMetrics.js';
import { withRetry } from '../../src/core/retry.js';

describe('PrometheusMetrics', () => {
  it('renders counters then gauges with sanitized names', () => {
    const metrics = new PrometheusMetrics();
    metrics.increment('orders.canceled');
    metrics.increment('orders.canceled');
    metrics.gauge('quote.bid_spread_bps', 2.4);
    expect(metrics.render()).toBe(
      [
        '# TYPE spreadsmith_orders_canceled counter',
        'spreadsmith_orders_canceled 2',
        '# TYPE spreadsmith_quote_bid_spread_bps gauge',
        'spreadsmith_quote_bid_spread_bps 2.4',
        ''
      ].join('\n')
    );
  });
});

describe('InMemoryMetrics', () => {
  it('snapshots counters and the latest gauge values', () => {
    const metrics = new InMemoryMetrics();
    metrics.increment('cycle.quoted', 3);
    metrics.gauge('quote.inv_norm', 0.5);
    metrics.gauge('quote.inv_norm', -0.25);
    expect(metrics.snapshot()).toEqual({ counters: { 'cycle.quoted': 3 }, gauges: { 'quote.inv_norm': -0.25 } });
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    let attempts = 0;
    const value = await withRetry(
      async () => {
        attempts += 1;
        if (attempts < 2) throw new Error('transient');
        return 'ok';
      },
      { retries: 2, baseDelayMs: 1 }
    );
    expect(value).toBe('ok');
    expect(attempts).toBe(2);
  });

  it('rethrows the last error once retries run out', async () => {
    const retried: number[] = [];
    await expect(
      withRetry(
        async () => {
          throw new Error('down');
        },
        { retries: 2, baseDelayMs: 1, onRetry: (attempt) => retried.push(attempt) }
      )
    ).rejects.toThrow('down');
    expect(retried).toEqual([1, 2]);
  });
});

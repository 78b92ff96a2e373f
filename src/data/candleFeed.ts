import type { Candle } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { withRetry } from '../core/retry.js';
import type { ExchangeAdapter } from '../exchanges/adapter.js';

/** Read-only view of the candle window consumed by the quoting cycle. */
export interface CandleSource {
  getCandleWindow(): readonly Candle[];
}

export interface CandleFeedConfig {
  symbol: string;
  interval: string;
  maxRecords: number;
}

// After the initial backfill only the tail is re-fetched.
const INCREMENTAL_LIMIT = 50;

export class CandleFeed implements CandleSource {
  private window: Candle[] = [];

  constructor(
    private readonly exchange: ExchangeAdapter,
    private readonly config: CandleFeedConfig,
    private readonly logger: Logger,
    private readonly metrics: Metrics
  ) {}

  async poll(): Promise<void> {
    const { symbol, interval, maxRecords } = this.config;
    const limit = this.window.length === 0 ? maxRecords : Math.min(maxRecords, INCREMENTAL_LIMIT);
    try {
      const candles = await withRetry(() => this.exchange.getCandles(symbol, interval, limit), {
        retries: 2,
        baseDelayMs: 250,
        onRetry: (attempt, err) => this.logger.debug('candle poll retry', { symbol, attempt, err: String(err) })
      });
      const appended = this.append(candles);
      this.metrics.increment('market_data.poll.success');
      this.metrics.gauge('market_data.window_size', this.window.length);
      if (appended > 0) {
        this.logger.debug('candle window updated', { symbol, appended, size: this.window.length });
      }
    } catch (err) {
      this.logger.warn('exchange candle polling failed', { symbol, exchange: this.exchange.id, err: String(err) });
      this.metrics.increment('market_data.poll.error');
    }
  }

  /**
   * Merges candles into the window. Newer timestamps are appended, the current
   * candle's timestamp is replaced in place (it is still forming), anything older
   * than the tail is ignored. Returns the number of newly appended candles.
   */
  append(candles: readonly Candle[]): number {
    let appended = 0;
    const ordered = [...candles].sort((a, b) => a.time - b.time);
    for (const candle of ordered) {
      if (candle.symbol !== this.config.symbol || candle.interval !== this.config.interval) continue;
      const last = this.window[this.window.length - 1];
      if (!last || candle.time > last.time) {
        this.window.push(candle);
        appended += 1;
      } else if (candle.time === last.time) {
        this.window[this.window.length - 1] = candle;
      }
    }
    const overflow = this.window.length - this.config.maxRecords;
    if (overflow > 0) {
      this.window = this.window.slice(overflow);
    }
    return appended;
  }

  getCandleWindow(): readonly Candle[] {
    return Object.freeze(this.window.slice());
  }

  getLastCandleTime(): number | undefined {
    return this.window[this.window.length - 1]?.time;
  }
}

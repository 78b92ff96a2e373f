import { ATR, MACD } from 'technicalindicators';
import { Decimal } from '../core/decimal.js';
import { NumericConversionError } from '../core/errors.js';
import type { Candle } from '../core/types.js';
import type { IndicatorResult, NotReadyReason } from './types.js';

export interface IndicatorConfig {
  natrLength: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
}

const last = <T>(arr: readonly T[]): T | undefined => arr[arr.length - 1];

const isFiniteNumber = (v: number | undefined): v is number => v !== undefined && Number.isFinite(v);

/**
 * Volatility (NATR) and trend (MACD histogram) from the candle window.
 *
 * Indicator math runs on binary floats inside technicalindicators; the two
 * values this engine returns are converted once into Decimal and everything
 * downstream stays decimal.
 */
export class IndicatorEngine {
  constructor(private readonly config: IndicatorConfig) {}

  get requiredRecords(): number {
    return Math.max(this.config.natrLength, this.config.macdSlow + this.config.macdSignal);
  }

  compute(window: readonly Candle[]): IndicatorResult {
    if (window.length < this.requiredRecords) {
      return notReady('insufficient_history');
    }

    const highs = window.map((c) => c.high);
    const lows = window.map((c) => c.low);
    const closes = window.map((c) => c.close);

    const atr = last(ATR.calculate({ high: highs, low: lows, close: closes, period: this.config.natrLength }));
    const lastClose = last(closes);
    if (!isFiniteNumber(atr) || !isFiniteNumber(lastClose) || lastClose <= 0) {
      return notReady('natr_missing');
    }

    const macd = last(
      MACD.calculate({
        values: closes,
        fastPeriod: this.config.macdFast,
        slowPeriod: this.config.macdSlow,
        signalPeriod: this.config.macdSignal,
        SimpleMAOscillator: false,
        SimpleMASignal: false
      })
    );
    const hist = macd?.histogram;
    if (!isFiniteNumber(hist)) {
      return notReady('macd_hist_missing');
    }

    try {
      const natr = Decimal.fromNumber(atr).div(Decimal.fromNumber(lastClose));
      return { status: 'ready', snapshot: { natr, macdHist: Decimal.fromNumber(hist) } };
    } catch (err) {
      // A close that rounds to zero at 18 digits fails the division.
      if (err instanceof NumericConversionError || err instanceof RangeError) return notReady('numeric_conversion');
      throw err;
    }
  }
}

const notReady = (reason: NotReadyReason): IndicatorResult => ({ status: 'not_ready', reason });

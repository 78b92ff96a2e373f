/**
 * Quoting pipeline type system
 *
 * Every cycle produces:
 *   CandleWindow → IndicatorResult → SpreadResult → QuotePair → ReconcileResult
 */

import type { Decimal } from '../core/decimal.js';
import type { ReconcileResult } from '../execution/orderReconciler.js';

// ── Indicators ───────────────────────────────────────────────────────────────

export interface IndicatorSnapshot {
  /** Average true range as a fraction of the last close. */
  natr: Decimal;
  macdHist: Decimal;
}

export type NotReadyReason =
  | 'insufficient_history'
  | 'natr_missing'
  | 'macd_hist_missing'
  | 'numeric_conversion';

export type IndicatorResult =
  | { status: 'ready'; snapshot: IndicatorSnapshot }
  | { status: 'not_ready'; reason: NotReadyReason };

// ── Spreads ──────────────────────────────────────────────────────────────────

export interface InventoryState {
  baseBalance: Decimal;
}

export interface SpreadResult {
  bidSpread: Decimal;
  askSpread: Decimal;
  /** Position over the inventory cap, clamped to [-1, 1]. */
  invNorm: Decimal;
  /** Spreads before the min-spread floor. */
  rawBidSpread: Decimal;
  rawAskSpread: Decimal;
}

// ── Quotes ───────────────────────────────────────────────────────────────────

export interface BookTop {
  bestBid: Decimal;
  bestAsk: Decimal;
}

export interface QuotePair {
  buyPrice: Decimal;
  sellPrice: Decimal;
  /** The external book was crossed (best bid above best ask) when quoting. */
  crossedBook: boolean;
}

// ── Cycle ────────────────────────────────────────────────────────────────────

export interface StrategyStatusMetrics {
  bidSpread: Decimal;
  askSpread: Decimal;
  invNorm: Decimal;
}

export type CycleResult =
  | { kind: 'skipped'; reason: NotReadyReason }
  | { kind: 'quoted'; spreads: SpreadResult; quotes: QuotePair; reconcile: ReconcileResult };

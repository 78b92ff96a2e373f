/**
 * BalanceLedger: holdings per asset plus what open orders have locked.
 *
 *   total      what the account holds
 *   reserved   locked by open orders (quote notional for buys, base for sells)
 *   available  total − reserved, never below zero
 *
 * Reservations are keyed by order id so a cancel or fill releases exactly what
 * the order locked.
 */

import { Decimal } from '../core/decimal.js';

interface Reservation {
  asset: string;
  amount: Decimal;
}

export interface LedgerEntry {
  total: string;
  reserved: string;
  available: string;
}

export class BalanceLedger {
  private readonly totals = new Map<string, Decimal>();
  private readonly reservations = new Map<string, Reservation>();

  total(asset: string): Decimal {
    return this.totals.get(asset.toUpperCase()) ?? Decimal.ZERO;
  }

  setTotal(asset: string, amount: Decimal): void {
    this.totals.set(asset.toUpperCase(), amount);
  }

  credit(asset: string, amount: Decimal): void {
    this.setTotal(asset, this.total(asset).plus(amount));
  }

  debit(asset: string, amount: Decimal): void {
    this.setTotal(asset, this.total(asset).minus(amount));
  }

  reserved(asset: string): Decimal {
    const key = asset.toUpperCase();
    let sum = Decimal.ZERO;
    for (const r of this.reservations.values()) {
      if (r.asset === key) sum = sum.plus(r.amount);
    }
    return sum;
  }

  available(asset: string): Decimal {
    return Decimal.max(this.total(asset).minus(this.reserved(asset)), Decimal.ZERO);
  }

  /** Replaces any earlier reservation under the same key. */
  reserve(key: string, asset: string, amount: Decimal): void {
    this.reservations.set(key, { asset: asset.toUpperCase(), amount });
  }

  release(key: string): void {
    this.reservations.delete(key);
  }

  snapshot(): Record<string, LedgerEntry> {
    const assets = new Set([...this.totals.keys(), ...[...this.reservations.values()].map((r) => r.asset)]);
    const out: Record<string, LedgerEntry> = {};
    for (const asset of assets) {
      out[asset] = {
        total: this.total(asset).toString(),
        reserved: this.reserved(asset).toString(),
        available: this.available(asset).toString()
      };
    }
    return out;
  }
}

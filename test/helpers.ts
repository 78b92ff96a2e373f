/**
 * Shared test helpers: mock factories and in-process fakes.
 */

import { Decimal } from '../src/core/decimal.js';
import type { Logger } from '../src/core/logger.js';
import type { Metrics } from '../src/core/metrics.js';
import type { Balance, Candle, Order, OrderRequest, Ticker } from '../src/core/types.js';
import type { AlertService } from '../src/alerts/interface.js';
import type { ExchangeAdapter } from '../src/exchanges/adapter.js';
import { adjustForFunding } from '../src/execution/budgetChecker.js';
import type {
  FillListener,
  OpenOrder,
  OrderIntent,
  PriceType,
  TradingConnector
} from '../src/execution/connector.js';

export const d = (value: string | number): Decimal => Decimal.from(value);

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogRecord {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

export const createMockLogger = (): Logger & { records: LogRecord[] } => {
  const records: LogRecord[] = [];
  const logger: Logger & { records: LogRecord[] } = {
    records,
    debug: (message, context) => { records.push({ level: 'debug', message, context }); },
    info: (message, context) => { records.push({ level: 'info', message, context }); },
    warn: (message, context) => { records.push({ level: 'warn', message, context }); },
    error: (message, context) => { records.push({ level: 'error', message, context }); },
    child: () => logger,
  };
  return logger;
};

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number>; gauges: Map<string, number> } => {
  const counters = new Map<string, number>();
  const gauges = new Map<string, number>();
  return {
    counters,
    gauges,
    increment(name: string, value = 1) { counters.set(name, (counters.get(name) ?? 0) + value); },
    gauge(name: string, value: number) { gauges.set(name, value); },
  };
};

// ── Mock Alert ──────────────────────────────────────────────────────

export const createMockAlert = (): AlertService & { calls: Array<{ title: string; message: string }> } => {
  const calls: Array<{ title: string; message: string }> = [];
  return {
    calls,
    async notify(title: string, message: string) { calls.push({ title, message }); },
  };
};

// ── Candle Factory ──────────────────────────────────────────────────

const T0 = 1_700_000_000_000;
const MINUTE = 60_000;

export function makeCandle(overrides: Partial<Candle> = {}): Candle {
  return {
    symbol: 'ETH-USDT',
    interval: '1m',
    time: T0,
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 10,
    ...overrides,
  };
}

/** Candles one minute apart; `closes` drives open/close, high/low sit ±1 around the close. */
export function makeCandlesFromCloses(closes: readonly number[], opts: { start?: number; symbol?: string } = {}): Candle[] {
  const start = opts.start ?? T0;
  return closes.map((close, i) => makeCandle({
    symbol: opts.symbol ?? 'ETH-USDT',
    time: start + i * MINUTE,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
  }));
}

export function makeFlatCandles(count: number, price = 100): Candle[] {
  return makeCandlesFromCloses(Array.from({ length: count }, () => price));
}

// ── Ticker Factory ──────────────────────────────────────────────────

export function makeTicker(overrides: Partial<Ticker> = {}): Ticker {
  return {
    symbol: 'ETH-USDT',
    bid: 1999,
    ask: 2001,
    last: 2000,
    volume24h: 1000,
    time: T0,
    ...overrides,
  };
}

// ── Fake exchange ───────────────────────────────────────────────────

/** ExchangeAdapter backed by in-memory state; tests mutate the public fields. */
export class FakeExchange implements ExchangeAdapter {
  readonly id = 'fake';
  ticker: Ticker = makeTicker();
  candles: Candle[] = [];
  balances: Balance[] = [];
  openOrders: Order[] = [];
  orders = new Map<string, Order>();
  placed: OrderRequest[] = [];
  canceled: string[] = [];
  failTicker = false;
  failCandles = 0;
  failPlace = false;
  failCancel = false;
  candleLimits: number[] = [];
  private seq = 0;

  async getTicker(symbol: string): Promise<Ticker> {
    if (this.failTicker) throw new Error('ticker unavailable');
    return { ...this.ticker, symbol };
  }

  async getCandles(_symbol: string, _interval: string, limit: number): Promise<Candle[]> {
    this.candleLimits.push(limit);
    if (this.failCandles > 0) {
      this.failCandles -= 1;
      throw new Error('candles unavailable');
    }
    return this.candles.slice(-limit);
  }

  async placeOrder(req: OrderRequest): Promise<Order> {
    if (this.failPlace) throw new Error('insufficient margin');
    this.placed.push(req);
    this.seq += 1;
    const order: Order = {
      orderId: `ex-${this.seq}`,
      clientOrderId: req.clientOrderId,
      symbol: req.symbol,
      side: req.side,
      type: req.type,
      quantity: req.quantity,
      price: req.price,
      status: 'open',
      filledQuantity: 0,
      createdAt: T0,
      updatedAt: T0,
    };
    this.orders.set(order.orderId, order);
    this.openOrders.push(order);
    return order;
  }

  async cancelOrder(orderId: string, _symbol: string): Promise<void> {
    if (this.failCancel) throw new Error('cancel refused');
    this.canceled.push(orderId);
    this.openOrders = this.openOrders.filter((o) => o.orderId !== orderId);
  }

  async getOrder(orderId: string, _symbol: string): Promise<Order> {
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`unknown order ${orderId}`);
    return order;
  }

  async listOpenOrders(symbol: string): Promise<Order[]> {
    return this.openOrders.filter((o) => o.symbol === symbol);
  }

  async getBalances(): Promise<Balance[]> {
    return this.balances;
  }
}

// ── Fake connector ──────────────────────────────────────────────────

export type ConnectorCall =
  | { op: 'cancel'; orderId: string }
  | { op: 'buy' | 'sell'; amount: string; price: string };

/** TradingConnector over fixed prices and balances that records every mutation. */
export class FakeConnector implements TradingConnector {
  readonly name = 'fake_connector';
  ready = true;
  balances = new Map<string, Decimal>([['ETH', d(0)], ['USDT', d(10_000)]]);
  prices: Record<PriceType, Decimal> = { mid: d(2000), best_bid: d(1999), best_ask: d(2001), last: d(2000) };
  open: OpenOrder[] = [];
  calls: ConnectorCall[] = [];
  syncs = 0;
  failSubmit = false;
  private seq = 0;
  private readonly listeners: FillListener[] = [];

  async sync(): Promise<void> {
    this.syncs += 1;
  }

  isReady(): boolean {
    return this.ready;
  }

  getBalance(asset: string): Decimal {
    return this.balances.get(asset) ?? Decimal.ZERO;
  }

  getPriceByType(_symbol: string, type: PriceType): Decimal {
    return this.prices[type];
  }

  listOpenOrders(symbol: string): OpenOrder[] {
    return this.open.filter((o) => o.symbol === symbol);
  }

  async cancelOrder(_symbol: string, orderId: string): Promise<void> {
    this.calls.push({ op: 'cancel', orderId });
    this.open = this.open.filter((o) => o.orderId !== orderId);
  }

  adjustForFunding(intents: readonly OrderIntent[], allOrNone: boolean): OrderIntent[] {
    return adjustForFunding(intents, (asset) => this.getBalance(asset), allOrNone);
  }

  async submitBuy(symbol: string, amount: Decimal, price: Decimal): Promise<string> {
    return this.submit(symbol, 'buy', amount, price);
  }

  async submitSell(symbol: string, amount: Decimal, price: Decimal): Promise<string> {
    return this.submit(symbol, 'sell', amount, price);
  }

  onFill(listener: FillListener): void {
    this.listeners.push(listener);
  }

  private submit(symbol: string, side: 'buy' | 'sell', amount: Decimal, price: Decimal): string {
    if (this.failSubmit) throw new Error('venue down');
    this.seq += 1;
    const orderId = `fake-${this.seq}`;
    this.calls.push({ op: side, amount: amount.toString(), price: price.toString() });
    this.open.push({ orderId, symbol, side, amount, price, filled: Decimal.ZERO });
    return orderId;
  }
}

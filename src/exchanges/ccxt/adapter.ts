import ccxt from 'ccxt';
import type { Exchange, Order as CcxtOrder, Ticker as CcxtTicker } from 'ccxt';
import { AppError } from '../../core/errors.js';
import type { Balance, Candle, Order, OrderRequest, Side, Ticker } from '../../core/types.js';
import { toUnifiedSymbol } from '../../core/tradingPair.js';
import type { ExchangeAdapter } from '../adapter.js';

export type SupportedExchange = 'binance' | 'bybit' | 'okx' | 'kucoin';

interface CCXTConfig {
  exchange: SupportedExchange;
  apiKey?: string;
  secret?: string;
  sandbox?: boolean;
}

const createExchange = (config: CCXTConfig): Exchange => {
  const options = {
    apiKey: config.apiKey,
    secret: config.secret,
    enableRateLimit: true,
    options: { defaultType: 'spot' }
  };
  switch (config.exchange) {
    case 'binance':
      return new ccxt.binance(options);
    case 'bybit':
      return new ccxt.bybit(options);
    case 'okx':
      return new ccxt.okx(options);
    case 'kucoin':
      return new ccxt.kucoin(options);
  }
};

/**
 * Maps a ccxt ticker onto ours. A ticker without bid, ask or last is rejected
 * rather than completed from the other fields.
 */
export const toTicker = (
  symbol: string,
  ticker: Pick<CcxtTicker, 'bid' | 'ask' | 'last' | 'close' | 'baseVolume' | 'timestamp'>
): Ticker => {
  const last = ticker.last ?? ticker.close;
  const { bid, ask } = ticker;
  if (bid === undefined || ask === undefined || last === undefined) {
    throw new AppError(`incomplete ticker for ${symbol}`, 'MARKET_DATA_UNAVAILABLE', { symbol, bid, ask, last });
  }
  return {
    symbol,
    bid,
    ask,
    last,
    volume24h: ticker.baseVolume ?? 0,
    time: ticker.timestamp ?? Date.now()
  };
};

export class CCXTAdapter implements ExchangeAdapter {
  readonly id: string;
  private readonly exchange: Exchange;

  constructor(config: CCXTConfig) {
    this.id = config.exchange;
    this.exchange = createExchange(config);
    if (config.sandbox) {
      this.exchange.setSandboxMode(true);
    }
  }

  private toOrderStatus(status: string | undefined): Order['status'] {
    switch ((status ?? '').toLowerCase()) {
      case 'filled':
      case 'closed':
        return 'filled';
      case 'canceled':
      case 'cancelled':
      case 'expired':
        return 'canceled';
      case 'rejected':
        return 'rejected';
      case 'open':
        return 'open';
      default:
        return 'pending';
    }
  }

  private toSide(side: string | undefined): Side {
    return side === 'sell' ? 'sell' : 'buy';
  }

  private toOrder(order: CcxtOrder, symbol: string, clientOrderId?: string): Order {
    return {
      orderId: order.id,
      clientOrderId: clientOrderId ?? order.clientOrderId ?? order.id,
      symbol,
      side: this.toSide(order.side),
      type: order.type === 'market' ? 'market' : 'limit',
      quantity: order.amount ?? 0,
      price: order.price ?? undefined,
      status: this.toOrderStatus(order.status),
      filledQuantity: order.filled ?? 0,
      avgFillPrice: order.average ?? undefined,
      createdAt: order.timestamp ?? Date.now(),
      updatedAt: order.lastTradeTimestamp ?? order.timestamp ?? Date.now()
    };
  }

  async getTicker(symbol: string): Promise<Ticker> {
    const ticker = await this.exchange.fetchTicker(toUnifiedSymbol(symbol));
    return toTicker(symbol, ticker);
  }

  async getCandles(symbol: string, interval: string, limit: number): Promise<Candle[]> {
    const ohlcv = await this.exchange.fetchOHLCV(toUnifiedSymbol(symbol), interval, undefined, limit);
    const candles: Candle[] = [];
    for (const [timestamp, open, high, low, close, volume] of ohlcv) {
      if (timestamp === undefined || open === undefined || high === undefined || low === undefined || close === undefined) {
        continue;
      }
      candles.push({ symbol, interval, time: timestamp, open, high, low, close, volume: volume ?? 0 });
    }
    return candles;
  }

  async placeOrder(orderRequest: OrderRequest): Promise<Order> {
    const order = await this.exchange.createOrder(
      toUnifiedSymbol(orderRequest.symbol),
      orderRequest.type,
      orderRequest.side,
      orderRequest.quantity,
      orderRequest.price,
      { clientOrderId: orderRequest.clientOrderId }
    );
    return this.toOrder(order, orderRequest.symbol, orderRequest.clientOrderId);
  }

  async cancelOrder(orderId: string, symbol: string): Promise<void> {
    await this.exchange.cancelOrder(orderId, toUnifiedSymbol(symbol));
  }

  async getOrder(orderId: string, symbol: string): Promise<Order> {
    const order = await this.exchange.fetchOrder(orderId, toUnifiedSymbol(symbol));
    return this.toOrder(order, symbol);
  }

  async listOpenOrders(symbol: string): Promise<Order[]> {
    const orders = await this.exchange.fetchOpenOrders(toUnifiedSymbol(symbol));
    return orders.map((order) => this.toOrder(order, symbol));
  }

  async getBalances(): Promise<Balance[]> {
    const balances = await this.exchange.fetchBalance();
    const result: Balance[] = [];
    for (const asset of Object.keys(balances)) {
      if (AGGREGATE_KEYS.has(asset)) continue;
      const entry: unknown = balances[asset];
      if (!isBalanceEntry(entry)) continue;
      result.push({ asset, free: entry.free ?? 0, locked: entry.used ?? 0 });
    }
    return result;
  }
}

// fetchBalance() mixes per-asset entries with these aggregate keys.
const AGGREGATE_KEYS = new Set(['info', 'timestamp', 'datetime', 'free', 'used', 'total', 'debt']);

const isBalanceEntry = (value: unknown): value is { free?: number; used?: number } =>
  typeof value === 'object' &&
  value !== null &&
  'free' in value &&
  (value.free === undefined || typeof value.free === 'number') &&
  (!('used' in value) || value.used === undefined || typeof value.used === 'number');

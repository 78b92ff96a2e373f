export type Side = 'buy' | 'sell';
export type OrderType = 'market' | 'limit';

export interface Candle {
  symbol: string;
  interval: string;
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface Ticker {
  symbol: string;
  bid: number;
  ask: number;
  last: number;
  volume24h?: number;
  time: number;
}

export interface OrderRequest {
  symbol: string;
  side: Side;
  type: OrderType;
  quantity: number;
  price?: number;
  clientOrderId: string;
}

export interface Order {
  orderId: string;
  clientOrderId: string;
  symbol: string;
  side: Side;
  type: OrderType;
  quantity: number;
  price?: number;
  status: 'pending' | 'open' | 'filled' | 'canceled' | 'rejected';
  filledQuantity: number;
  avgFillPrice?: number;
  createdAt: number;
  updatedAt: number;
}

export interface Balance {
  asset: string;
  free: number;
  locked: number;
}

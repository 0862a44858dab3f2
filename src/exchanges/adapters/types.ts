import type { Candle, Order, OrderSide } from '../../strategies/types';

export interface AccountBalance {
  total: number;
  available: number;
  used: number;
}

export interface TickerSnapshot {
  symbol: string;
  lastPrice: number | null;
  bid: number | null;
  ask: number | null;
  volume24h: number | null;
  priceChange24h: number | null;
  timestamp: number;
}

export interface LimitOrderRequest {
  side: OrderSide;
  qty: number;
  price: number;
  linkId?: string;
}

export interface PlacedOrder {
  orderId: string;
  linkId: string | null;
  price: number;
  qty: number;
}

export interface PositionSnapshot {
  side: 'long' | 'short' | 'flat';
  size: number;
  entryPrice: number;
  unrealizedPnl: number;
}

export type CancelTarget = { orderId: string } | { linkId: string };

/**
 * Everything the grid core needs from an exchange. Implementations own
 * signing and transport; all methods reject on transport failure.
 */
export interface GridExchangeClient {
  readonly id: string;
  readonly symbol: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  getBalance(): Promise<AccountBalance>;
  getTicker(): Promise<TickerSnapshot>;
  getCandles(timeframe: string, limit: number): Promise<Candle[]>;
  placeLimitOrder(request: LimitOrderRequest): Promise<PlacedOrder>;
  cancelOrder(target: CancelTarget): Promise<boolean>;
  cancelAllOrders(): Promise<boolean>;
  getOpenOrders(): Promise<Order[]>;
  getOrderHistory(limit: number): Promise<Order[]>;
  getPosition(): Promise<PositionSnapshot | null>;
  setLeverage?(leverage: number): Promise<void>;
}

export interface ExchangeAdapterConfig {
  id: string;
  symbol: string;
  apiKey?: string;
  apiSecret?: string;
  passphrase?: string;
  sandbox?: boolean;
  settleCurrency?: string;
  extra?: Record<string, unknown>;
}

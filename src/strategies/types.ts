export type OrderSide = 'buy' | 'sell';

export type OrderStatus = 'open' | 'filled' | 'cancelled' | 'rejected' | 'unknown';

export function oppositeSide(side: OrderSide): OrderSide {
  return side === 'buy' ? 'sell' : 'buy';
}

export interface Candle {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface GridLevel {
  side: OrderSide;
  /** 1-based distance from the build price, in steps. */
  rung: number;
  targetPrice: number;
  adjustedPrice: number;
}

export interface PriceBand {
  lower: number;
  upper: number;
}

export interface GridConfig {
  lowerPrice: number;
  upperPrice: number;
  step: number;
  levelCount: number;
  centerPrice: number;
  builtAt: number;
}

export interface Order {
  orderId: string;
  linkId: string | null;
  side: OrderSide;
  price: number;
  qty: number;
  status: OrderStatus;
  createdTime: number;
}

export interface TradeRecord {
  timestamp: string;
  symbol: string;
  side: OrderSide;
  price: number;
  qty: number;
  orderId: string;
  status: string;
  pnl: number;
  fee: number;
  note: string;
}

export interface PerformanceSnapshot {
  totalBalance: number;
  unrealizedPnl: number;
  realizedPnl: number;
  totalTrades: number;
  winRate: number;
  dailyReturn: number;
}

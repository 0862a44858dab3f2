import type {
  AccountBalance,
  CancelTarget,
  ExchangeAdapterConfig,
  GridExchangeClient,
  LimitOrderRequest,
  PlacedOrder,
  PositionSnapshot,
  TickerSnapshot,
} from './types';
import type { Candle, Order } from '../../strategies/types';

export abstract class BaseExchangeAdapter implements GridExchangeClient {
  public readonly id: string;
  public readonly symbol: string;
  protected config: ExchangeAdapterConfig;
  protected connected = false;

  protected constructor(config: ExchangeAdapterConfig) {
    this.config = config;
    this.id = config.id;
    this.symbol = config.symbol;
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected() {
    return this.connected;
  }

  assertConnected() {
    if (!this.connected) {
      throw new Error(`adapter_not_connected:${this.id}`);
    }
  }

  abstract getBalance(): Promise<AccountBalance>;
  abstract getTicker(): Promise<TickerSnapshot>;
  abstract getCandles(timeframe: string, limit: number): Promise<Candle[]>;
  abstract placeLimitOrder(request: LimitOrderRequest): Promise<PlacedOrder>;
  abstract cancelOrder(target: CancelTarget): Promise<boolean>;
  abstract cancelAllOrders(): Promise<boolean>;
  abstract getOpenOrders(): Promise<Order[]>;
  abstract getOrderHistory(limit: number): Promise<Order[]>;
  abstract getPosition(): Promise<PositionSnapshot | null>;
}

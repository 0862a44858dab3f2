import type { Exchange, Order as CcxtOrder } from 'ccxt';
import { BaseExchangeAdapter } from './baseAdapter';
import type {
  AccountBalance,
  CancelTarget,
  ExchangeAdapterConfig,
  LimitOrderRequest,
  PlacedOrder,
  PositionSnapshot,
  TickerSnapshot,
} from './types';
import { getExchange } from '../ccxtClient';
import type { Candle, Order, OrderSide, OrderStatus } from '../../strategies/types';
import type { Logger } from '../../utils/logger';
import { retry, RetryOptions } from '../../utils/retry';
import { errorMessage } from '../../utils/formatError';

export interface DerivativesAdapterOptions {
  logger: Logger;
  retry?: RetryOptions;
  /** Pre-built ccxt instance; defaults to one constructed from the config. */
  exchange?: Exchange;
}

export function normalizeOrderStatus(raw: string | undefined | null): OrderStatus {
  const status = (raw || '').toLowerCase();
  if (['open', 'new', 'partially_filled', 'partiallyfilled'].includes(status)) return 'open';
  if (['closed', 'filled'].includes(status)) return 'filled';
  if (['canceled', 'cancelled', 'expired', 'partiallyfilledcanceled'].includes(status)) return 'cancelled';
  if (status === 'rejected') return 'rejected';
  return 'unknown';
}

// ccxt error classes that another attempt cannot fix
const PERMANENT_ERRORS = new Set([
  'AuthenticationError',
  'PermissionDenied',
  'AccountSuspended',
  'BadSymbol',
  'BadRequest',
  'NotSupported',
]);

export function isRetryableRead(error: unknown) {
  return !(error instanceof Error && PERMANENT_ERRORS.has(error.name));
}

function parseSide(raw: string | undefined | null): OrderSide | null {
  const side = (raw || '').toLowerCase();
  if (side === 'buy' || side === 'sell') return side;
  return null;
}

function toNumber(value: unknown, fallback = 0) {
  const num = Number(value);
  return Number.isFinite(num) ? num : fallback;
}

function toNullableNumber(value: unknown) {
  if (value === undefined || value === null) return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

export class DerivativesExchangeAdapter extends BaseExchangeAdapter {
  private readonly exchange: Exchange;
  private readonly logger: Logger;
  private readonly retryOptions: RetryOptions;
  private readonly settleCurrency: string;

  constructor(config: ExchangeAdapterConfig, options: DerivativesAdapterOptions) {
    super(config);
    this.logger = options.logger;
    this.settleCurrency = config.settleCurrency ?? 'USDT';
    this.retryOptions = options.retry ?? {};
    this.exchange =
      options.exchange ??
      getExchange({
        exchangeId: config.id,
        apiKey: config.apiKey,
        apiSecret: config.apiSecret,
        passphrase: config.passphrase,
        sandbox: config.sandbox,
      });
  }

  override async connect(): Promise<void> {
    await super.connect();
    await this.read('load_markets', () => this.exchange.loadMarkets());
  }

  override async disconnect(): Promise<void> {
    await super.disconnect();
    try {
      await this.exchange.close();
    } catch (err) {
      this.logger.warn('derivatives_adapter_close_failed', {
        event: 'derivatives_adapter_close_failed',
        exchange: this.id,
        error: errorMessage(err),
      });
    }
  }

  private read<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return retry(operation, {
      ...this.retryOptions,
      shouldRetry: this.retryOptions.shouldRetry ?? isRetryableRead,
      onRetry: (error, attempt) => {
        this.logger.debug('exchange_read_retry', {
          event: 'exchange_read_retry',
          exchange: this.id,
          operation: label,
          attempt,
          error: errorMessage(error),
        });
        this.retryOptions.onRetry?.(error, attempt);
      },
    });
  }

  async getBalance(): Promise<AccountBalance> {
    this.assertConnected();
    const balances = await this.read('fetch_balance', () => this.exchange.fetchBalance({ type: 'swap' }));
    const entry = balances[this.settleCurrency];
    if (!entry) {
      return { total: 0, available: 0, used: 0 };
    }
    return {
      total: toNumber(entry.total),
      available: toNumber(entry.free),
      used: toNumber(entry.used),
    };
  }

  async getTicker(): Promise<TickerSnapshot> {
    this.assertConnected();
    const ticker = await this.read('fetch_ticker', () => this.exchange.fetchTicker(this.symbol));
    return {
      symbol: this.symbol,
      lastPrice: toNullableNumber(ticker.last),
      bid: toNullableNumber(ticker.bid),
      ask: toNullableNumber(ticker.ask),
      volume24h: toNullableNumber(ticker.baseVolume),
      priceChange24h: toNullableNumber(ticker.percentage),
      timestamp: toNumber(ticker.timestamp, Date.now()),
    };
  }

  async getCandles(timeframe: string, limit: number): Promise<Candle[]> {
    this.assertConnected();
    const rows = await this.read('fetch_ohlcv', () =>
      this.exchange.fetchOHLCV(this.symbol, timeframe, undefined, limit)
    );
    return rows
      .map((row) => ({
        timestamp: toNumber(row[0]),
        open: toNumber(row[1]),
        high: toNumber(row[2]),
        low: toNumber(row[3]),
        close: toNumber(row[4]),
        volume: toNumber(row[5]),
      }))
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  // not retried: a replayed placement could rest twice on the book
  async placeLimitOrder(request: LimitOrderRequest): Promise<PlacedOrder> {
    this.assertConnected();
    const params: Record<string, unknown> = { timeInForce: 'GTC' };
    if (request.linkId) {
      params.clientOrderId = request.linkId;
    }
    const order = await this.exchange.createOrder(
      this.symbol,
      'limit',
      request.side,
      request.qty,
      request.price,
      params
    );
    return {
      orderId: String(order.id),
      linkId: order.clientOrderId ?? request.linkId ?? null,
      price: toNumber(order.price, request.price),
      qty: toNumber(order.amount, request.qty),
    };
  }

  async cancelOrder(target: CancelTarget): Promise<boolean> {
    this.assertConnected();
    try {
      if ('orderId' in target) {
        await this.exchange.cancelOrder(target.orderId, this.symbol);
      } else {
        await this.exchange.cancelOrder('', this.symbol, { clientOrderId: target.linkId });
      }
      return true;
    } catch (err) {
      this.logger.warn('cancel_order_failed', {
        event: 'cancel_order_failed',
        exchange: this.id,
        symbol: this.symbol,
        target,
        error: errorMessage(err),
      });
      return false;
    }
  }

  async cancelAllOrders(): Promise<boolean> {
    this.assertConnected();
    try {
      await this.exchange.cancelAllOrders(this.symbol);
      return true;
    } catch (err) {
      this.logger.warn('cancel_all_orders_failed', {
        event: 'cancel_all_orders_failed',
        exchange: this.id,
        symbol: this.symbol,
        error: errorMessage(err),
      });
      return false;
    }
  }

  async getOpenOrders(): Promise<Order[]> {
    this.assertConnected();
    const orders = await this.read('fetch_open_orders', () => this.exchange.fetchOpenOrders(this.symbol));
    return this.mapOrders(orders);
  }

  async getOrderHistory(limit: number): Promise<Order[]> {
    this.assertConnected();
    const closed = await this.read('fetch_closed_orders', () =>
      this.exchange.fetchClosedOrders(this.symbol, undefined, limit)
    );
    let canceled: CcxtOrder[] = [];
    if (this.exchange.has['fetchCanceledOrders']) {
      canceled = await this.read('fetch_canceled_orders', () =>
        this.exchange.fetchCanceledOrders(this.symbol, undefined, limit)
      );
    }
    return this.mapOrders([...closed, ...canceled]).sort((a, b) => b.createdTime - a.createdTime);
  }

  async getPosition(): Promise<PositionSnapshot | null> {
    this.assertConnected();
    const position = await this.read('fetch_position', () => this.exchange.fetchPosition(this.symbol));
    const size = Math.abs(toNumber(position.contracts));
    if (size === 0) {
      return { side: 'flat', size: 0, entryPrice: 0, unrealizedPnl: toNumber(position.unrealizedPnl) };
    }
    return {
      side: position.side === 'short' ? 'short' : 'long',
      size,
      entryPrice: toNumber(position.entryPrice),
      unrealizedPnl: toNumber(position.unrealizedPnl),
    };
  }

  async setLeverage(leverage: number): Promise<void> {
    this.assertConnected();
    if (!this.exchange.has['setLeverage']) {
      throw new Error('leverage_not_supported');
    }
    await this.exchange.setLeverage(leverage, this.symbol);
  }

  private mapOrders(orders: CcxtOrder[]): Order[] {
    const mapped: Order[] = [];
    for (const order of orders) {
      const side = parseSide(order.side);
      if (!side || !order.id) {
        this.logger.debug('exchange_order_skipped', {
          event: 'exchange_order_skipped',
          exchange: this.id,
          orderId: order.id,
          side: order.side,
        });
        continue;
      }
      mapped.push({
        orderId: String(order.id),
        linkId: order.clientOrderId ?? null,
        side,
        price: toNumber(order.price),
        qty: toNumber(order.amount),
        status: normalizeOrderStatus(order.status),
        createdTime: toNumber(order.timestamp),
      });
    }
    return mapped;
  }
}

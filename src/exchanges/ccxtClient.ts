import ccxt from 'ccxt';
import type { Exchange } from 'ccxt';

export interface ExchangeConnectionOptions {
  exchangeId: string;
  apiKey?: string;
  apiSecret?: string;
  passphrase?: string | null;
  sandbox?: boolean;
  options?: Record<string, unknown>;
}

type ExchangeConstructor = new (config?: Record<string, unknown>) => Exchange;

// linear USDT perpetual venues whose client order ids take `_` and 36 characters
const DERIVATIVES_EXCHANGES: Record<string, ExchangeConstructor> = {
  bybit: ccxt.bybit,
  binanceusdm: ccxt.binanceusdm,
  bitget: ccxt.bitget,
};

export function supportedExchanges() {
  return Object.keys(DERIVATIVES_EXCHANGES);
}

export function getExchange(options: ExchangeConnectionOptions): Exchange {
  const ExchangeClass = DERIVATIVES_EXCHANGES[options.exchangeId];
  if (!ExchangeClass) {
    throw new Error(
      `Exchange ${options.exchangeId} is not supported for perpetual grids (supported: ${supportedExchanges().join(', ')})`
    );
  }
  const exchange = new ExchangeClass({
    apiKey: options.apiKey,
    secret: options.apiSecret,
    password: options.passphrase ?? undefined,
    enableRateLimit: true,
    options: { adjustForTimeDifference: true, defaultType: 'swap', ...(options.options ?? {}) },
  });
  if (options.sandbox) {
    exchange.setSandboxMode(true);
  }
  return exchange;
}

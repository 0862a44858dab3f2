import path from 'path';
import dotenv from 'dotenv';
import { ConfigurationInvalidError } from './errors';

dotenv.config();

type Env = Record<string, string | undefined>;

export const CONFIG = {
  ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_INGEST_WEBHOOK: process.env.LOG_INGEST_WEBHOOK || '',
  TELEGRAM_TOKEN: process.env.TELEGRAM_TOKEN || '',
  TELEGRAM_CHAT_ID: process.env.TELEGRAM_CHAT_ID || '',
  METRICS_PORT: Number(process.env.METRICS_PORT || '9100'),
  KILL_SWITCH_PORT: Number(process.env.KILL_SWITCH_PORT || '9101'),
  ENABLE_SERVICES: (process.env.ENABLE_SERVICES ?? 'true').toLowerCase() === 'true',
  EXCHANGE_RETRY: {
    ATTEMPTS: Number(process.env.EXCHANGE_RETRY_ATTEMPTS || '3'),
    DELAY_MS: Number(process.env.EXCHANGE_RETRY_DELAY_MS || '500'),
    BACKOFF: Number(process.env.EXCHANGE_RETRY_BACKOFF || '2'),
  },
};

export interface ExchangeSettings {
  id: string;
  apiKey?: string;
  apiSecret?: string;
  passphrase?: string;
  testnet: boolean;
  settleCurrency: string;
}

export interface GridSettings {
  levelCount: number;
  rangePercent: number;
  minRangePercent: number;
  maxRangePercent: number;
  dynamicRange: boolean;
  atrMultiplier: number;
  atrPeriod: number;
  candleTimeframe: string;
  rangeMarketThreshold: number;
  dynamicTiers: boolean;
}

export interface OrderSettings {
  offsetPercent: number;
  minProfitPercent: number;
}

export interface FeeSettings {
  maker: number;
  taker: number;
}

export interface ExecutionSettings {
  pollIntervalMs: number;
  gridUpdateIntervalMs: number;
  positionCheckIntervalMs: number;
  performanceLogEvery: number;
  errorCooldownMs: number;
  settleDelayMs: number;
  orderPacingMs: number;
  historyLookback: number;
  minAvailableBalance: number;
}

export interface RiskSettings {
  dailyLossLimit: number;
  maxDrawdown: number;
  dailyProfitTarget: number;
  maxPositionRatio: number;
  stopLossPercent: number;
  balanceFloorRatio: number;
}

export interface JournalSettings {
  enabled: boolean;
  dir: string;
}

export interface BotConfig {
  readonly exchange: ExchangeSettings;
  readonly symbol: string;
  readonly leverage: number;
  readonly grid: GridSettings;
  readonly order: OrderSettings;
  readonly fees: FeeSettings;
  readonly execution: ExecutionSettings;
  readonly risk: RiskSettings;
  readonly journal: JournalSettings;
}

function envNum(env: Env, name: string, fallback: number) {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return Number(raw);
}

function envBool(env: Env, name: string, fallback: boolean) {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true';
}

function envStr(env: Env, name: string, fallback: string) {
  const raw = env[name];
  return raw && raw.trim() ? raw.trim() : fallback;
}

function envOptional(env: Env, name: string) {
  const raw = env[name];
  return raw && raw.trim() ? raw.trim() : undefined;
}

export function loadBotConfig(env: Env = process.env): BotConfig {
  return {
    exchange: {
      id: envStr(env, 'EXCHANGE_ID', 'bybit'),
      apiKey: envOptional(env, 'EXCHANGE_API_KEY'),
      apiSecret: envOptional(env, 'EXCHANGE_API_SECRET'),
      passphrase: envOptional(env, 'EXCHANGE_API_PASSPHRASE'),
      testnet: envBool(env, 'EXCHANGE_TESTNET', true),
      settleCurrency: envStr(env, 'EXCHANGE_SETTLE_CURRENCY', 'USDT'),
    },
    symbol: envStr(env, 'GRID_SYMBOL', 'BTC/USDT:USDT'),
    leverage: envNum(env, 'GRID_LEVERAGE', 2),
    grid: {
      levelCount: envNum(env, 'GRID_COUNT', 20),
      rangePercent: envNum(env, 'GRID_RANGE_PCT', 0.05),
      minRangePercent: envNum(env, 'GRID_MIN_RANGE_PCT', 0.02),
      maxRangePercent: envNum(env, 'GRID_MAX_RANGE_PCT', 0.08),
      dynamicRange: envBool(env, 'GRID_DYNAMIC_RANGE', true),
      atrMultiplier: envNum(env, 'GRID_ATR_MULTIPLIER', 2),
      atrPeriod: envNum(env, 'GRID_ATR_PERIOD', 14),
      candleTimeframe: envStr(env, 'GRID_CANDLE_TIMEFRAME', '1h'),
      rangeMarketThreshold: envNum(env, 'GRID_RANGE_MARKET_THRESHOLD', 0.7),
      dynamicTiers: envBool(env, 'GRID_DYNAMIC_TIERS', false),
    },
    order: {
      offsetPercent: envNum(env, 'ORDER_OFFSET_PCT', 0.0001),
      minProfitPercent: envNum(env, 'ORDER_MIN_PROFIT_PCT', 0.003),
    },
    fees: {
      maker: envNum(env, 'FEE_MAKER', 0.0002),
      taker: envNum(env, 'FEE_TAKER', 0.0055),
    },
    execution: {
      pollIntervalMs: envNum(env, 'POLL_INTERVAL_MS', 60_000),
      gridUpdateIntervalMs: envNum(env, 'GRID_UPDATE_INTERVAL_MS', 3_600_000),
      positionCheckIntervalMs: envNum(env, 'POSITION_CHECK_INTERVAL_MS', 30_000),
      performanceLogEvery: envNum(env, 'PERFORMANCE_LOG_EVERY', 10),
      errorCooldownMs: envNum(env, 'ERROR_COOLDOWN_MS', 300_000),
      settleDelayMs: envNum(env, 'LADDER_SETTLE_DELAY_MS', 1_000),
      orderPacingMs: envNum(env, 'ORDER_PACING_MS', 200),
      historyLookback: envNum(env, 'ORDER_HISTORY_LOOKBACK', 100),
      minAvailableBalance: envNum(env, 'MIN_AVAILABLE_BALANCE', 10),
    },
    risk: {
      dailyLossLimit: envNum(env, 'RISK_DAILY_LOSS_LIMIT', 0.05),
      maxDrawdown: envNum(env, 'RISK_MAX_DRAWDOWN', 0.15),
      dailyProfitTarget: envNum(env, 'RISK_DAILY_PROFIT_TARGET', 0.02),
      maxPositionRatio: envNum(env, 'RISK_MAX_POSITION_RATIO', 0.6),
      stopLossPercent: envNum(env, 'RISK_STOP_LOSS_PCT', 0.1),
      balanceFloorRatio: envNum(env, 'RISK_BALANCE_FLOOR_RATIO', 0.5),
    },
    journal: {
      enabled: envBool(env, 'TRADE_HISTORY', true),
      dir: path.resolve(process.cwd(), envStr(env, 'LOG_DIR', 'logs')),
    },
  };
}

function within(violations: string[], label: string, value: number, min: number, max: number) {
  if (!Number.isFinite(value) || value < min || value > max) {
    violations.push(`${label} must be between ${min} and ${max} (got ${value})`);
  }
}

function positive(violations: string[], label: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    violations.push(`${label} must be a positive number (got ${value})`);
  }
}

export function validateBotConfig(config: BotConfig): string[] {
  const violations: string[] = [];
  if (!config.exchange.apiKey || !config.exchange.apiSecret) {
    violations.push('EXCHANGE_API_KEY and EXCHANGE_API_SECRET are required');
  }
  if (!config.symbol) {
    violations.push('symbol is required');
  }
  within(violations, 'grid level count', config.grid.levelCount, 5, 100);
  if (!Number.isInteger(config.grid.levelCount)) {
    violations.push(`grid level count must be an integer (got ${config.grid.levelCount})`);
  }
  within(violations, 'leverage', config.leverage, 1, 10);
  within(violations, 'grid range percent', config.grid.rangePercent, 0.01, 0.2);
  within(violations, 'max position ratio', config.risk.maxPositionRatio, 0.1, 1);
  within(violations, 'daily loss limit', config.risk.dailyLossLimit, 0.01, 0.2);
  within(violations, 'max drawdown', config.risk.maxDrawdown, 0.01, 1);
  within(violations, 'balance floor ratio', config.risk.balanceFloorRatio, 0, 1);
  positive(violations, 'min range percent', config.grid.minRangePercent);
  positive(violations, 'max range percent', config.grid.maxRangePercent);
  if (config.grid.minRangePercent > config.grid.maxRangePercent) {
    violations.push('min range percent must not exceed max range percent');
  }
  positive(violations, 'ATR multiplier', config.grid.atrMultiplier);
  if (!Number.isInteger(config.grid.atrPeriod) || config.grid.atrPeriod < 1) {
    violations.push(`ATR period must be a positive integer (got ${config.grid.atrPeriod})`);
  }
  within(violations, 'maker fee', config.fees.maker, 0, 0.01);
  within(violations, 'order offset percent', config.order.offsetPercent, 0, 0.01);
  positive(violations, 'poll interval', config.execution.pollIntervalMs);
  positive(violations, 'grid update interval', config.execution.gridUpdateIntervalMs);
  positive(violations, 'position check interval', config.execution.positionCheckIntervalMs);
  positive(violations, 'performance log cadence', config.execution.performanceLogEvery);
  positive(violations, 'error cooldown', config.execution.errorCooldownMs);
  return violations;
}

export function assertValidBotConfig(config: BotConfig): BotConfig {
  const violations = validateBotConfig(config);
  if (violations.length) {
    throw new ConfigurationInvalidError(violations);
  }
  return config;
}

export function describeBotConfig(config: BotConfig) {
  return {
    exchange: config.exchange.id,
    testnet: config.exchange.testnet,
    symbol: config.symbol,
    leverage: config.leverage,
    levelCount: config.grid.levelCount,
    rangePercent: config.grid.rangePercent,
    dynamicRange: config.grid.dynamicRange,
    dynamicTiers: config.grid.dynamicTiers,
    maxPositionRatio: config.risk.maxPositionRatio,
    dailyLossLimit: config.risk.dailyLossLimit,
    maxDrawdown: config.risk.maxDrawdown,
    stopLossPercent: config.risk.stopLossPercent,
    makerFee: config.fees.maker,
    takerFee: config.fees.taker,
  };
}

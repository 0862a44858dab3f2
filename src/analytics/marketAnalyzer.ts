import type { GridExchangeClient } from '../exchanges/adapters/types';
import type { BotConfig } from '../config';
import type { Candle, PriceBand } from '../strategies/types';
import type { Logger } from '../utils/logger';
import { DataUnavailableError } from '../errors';
import { attempt, fail, ok, Result } from '../utils/result';
import { averageTrueRange, bandAround, clamp, rangeDeviation, returnsVolatility } from './indicators';

const RANGE_WINDOW_CANDLES = 24;
const DEFAULT_VOLATILITY_PERIOD = 24;

export interface MarketSummary {
  currentPrice: number;
  bid: number | null;
  ask: number | null;
  volume24h: number | null;
  priceChange24h: number | null;
  atr: number | null;
  volatility: number | null;
  isRangeMarket: boolean;
  band: PriceBand;
  rangePercent: number;
}

export interface GridRange {
  band: PriceBand;
  rangePercent: number;
  source: 'dynamic' | 'static' | 'fallback';
}

export class MarketAnalyzer {
  private readonly exchange: GridExchangeClient;
  private readonly config: BotConfig;
  private readonly logger: Logger;

  constructor(exchange: GridExchangeClient, config: BotConfig, logger: Logger) {
    this.exchange = exchange;
    this.config = config;
    this.logger = logger;
  }

  async currentPrice(): Promise<Result<number>> {
    const ticker = await attempt('fetch_ticker', () => this.exchange.getTicker());
    if (!ticker.ok) return ticker;
    const last = ticker.value.lastPrice;
    if (last === null || !(last > 0)) {
      return fail(new DataUnavailableError(`ticker_unavailable:${this.exchange.symbol}`));
    }
    return ok(last);
  }

  private candles(limit: number): Promise<Result<Candle[]>> {
    return attempt('fetch_candles', () => this.exchange.getCandles(this.config.grid.candleTimeframe, limit));
  }

  async averageTrueRange(period = this.config.grid.atrPeriod): Promise<Result<number>> {
    const candles = await this.candles(period + 1);
    if (!candles.ok) return candles;
    try {
      const atr = averageTrueRange(candles.value, period);
      this.logger.debug('market_atr', { event: 'market_atr', period, atr });
      return ok(atr);
    } catch (error) {
      this.logger.warn('market_atr_unavailable', {
        event: 'market_atr_unavailable',
        period,
        received: candles.value.length,
      });
      return fail(toDataError(error));
    }
  }

  async volatility(period = DEFAULT_VOLATILITY_PERIOD): Promise<Result<number>> {
    const candles = await this.candles(period);
    if (!candles.ok) return candles;
    try {
      const volatility = returnsVolatility(candles.value, period);
      this.logger.debug('market_volatility', { event: 'market_volatility', period, volatility });
      return ok(volatility);
    } catch (error) {
      this.logger.warn('market_volatility_unavailable', {
        event: 'market_volatility_unavailable',
        period,
        received: candles.value.length,
      });
      return fail(toDataError(error));
    }
  }

  /** Defaults to true whenever the window cannot be evaluated. */
  async isRangeMarket(threshold = this.config.grid.rangeMarketThreshold): Promise<boolean> {
    const candles = await this.candles(RANGE_WINDOW_CANDLES);
    if (!candles.ok || candles.value.length < RANGE_WINDOW_CANDLES) {
      this.logger.warn('range_market_insufficient_data', {
        event: 'range_market_insufficient_data',
        received: candles.ok ? candles.value.length : 0,
      });
      return true;
    }
    const deviation = rangeDeviation(candles.value.slice(-RANGE_WINDOW_CANDLES));
    if (deviation === null) return true;
    const isRange = deviation < threshold;
    this.logger.debug('range_market_check', {
      event: 'range_market_check',
      deviation,
      threshold,
      isRange,
    });
    return isRange;
  }

  async optimalGridRange(currentPrice: number): Promise<GridRange> {
    if (!this.config.grid.dynamicRange) {
      return this.rangeFromAtr(currentPrice, null);
    }
    return this.rangeFromAtr(currentPrice, await this.averageTrueRange());
  }

  private rangeFromAtr(currentPrice: number, atr: Result<number> | null): GridRange {
    const grid = this.config.grid;
    if (!atr) {
      return { band: bandAround(currentPrice, grid.rangePercent), rangePercent: grid.rangePercent, source: 'static' };
    }
    if (!atr.ok) {
      this.logger.warn('grid_range_fallback', {
        event: 'grid_range_fallback',
        rangePercent: grid.rangePercent,
        error: atr.error.message,
      });
      return { band: bandAround(currentPrice, grid.rangePercent), rangePercent: grid.rangePercent, source: 'fallback' };
    }
    const rangePercent = clamp((atr.value * grid.atrMultiplier) / currentPrice, grid.minRangePercent, grid.maxRangePercent);
    this.logger.info('grid_range_dynamic', {
      event: 'grid_range_dynamic',
      atr: atr.value,
      rangePercent,
    });
    return { band: bandAround(currentPrice, rangePercent), rangePercent, source: 'dynamic' };
  }

  async marketSummary(): Promise<Result<MarketSummary>> {
    const ticker = await attempt('fetch_ticker', () => this.exchange.getTicker());
    if (!ticker.ok) return ticker;
    const price = ticker.value.lastPrice;
    if (price === null || !(price > 0)) {
      return fail(new DataUnavailableError(`ticker_unavailable:${this.exchange.symbol}`));
    }
    const atr = await this.averageTrueRange();
    const volatility = await this.volatility();
    const isRangeMarket = await this.isRangeMarket();
    const range = this.rangeFromAtr(price, this.config.grid.dynamicRange ? atr : null);
    return ok({
      currentPrice: price,
      bid: ticker.value.bid,
      ask: ticker.value.ask,
      volume24h: ticker.value.volume24h,
      priceChange24h: ticker.value.priceChange24h,
      atr: atr.ok ? atr.value : null,
      volatility: volatility.ok ? volatility.value : null,
      isRangeMarket,
      band: range.band,
      rangePercent: range.rangePercent,
    });
  }
}

function toDataError(error: unknown): DataUnavailableError {
  if (error instanceof DataUnavailableError) return error;
  return new DataUnavailableError(error instanceof Error ? error.message : String(error), { cause: error });
}

import type { GridConfig, GridLevel, PriceBand } from '../types';
import type { Logger } from '../../utils/logger';

/** Fraction of the band width the price may wander outside before a rebuild. */
export const REBALANCE_BUFFER_RATIO = 0.1;

export interface GridBuild {
  config: GridConfig;
  buyLevels: GridLevel[];
  sellLevels: GridLevel[];
}

export interface GridStatus {
  band: PriceBand | null;
  step: number | null;
  centerPrice: number | null;
  buyLevels: number;
  sellLevels: number;
  lastBuildTime: number | null;
}

/**
 * Rungs at current ± i·step for i in 1..floor(count/2), dropping any that
 * leave the band. Buys come back closest-first (descending), sells
 * ascending. Pure: identical inputs give identical ladders.
 */
export function buildLevels(
  currentPrice: number,
  band: PriceBand,
  count: number,
  offsetPercent = 0,
  builtAt = 0
): GridBuild {
  const step = count > 0 ? (band.upper - band.lower) / count : 0;
  const config: GridConfig = {
    lowerPrice: band.lower,
    upperPrice: band.upper,
    step,
    levelCount: count,
    centerPrice: currentPrice,
    builtAt,
  };
  const buyLevels: GridLevel[] = [];
  const sellLevels: GridLevel[] = [];
  if (!(step > 0) || !(currentPrice > 0)) {
    return { config, buyLevels, sellLevels };
  }

  const perSide = Math.floor(count / 2);
  for (let rung = 1; rung <= perSide; rung++) {
    const buyPrice = currentPrice - rung * step;
    if (buyPrice >= band.lower && buyPrice > 0) {
      buyLevels.push({
        side: 'buy',
        rung,
        targetPrice: buyPrice,
        adjustedPrice: buyPrice * (1 - offsetPercent),
      });
    }
    const sellPrice = currentPrice + rung * step;
    if (sellPrice <= band.upper) {
      sellLevels.push({
        side: 'sell',
        rung,
        targetPrice: sellPrice,
        adjustedPrice: sellPrice * (1 + offsetPercent),
      });
    }
  }
  return { config, buyLevels, sellLevels };
}

/**
 * Time floor first, then a range breach beyond the band plus a 10%-of-width
 * buffer on either side. Both must hold.
 */
export function shouldRebalance(
  currentPrice: number,
  lastBuildTime: number,
  band: PriceBand,
  updateIntervalMs: number,
  now: number
): boolean {
  if (now - lastBuildTime < updateIntervalMs) {
    return false;
  }
  const buffer = (band.upper - band.lower) * REBALANCE_BUFFER_RATIO;
  return currentPrice < band.lower - buffer || currentPrice > band.upper + buffer;
}

/** Base-asset quantity per rung from deployable capital. */
export function computeOrderSize(
  capital: number,
  currentPrice: number,
  levelCount: number,
  maxPositionRatio: number,
  leverage: number
): number {
  if (!(capital > 0) || !(currentPrice > 0) || !(levelCount > 0)) return 0;
  const perLevelQuote = (capital * maxPositionRatio * leverage) / levelCount;
  return perLevelQuote / currentPrice;
}

/** One full buy/sell cycle on a rung, net of maker fees on both legs. */
export function expectedRoundTripProfitPercent(step: number, fillPrice: number, makerFee: number): number {
  if (!(fillPrice > 0)) return 0;
  return step / fillPrice - makerFee * 2;
}

export class GridEngine {
  private current: GridBuild | null = null;
  private readonly logger: Logger;
  private readonly offsetPercent: number;

  constructor(options: { logger: Logger; offsetPercent: number }) {
    this.logger = options.logger;
    this.offsetPercent = options.offsetPercent;
  }

  rebuild(currentPrice: number, band: PriceBand, count: number, now: number): GridBuild {
    const build = buildLevels(currentPrice, band, count, this.offsetPercent, now);
    this.current = build;
    this.logger.info('grid_built', {
      event: 'grid_built',
      currentPrice,
      lower: band.lower,
      upper: band.upper,
      step: build.config.step,
      levelCount: count,
      buyLevels: build.buyLevels.length,
      sellLevels: build.sellLevels.length,
      rangePercent: currentPrice > 0 ? ((band.upper - band.lower) / (2 * currentPrice)) * 100 : 0,
    });
    return build;
  }

  needsRebalance(currentPrice: number, updateIntervalMs: number, now: number): boolean {
    if (!this.current) return true;
    const band = this.band();
    const due = band ? shouldRebalance(currentPrice, this.current.config.builtAt, band, updateIntervalMs, now) : true;
    if (due) {
      this.logger.warn('grid_out_of_range', {
        event: 'grid_out_of_range',
        currentPrice,
        lower: this.current.config.lowerPrice,
        upper: this.current.config.upperPrice,
      });
    }
    return due;
  }

  step(): number | null {
    return this.current ? this.current.config.step : null;
  }

  band(): PriceBand | null {
    return this.current ? { lower: this.current.config.lowerPrice, upper: this.current.config.upperPrice } : null;
  }

  levels(): GridLevel[] {
    return this.current ? [...this.current.buyLevels, ...this.current.sellLevels] : [];
  }

  status(): GridStatus {
    return {
      band: this.band(),
      step: this.step(),
      centerPrice: this.current ? this.current.config.centerPrice : null,
      buyLevels: this.current ? this.current.buyLevels.length : 0,
      sellLevels: this.current ? this.current.sellLevels.length : 0,
      lastBuildTime: this.current ? this.current.config.builtAt : null,
    };
  }
}

import type { Candle, PriceBand } from '../strategies/types';
import { InsufficientDataError } from '../errors';

export function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

/**
 * True range per bar, anchored on the previous close. The first candle only
 * supplies the anchor, so n candles produce n - 1 ranges.
 */
export function trueRanges(candles: Candle[]): number[] {
  const ranges: number[] = [];
  for (let i = 1; i < candles.length; i++) {
    const prevClose = candles[i - 1].close;
    const { high, low } = candles[i];
    ranges.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
  }
  return ranges;
}

/** Arithmetic mean of the last `period` true ranges. Needs period + 1 candles. */
export function averageTrueRange(candles: Candle[], period: number): number {
  if (period <= 0 || candles.length < period + 1) {
    throw new InsufficientDataError('atr', period + 1, candles.length);
  }
  const slice = trueRanges(candles).slice(-period);
  return slice.reduce((sum, v) => sum + v, 0) / slice.length;
}

/**
 * Population standard deviation of simple close-to-close returns across the
 * last `period` candles, in percent.
 */
export function returnsVolatility(candles: Candle[], period: number): number {
  if (period < 2 || candles.length < period) {
    throw new InsufficientDataError('volatility', period, candles.length);
  }
  const window = candles.slice(-period);
  const returns: number[] = [];
  for (let i = 1; i < window.length; i++) {
    const prev = window[i - 1].close;
    if (prev <= 0) continue;
    returns.push((window[i].close - prev) / prev);
  }
  if (!returns.length) return 0;
  const mean = returns.reduce((s, r) => s + r, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + Math.pow(r - mean, 2), 0) / returns.length;
  return Math.sqrt(variance) * 100;
}

/**
 * Distance of the latest close from the midpoint of the window's high/low
 * span, relative to half that span. 0 sits on the midpoint, 1 on an edge.
 * Returns null for a flat window.
 */
export function rangeDeviation(candles: Candle[]): number | null {
  if (!candles.length) return null;
  const maxHigh = Math.max(...candles.map((c) => c.high));
  const minLow = Math.min(...candles.map((c) => c.low));
  const halfSpan = (maxHigh - minLow) / 2;
  if (halfSpan <= 0) return null;
  const center = (maxHigh + minLow) / 2;
  return Math.abs(candles[candles.length - 1].close - center) / halfSpan;
}

export function bandAround(price: number, rangePercent: number): PriceBand {
  return {
    lower: price * (1 - rangePercent),
    upper: price * (1 + rangePercent),
  };
}

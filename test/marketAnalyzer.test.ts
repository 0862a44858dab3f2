import { beforeEach, describe, expect, it } from 'vitest';
import { MarketAnalyzer } from '../src/analytics/marketAnalyzer';
import { DataUnavailableError } from '../src/errors';
import { FakeExchange, flatCandles } from './helpers/fakeExchange';
import { recordingLogger } from './helpers/testLogger';
import { testConfig } from './helpers/testConfig';

describe('MarketAnalyzer', () => {
  let exchange: FakeExchange;

  beforeEach(() => {
    exchange = new FakeExchange();
  });

  function analyzer(env: Record<string, string> = {}) {
    return new MarketAnalyzer(exchange, testConfig(env), recordingLogger());
  }

  it('returns the last traded price', async () => {
    const price = await analyzer().currentPrice();
    expect(price).toEqual({ ok: true, value: 50000 });
  });

  it('reports an unavailable ticker as a data error', async () => {
    exchange.failOn('getTicker');
    const failed = await analyzer().currentPrice();
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error).toBeInstanceOf(DataUnavailableError);
      expect(failed.error.message).toBe('fetch_ticker: getTicker_unavailable');
    }

    exchange.recover('getTicker');
    exchange.lastPrice = null;
    const empty = await analyzer().currentPrice();
    expect(empty.ok).toBe(false);
  });

  it('derives a dynamic range from ATR', async () => {
    // every bar spans 1000 around a flat close, so ATR = 1000
    exchange.candles = flatCandles(30, 50000, 500);
    const range = await analyzer({ GRID_DYNAMIC_RANGE: 'true' }).optimalGridRange(50000);
    expect(range.source).toBe('dynamic');
    expect(range.rangePercent).toBeCloseTo(0.04, 10);
    expect(range.band.lower).toBeCloseTo(48000, 6);
    expect(range.band.upper).toBeCloseTo(52000, 6);
  });

  it('clamps the dynamic range to the configured bounds', async () => {
    exchange.candles = flatCandles(30, 50000, 2500);
    const wide = await analyzer({ GRID_DYNAMIC_RANGE: 'true' }).optimalGridRange(50000);
    expect(wide.rangePercent).toBe(0.08);

    exchange.candles = flatCandles(30, 50000, 50);
    const narrow = await analyzer({ GRID_DYNAMIC_RANGE: 'true' }).optimalGridRange(50000);
    expect(narrow.rangePercent).toBe(0.02);
  });

  it('falls back to the static percent when ATR cannot be computed', async () => {
    exchange.candles = flatCandles(5, 50000, 500);
    const range = await analyzer({ GRID_DYNAMIC_RANGE: 'true' }).optimalGridRange(50000);
    expect(range.source).toBe('fallback');
    expect(range.rangePercent).toBe(0.05);
  });

  it('uses the static percent when dynamic mode is off', async () => {
    exchange.candles = flatCandles(30, 50000, 500);
    const range = await analyzer().optimalGridRange(50000);
    expect(range.source).toBe('static');
    expect(range.band.lower).toBeCloseTo(47500, 6);
    expect(range.band.upper).toBeCloseTo(52500, 6);
  });

  it('classifies range markets from the last 24 candles', async () => {
    const candles = flatCandles(24, 100, 10);
    candles[23] = { ...candles[23], close: 109 };
    exchange.candles = candles;
    expect(await analyzer().isRangeMarket(0.7)).toBe(false);

    candles[23] = { ...candles[23], close: 101 };
    exchange.candles = candles;
    expect(await analyzer().isRangeMarket(0.7)).toBe(true);
  });

  it('treats missing history as a range market', async () => {
    exchange.candles = flatCandles(10, 100, 10);
    expect(await analyzer().isRangeMarket()).toBe(true);
    exchange.failOn('getCandles');
    expect(await analyzer().isRangeMarket()).toBe(true);
  });

  it('summarises the market with nulls for what could not be computed', async () => {
    const summary = await analyzer().marketSummary();
    expect(summary.ok).toBe(true);
    if (summary.ok) {
      expect(summary.value.currentPrice).toBe(50000);
      expect(summary.value.atr).toBeNull();
      expect(summary.value.volatility).toBeNull();
      expect(summary.value.isRangeMarket).toBe(true);
      expect(summary.value.rangePercent).toBe(0.05);
      expect(summary.value.volume24h).toBe(1234);
    }
  });
});

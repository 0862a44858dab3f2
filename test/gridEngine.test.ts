import { describe, expect, it } from 'vitest';
import {
  GridEngine,
  buildLevels,
  computeOrderSize,
  expectedRoundTripProfitPercent,
  shouldRebalance,
} from '../src/strategies/grid/gridEngine';
import { applyBalanceTier, selectBalanceTier } from '../src/strategies/grid/balanceTiers';
import { recordingLogger } from './helpers/testLogger';
import { testConfig } from './helpers/testConfig';

describe('buildLevels', () => {
  const band = { lower: 90, upper: 110 };

  it('spaces rungs one step apart on each side of the price', () => {
    const build = buildLevels(100, band, 10);
    expect(build.config.step).toBe(2);
    expect(build.buyLevels.map((l) => l.targetPrice)).toEqual([98, 96, 94, 92, 90]);
    expect(build.sellLevels.map((l) => l.targetPrice)).toEqual([102, 104, 106, 108, 110]);
    expect(build.buyLevels.map((l) => l.rung)).toEqual([1, 2, 3, 4, 5]);
  });

  it('keeps every buy below and every sell above the build price', () => {
    for (const price of [91, 95.5, 100, 104, 109]) {
      for (const count of [5, 6, 10, 21]) {
        const build = buildLevels(price, band, count);
        expect(build.buyLevels.every((l) => l.targetPrice < price)).toBe(true);
        expect(build.sellLevels.every((l) => l.targetPrice > price)).toBe(true);
        expect(build.buyLevels.length).toBeLessThanOrEqual(Math.floor(count / 2));
        expect(build.sellLevels.length).toBeLessThanOrEqual(Math.floor(count / 2));
        expect(build.buyLevels.length + build.sellLevels.length).toBeLessThanOrEqual(count);
      }
    }
  });

  it('drops rungs outside the band instead of clamping them', () => {
    const build = buildLevels(105, band, 10);
    expect(build.buyLevels.map((l) => l.targetPrice)).toEqual([103, 101, 99, 97, 95]);
    expect(build.sellLevels.map((l) => l.targetPrice)).toEqual([107, 109]);
  });

  it('offsets buys down and sells up', () => {
    const build = buildLevels(100, band, 10, 0.001);
    expect(build.buyLevels[0].adjustedPrice).toBeCloseTo(97.902, 10);
    expect(build.sellLevels[0].adjustedPrice).toBeCloseTo(102.102, 10);
  });

  it('is deterministic for identical inputs', () => {
    expect(buildLevels(100, band, 10, 0.0001, 7)).toEqual(buildLevels(100, band, 10, 0.0001, 7));
  });

  it('uses integer division for odd counts', () => {
    const build = buildLevels(100, band, 5);
    expect(build.config.step).toBe(4);
    expect(build.buyLevels).toHaveLength(2);
    expect(build.sellLevels).toHaveLength(2);
  });

  it('returns no levels for a collapsed band', () => {
    const build = buildLevels(100, { lower: 100, upper: 100 }, 10);
    expect(build.buyLevels).toEqual([]);
    expect(build.sellLevels).toEqual([]);
  });
});

describe('shouldRebalance', () => {
  const band = { lower: 90, upper: 110 };

  it('never rebuilds before the update interval elapses', () => {
    expect(shouldRebalance(200, 0, band, 1000, 999)).toBe(false);
    expect(shouldRebalance(1, 0, band, 1000, 500)).toBe(false);
  });

  it('needs a breach beyond the 10% width buffer once the interval has elapsed', () => {
    expect(shouldRebalance(100, 0, band, 1000, 1000)).toBe(false);
    expect(shouldRebalance(111, 0, band, 1000, 1000)).toBe(false);
    expect(shouldRebalance(112.5, 0, band, 1000, 1000)).toBe(true);
    expect(shouldRebalance(87.9, 0, band, 1000, 5000)).toBe(true);
  });
});

describe('sizing', () => {
  it('splits deployable capital across the ladder', () => {
    // 1000 * 0.6 * 2 / 20 = 60 quote per rung
    expect(computeOrderSize(1000, 50000, 20, 0.6, 2)).toBeCloseTo(0.0012, 12);
    expect(computeOrderSize(0, 50000, 20, 0.6, 2)).toBe(0);
  });

  it('nets both maker fees out of the round trip', () => {
    expect(expectedRoundTripProfitPercent(200, 50000, 0.0002)).toBeCloseTo(0.0036, 12);
  });
});

describe('GridEngine', () => {
  it('requires a build before anything else', () => {
    const engine = new GridEngine({ logger: recordingLogger(), offsetPercent: 0 });
    expect(engine.needsRebalance(100, 1000, 0)).toBe(true);
    expect(engine.status()).toEqual({
      band: null,
      step: null,
      centerPrice: null,
      buyLevels: 0,
      sellLevels: 0,
      lastBuildTime: null,
    });
  });

  it('replaces the ladder wholesale on rebuild', () => {
    const logger = recordingLogger();
    const engine = new GridEngine({ logger, offsetPercent: 0 });
    engine.rebuild(100, { lower: 90, upper: 110 }, 10, 1_000);
    expect(engine.status()).toEqual({
      band: { lower: 90, upper: 110 },
      step: 2,
      centerPrice: 100,
      buyLevels: 5,
      sellLevels: 5,
      lastBuildTime: 1_000,
    });
    expect(engine.needsRebalance(120, 3_600_000, 2_000)).toBe(false);
    expect(engine.needsRebalance(120, 3_600_000, 3_601_000)).toBe(true);

    engine.rebuild(120, { lower: 114, upper: 126 }, 6, 3_601_000);
    expect(engine.step()).toBe(2);
    expect(engine.levels().map((l) => l.targetPrice)).toEqual([118, 116, 114, 122, 124, 126]);
    expect(logger.events('grid_built')).toHaveLength(2);
  });
});

describe('balance tiers', () => {
  it('selects the tier by total balance', () => {
    expect(selectBalanceTier(299)).toBeNull();
    expect(selectBalanceTier(300)?.levelCount).toBe(6);
    expect(selectBalanceTier(499.99)?.levelCount).toBe(6);
    expect(selectBalanceTier(500)?.levelCount).toBe(10);
    expect(selectBalanceTier(1500)?.rangePercent).toBe(0.045);
    expect(selectBalanceTier(5000)?.levelCount).toBe(40);
    expect(selectBalanceTier(250000)?.maxPositionRatio).toBe(0.55);
  });

  it('overrides grid count, range and position ratio', () => {
    const tier = selectBalanceTier(900);
    expect(tier).not.toBeNull();
    if (!tier) return;
    const config = applyBalanceTier(testConfig({ GRID_LEVERAGE: '3' }), tier);
    expect(config.grid.levelCount).toBe(15);
    expect(config.grid.rangePercent).toBe(0.04);
    expect(config.risk.maxPositionRatio).toBe(0.7);
    expect(config.leverage).toBe(2);
  });
});

import type { BotConfig } from '../../config';

export interface BalanceTier {
  minBalance: number;
  maxBalance: number;
  levelCount: number;
  rangePercent: number;
  maxPositionRatio: number;
  leverage: number;
  label: string;
}

export const MIN_TIER_BALANCE = 300;

// smaller accounts run fewer, wider rungs and keep more margin free
export const BALANCE_TIERS: readonly BalanceTier[] = [
  { minBalance: 300, maxBalance: 500, levelCount: 6, rangePercent: 0.03, maxPositionRatio: 0.85, leverage: 2, label: 'conservative' },
  { minBalance: 500, maxBalance: 800, levelCount: 10, rangePercent: 0.035, maxPositionRatio: 0.75, leverage: 2, label: 'balanced' },
  { minBalance: 800, maxBalance: 1200, levelCount: 15, rangePercent: 0.04, maxPositionRatio: 0.7, leverage: 2, label: 'standard' },
  { minBalance: 1200, maxBalance: 2000, levelCount: 20, rangePercent: 0.045, maxPositionRatio: 0.65, leverage: 2, label: 'active' },
  { minBalance: 2000, maxBalance: 5000, levelCount: 30, rangePercent: 0.05, maxPositionRatio: 0.6, leverage: 2, label: 'high_frequency' },
  { minBalance: 5000, maxBalance: Number.POSITIVE_INFINITY, levelCount: 40, rangePercent: 0.05, maxPositionRatio: 0.55, leverage: 2, label: 'max_efficiency' },
];

export function selectBalanceTier(balance: number): BalanceTier | null {
  if (!(balance >= MIN_TIER_BALANCE)) return null;
  return BALANCE_TIERS.find((tier) => balance >= tier.minBalance && balance < tier.maxBalance) ?? null;
}

export function applyBalanceTier(config: BotConfig, tier: BalanceTier): BotConfig {
  return {
    ...config,
    leverage: tier.leverage,
    grid: { ...config.grid, levelCount: tier.levelCount, rangePercent: tier.rangePercent },
    risk: { ...config.risk, maxPositionRatio: tier.maxPositionRatio },
  };
}

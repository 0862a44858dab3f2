import { loadBotConfig, type BotConfig } from '../../src/config';

export const TEST_ENV: Record<string, string> = {
  EXCHANGE_API_KEY: 'test-key',
  EXCHANGE_API_SECRET: 'test-secret',
  GRID_COUNT: '10',
  GRID_RANGE_PCT: '0.05',
  GRID_DYNAMIC_RANGE: 'false',
  ORDER_OFFSET_PCT: '0',
  TRADE_HISTORY: 'false',
};

export function testConfig(env: Record<string, string> = {}): BotConfig {
  return loadBotConfig({ ...TEST_ENV, ...env });
}

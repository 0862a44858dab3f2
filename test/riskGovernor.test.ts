import { describe, expect, it } from 'vitest';
import { RiskGovernor } from '../src/risk/riskGovernor';
import type { RiskLimits } from '../src/risk/types';
import { recordingLogger } from './helpers/testLogger';

const LIMITS: RiskLimits = {
  dailyLossLimit: 0.05,
  maxDrawdown: 0.15,
  dailyProfitTarget: 0.02,
  maxPositionRatio: 0.6,
  stopLossPercent: 0.1,
  balanceFloorRatio: 0.5,
};

const DAY_ONE = Date.UTC(2024, 0, 15, 12);
const DAY_TWO = Date.UTC(2024, 0, 16, 0, 5);

function governor(limits: Partial<RiskLimits> = {}) {
  const clock = { now: DAY_ONE };
  const logger = recordingLogger();
  const risk = new RiskGovernor({ ...LIMITS, ...limits }, { logger, clock: () => clock.now });
  return { risk, clock, logger };
}

describe('RiskGovernor', () => {
  it('seeds every baseline from the starting balance', () => {
    const { risk } = governor();
    risk.initialize(1000);
    expect(risk.state).toMatchObject({
      startBalance: 1000,
      dailyStartBalance: 1000,
      peakBalance: 1000,
      stopped: false,
      stopReason: null,
      initializedAt: DAY_ONE,
      tradingDay: '2024-01-15',
    });
  });

  it('breaches the daily loss limit at 6% but not at 4%', () => {
    const { risk, logger } = governor();
    risk.initialize(1000);
    const ok = risk.checkDailyLoss(960);
    expect(ok.breached).toBe(false);
    expect(ok.value).toBeCloseTo(0.04, 12);

    const breach = risk.checkDailyLoss(940);
    expect(breach.breached).toBe(true);
    expect(breach.value).toBeCloseTo(0.06, 12);
    expect(logger.events('risk_alert').map((e) => e.meta.type)).toEqual(['DAILY_LOSS']);
  });

  it('resets the daily baseline on a calendar-day rollover before measuring', () => {
    const { risk, clock } = governor();
    risk.initialize(1000);
    clock.now = DAY_TWO;
    expect(risk.checkDailyLoss(900).breached).toBe(false);
    expect(risk.state.dailyStartBalance).toBe(900);
    expect(risk.state.tradingDay).toBe('2024-01-16');
    expect(risk.checkDailyLoss(850).breached).toBe(true);
  });

  it('raises the peak before measuring drawdown', () => {
    const { risk } = governor();
    risk.initialize(1000);
    expect(risk.checkDrawdown(1200).breached).toBe(false);
    expect(risk.state.peakBalance).toBe(1200);
    const check = risk.checkDrawdown(1000);
    expect(check.breached).toBe(true);
    expect(check.value).toBeCloseTo(200 / 1200, 12);
    expect(risk.state.peakBalance).toBe(1200);
  });

  it('latches the first stop reason for the life of the process', () => {
    const { risk } = governor();
    risk.initialize(1000);
    const first = risk.shouldStop(940);
    expect(first).toEqual({ stopped: true, reason: 'daily_loss_limit: loss 6.00% >= 5.00%' });

    const recovered = risk.shouldStop(2000);
    expect(recovered).toEqual(first);
    expect(risk.state.stopped).toBe(true);
  });

  it('reports drawdown when the daily loss is within limits', () => {
    const { risk, clock } = governor();
    risk.initialize(1000);
    risk.shouldStop(1200);
    clock.now = DAY_TWO;
    risk.shouldStop(1000);
    expect(risk.state.stopReason).toBe('max_drawdown: drawdown 16.67% >= 15.00%');
  });

  it('stops below half of the starting balance', () => {
    const { risk, logger } = governor({ dailyLossLimit: 0.6, maxDrawdown: 0.6 });
    risk.initialize(1000);
    expect(risk.shouldStop(450)).toEqual({ stopped: true, reason: 'balance_floor: 450.00 < 500.00' });
    expect(logger.events('risk_alert').map((e) => e.meta.type)).toEqual(['LOW_BALANCE']);
  });

  it('keeps trading inside every limit', () => {
    const { risk } = governor();
    risk.initialize(1000);
    expect(risk.shouldStop(980)).toEqual({ stopped: false, reason: null });
  });

  it('signals the daily profit target without stopping', () => {
    const { risk } = governor();
    risk.initialize(1000);
    expect(risk.checkDailyProfitTarget(1010)).toBe(false);
    expect(risk.checkDailyProfitTarget(1025)).toBe(true);
    expect(risk.shouldStop(1025).stopped).toBe(false);
  });

  it('counts trades, wins and cumulative pnl', () => {
    const { risk } = governor();
    risk.initialize(1000);
    risk.recordTrade(2, true);
    risk.recordTrade(-1, false);
    expect(risk.state.totalTrades).toBe(2);
    expect(risk.state.winningTrades).toBe(1);
    expect(risk.state.cumulativePnl).toBe(1);
    expect(risk.winRate()).toBe(50);
  });

  it('checks position size against the configured ratio', () => {
    const { risk, logger } = governor();
    risk.initialize(1000);
    expect(risk.checkPositionSize(500, 1000).breached).toBe(false);
    const breach = risk.checkPositionSize(700, 1000);
    expect(breach.breached).toBe(true);
    expect(breach.value).toBe(0.7);
    expect(risk.checkPositionSize(100, 0).breached).toBe(true);
    expect(logger.events('risk_alert').map((e) => e.meta.type)).toEqual(['POSITION_SIZE', 'POSITION_SIZE']);
  });

  it('prices stop losses away from the entry', () => {
    const { risk } = governor();
    expect(risk.stopLossPrice(100, 'buy')).toBeCloseTo(90, 10);
    expect(risk.stopLossPrice(100, 'sell')).toBeCloseTo(110, 10);
  });

  it('reports returns relative to the start and daily baselines', () => {
    const { risk } = governor();
    risk.initialize(1000);
    const metrics = risk.metrics(1100);
    expect(metrics.totalReturn).toBeCloseTo(10, 10);
    expect(metrics.dailyReturn).toBeCloseTo(10, 10);
    expect(metrics.drawdown).toBe(0);
    expect(metrics.stopped).toBe(false);

    risk.resetDaily(1100);
    expect(risk.dailyReturn(1100)).toBe(0);
  });
});

import type { OrderSide } from '../strategies/types';
import type { Logger } from '../utils/logger';
import type { LimitCheck, RiskAlertType, RiskLimits, RiskMetrics, RiskState, StopDecision } from './types';

export interface RiskGovernorOptions {
  logger: Logger;
  clock?: () => number;
}

function tradingDayOf(ms: number) {
  return new Date(ms).toISOString().slice(0, 10);
}

function ratio(numerator: number, denominator: number) {
  return denominator > 0 ? numerator / denominator : 0;
}

function pct(value: number) {
  return `${(value * 100).toFixed(2)}%`;
}

/**
 * Balance bookkeeping and the latched stop decision. Everything here is
 * synchronous; the controller feeds it balances it has already fetched.
 */
export class RiskGovernor {
  private readonly limits: RiskLimits;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly riskState: RiskState = {
    startBalance: 0,
    dailyStartBalance: 0,
    peakBalance: 0,
    totalTrades: 0,
    winningTrades: 0,
    cumulativePnl: 0,
    stopped: false,
    stopReason: null,
    initializedAt: null,
    tradingDay: null,
  };

  constructor(limits: RiskLimits, options: RiskGovernorOptions) {
    this.limits = { ...limits };
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
  }

  get state(): Readonly<RiskState> {
    return { ...this.riskState };
  }

  isInitialized() {
    return this.riskState.initializedAt !== null;
  }

  initialize(balance: number) {
    const now = this.clock();
    this.riskState.startBalance = balance;
    this.riskState.dailyStartBalance = balance;
    this.riskState.peakBalance = balance;
    this.riskState.initializedAt = now;
    this.riskState.tradingDay = tradingDayOf(now);
    this.logger.info('risk_initialized', {
      event: 'risk_initialized',
      balance,
      dailyLossLimit: this.limits.dailyLossLimit,
      maxDrawdown: this.limits.maxDrawdown,
      maxPositionRatio: this.limits.maxPositionRatio,
    });
  }

  resetDaily(balance: number) {
    this.riskState.dailyStartBalance = balance;
    this.riskState.tradingDay = tradingDayOf(this.clock());
    this.logger.info('risk_daily_reset', { event: 'risk_daily_reset', balance });
  }

  checkDailyLoss(balance: number): LimitCheck {
    const today = tradingDayOf(this.clock());
    if (this.riskState.tradingDay !== today) {
      this.resetDaily(balance);
    }
    const loss = ratio(this.riskState.dailyStartBalance - balance, this.riskState.dailyStartBalance);
    const breached = this.riskState.dailyStartBalance > 0 && loss >= this.limits.dailyLossLimit;
    if (breached) {
      this.alert('DAILY_LOSS', `daily loss ${pct(loss)} reached limit ${pct(this.limits.dailyLossLimit)}`, {
        balance,
        dailyStartBalance: this.riskState.dailyStartBalance,
      });
    }
    return { breached, value: loss, limit: this.limits.dailyLossLimit };
  }

  checkDrawdown(balance: number): LimitCheck {
    if (balance > this.riskState.peakBalance) {
      this.riskState.peakBalance = balance;
    }
    const drawdown = ratio(this.riskState.peakBalance - balance, this.riskState.peakBalance);
    const breached = this.riskState.peakBalance > 0 && drawdown >= this.limits.maxDrawdown;
    if (breached) {
      this.alert('MAX_DRAWDOWN', `drawdown ${pct(drawdown)} reached limit ${pct(this.limits.maxDrawdown)}`, {
        balance,
        peakBalance: this.riskState.peakBalance,
      });
    }
    return { breached, value: drawdown, limit: this.limits.maxDrawdown };
  }

  /** Latches on the first breached condition; later calls report the same reason. */
  shouldStop(balance: number): StopDecision {
    if (this.riskState.stopped) {
      return { stopped: true, reason: this.riskState.stopReason };
    }

    let reason: string | null = null;
    const dailyLoss = this.checkDailyLoss(balance);
    if (dailyLoss.breached) {
      reason = `daily_loss_limit: loss ${pct(dailyLoss.value)} >= ${pct(dailyLoss.limit)}`;
    } else {
      const drawdown = this.checkDrawdown(balance);
      if (drawdown.breached) {
        reason = `max_drawdown: drawdown ${pct(drawdown.value)} >= ${pct(drawdown.limit)}`;
      } else {
        const floor = this.riskState.startBalance * this.limits.balanceFloorRatio;
        if (balance < floor) {
          reason = `balance_floor: ${balance.toFixed(2)} < ${floor.toFixed(2)}`;
          this.alert('LOW_BALANCE', reason, { balance, startBalance: this.riskState.startBalance });
        }
      }
    }

    if (reason === null) {
      return { stopped: false, reason: null };
    }
    this.riskState.stopped = true;
    this.riskState.stopReason = reason;
    this.logger.error('risk_stop_latched', { event: 'risk_stop_latched', reason, balance });
    return { stopped: true, reason };
  }

  /** Non-stopping. True once today's gain reaches the configured target. */
  checkDailyProfitTarget(balance: number): boolean {
    const gain = ratio(balance - this.riskState.dailyStartBalance, this.riskState.dailyStartBalance);
    return this.riskState.dailyStartBalance > 0 && gain >= this.limits.dailyProfitTarget;
  }

  checkPositionSize(positionValue: number, totalBalance: number): LimitCheck {
    if (!(totalBalance > 0)) {
      this.alert('POSITION_SIZE', 'position check against a non-positive balance', { positionValue, totalBalance });
      return { breached: true, value: Number.POSITIVE_INFINITY, limit: this.limits.maxPositionRatio };
    }
    const positionRatio = Math.abs(positionValue) / totalBalance;
    const breached = positionRatio > this.limits.maxPositionRatio;
    if (breached) {
      this.alert(
        'POSITION_SIZE',
        `position ratio ${pct(positionRatio)} exceeds ${pct(this.limits.maxPositionRatio)}`,
        { positionValue, totalBalance }
      );
    }
    return { breached, value: positionRatio, limit: this.limits.maxPositionRatio };
  }

  stopLossPrice(entryPrice: number, side: OrderSide) {
    return side === 'buy'
      ? entryPrice * (1 - this.limits.stopLossPercent)
      : entryPrice * (1 + this.limits.stopLossPercent);
  }

  /** Called once per completed pair. */
  recordTrade(pnl: number, isWin: boolean) {
    this.riskState.totalTrades += 1;
    if (isWin) this.riskState.winningTrades += 1;
    this.riskState.cumulativePnl += pnl;
    this.logger.debug('risk_trade_recorded', {
      event: 'risk_trade_recorded',
      pnl,
      isWin,
      totalTrades: this.riskState.totalTrades,
      cumulativePnl: this.riskState.cumulativePnl,
    });
  }

  /** Percent of completed pairs that closed positive. */
  winRate() {
    return ratio(this.riskState.winningTrades, this.riskState.totalTrades) * 100;
  }

  dailyReturn(balance: number) {
    return ratio(balance - this.riskState.dailyStartBalance, this.riskState.dailyStartBalance) * 100;
  }

  totalReturn(balance: number) {
    return ratio(balance - this.riskState.startBalance, this.riskState.startBalance) * 100;
  }

  metrics(balance: number): RiskMetrics {
    return {
      currentBalance: balance,
      startBalance: this.riskState.startBalance,
      peakBalance: this.riskState.peakBalance,
      dailyStartBalance: this.riskState.dailyStartBalance,
      totalReturn: this.totalReturn(balance),
      dailyReturn: this.dailyReturn(balance),
      drawdown: ratio(Math.max(0, this.riskState.peakBalance - balance), this.riskState.peakBalance) * 100,
      totalTrades: this.riskState.totalTrades,
      winningTrades: this.riskState.winningTrades,
      winRate: this.winRate(),
      cumulativePnl: this.riskState.cumulativePnl,
      stopped: this.riskState.stopped,
      stopReason: this.riskState.stopReason,
    };
  }

  private alert(type: RiskAlertType, message: string, meta: Record<string, unknown>) {
    this.logger.warn('risk_alert', { event: 'risk_alert', type, message, ...meta });
  }
}

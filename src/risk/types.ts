export type RiskAlertType = 'DAILY_LOSS' | 'MAX_DRAWDOWN' | 'LOW_BALANCE' | 'POSITION_SIZE';

export interface RiskLimits {
  dailyLossLimit: number; // fraction of the day's starting balance
  maxDrawdown: number; // fraction of peak balance
  dailyProfitTarget: number;
  maxPositionRatio: number;
  stopLossPercent: number;
  balanceFloorRatio: number; // fraction of start balance
}

export interface RiskState {
  startBalance: number;
  dailyStartBalance: number;
  peakBalance: number;
  totalTrades: number;
  winningTrades: number;
  cumulativePnl: number;
  stopped: boolean;
  stopReason: string | null;
  initializedAt: number | null;
  /** Calendar day (YYYY-MM-DD, UTC) the daily baseline belongs to. */
  tradingDay: string | null;
}

export interface LimitCheck {
  breached: boolean;
  value: number;
  limit: number;
}

export interface StopDecision {
  stopped: boolean;
  reason: string | null;
}

export interface RiskMetrics {
  currentBalance: number;
  startBalance: number;
  peakBalance: number;
  dailyStartBalance: number;
  totalReturn: number;
  dailyReturn: number;
  drawdown: number;
  totalTrades: number;
  winningTrades: number;
  winRate: number;
  cumulativePnl: number;
  stopped: boolean;
  stopReason: string | null;
}

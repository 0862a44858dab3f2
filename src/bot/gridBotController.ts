import { assertValidBotConfig, describeBotConfig, type BotConfig } from '../config';
import type { AccountBalance, GridExchangeClient, PositionSnapshot } from '../exchanges/adapters/types';
import { MarketAnalyzer } from '../analytics/marketAnalyzer';
import { GridEngine, computeOrderSize, expectedRoundTripProfitPercent } from '../strategies/grid/gridEngine';
import { applyBalanceTier, selectBalanceTier } from '../strategies/grid/balanceTiers';
import { LinkIdPolicy } from '../strategies/grid/linkIdPolicy';
import { OrderLedger } from '../strategies/grid/orderLedger';
import type { LadderResult } from '../strategies/grid/orderLedger';
import type { PerformanceSnapshot } from '../strategies/types';
import { RiskGovernor } from '../risk/riskGovernor';
import { TradeJournal } from '../services/tradeJournal';
import type { AlertSink } from '../alerts/telegram';
import type { KillSwitch } from '../guard/killSwitch';
import { RiskLimitBreachError, StartupFailureError } from '../errors';
import { gridRebuildCounter, loopErrorCounter, publishPerformance, riskStopGauge } from '../telemetry/metrics';
import type { Logger } from '../utils/logger';
import { formatError } from '../utils/formatError';
import { attempt } from '../utils/result';
import { sleep as defaultSleep } from '../utils/retry';

export interface GridBotControllerOptions {
  config: BotConfig;
  exchange: GridExchangeClient;
  logger: Logger;
  journal?: TradeJournal;
  alerts?: AlertSink;
  killSwitch?: Pick<KillSwitch, 'isActive' | 'getReason'>;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
}

export type IterationOutcome =
  | { kind: 'ok'; rebalanced: boolean }
  | { kind: 'degraded'; reason: string };

export type ExitReason = 'risk_stop' | 'operator_stop' | 'kill_switch';

export interface RunResult {
  exit: ExitReason;
  reason: string;
  iterations: number;
  performance: PerformanceSnapshot | null;
}

interface Components {
  analyzer: MarketAnalyzer;
  risk: RiskGovernor;
  ledger: OrderLedger;
}

/**
 * The single polling loop. Owns the ledger, risk state and grid exclusively
 * and mutates them only between exchange round trips.
 */
export class GridBotController {
  private config: BotConfig;
  private readonly exchange: GridExchangeClient;
  private readonly logger: Logger;
  private readonly journal: TradeJournal;
  private readonly alerts: AlertSink | null;
  private readonly killSwitch: Pick<KillSwitch, 'isActive' | 'getReason'> | null;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;
  private readonly linkIds: LinkIdPolicy;
  private readonly engine: GridEngine;

  private analyzer: MarketAnalyzer;
  private risk: RiskGovernor;
  private ledger: OrderLedger;

  private initialized = false;
  private ordersPlaced = false;
  private shutDown = false;
  private stopRequested = false;
  private stopReason: string | null = null;
  private iterations = 0;
  private lastPositionCheck = 0;
  private lastPosition: PositionSnapshot | null = null;
  private lastBalance: AccountBalance | null = null;
  /** Per-rung quantity fixed at startup; rebalances reuse it. */
  private orderSize = 0;

  constructor(options: GridBotControllerOptions) {
    this.config = options.config;
    this.exchange = options.exchange;
    this.logger = options.logger;
    this.journal = options.journal ?? new TradeJournal(null, options.logger.child({ component: 'journal' }));
    this.alerts = options.alerts ?? null;
    this.killSwitch = options.killSwitch ?? null;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
    this.linkIds = new LinkIdPolicy(this.clock());
    this.engine = new GridEngine({
      logger: this.logger.child({ component: 'grid_engine' }),
      offsetPercent: this.config.order.offsetPercent,
    });
    const components = this.buildComponents(this.config);
    this.analyzer = components.analyzer;
    this.risk = components.risk;
    this.ledger = components.ledger;
  }

  private buildComponents(config: BotConfig): Components {
    const analyzer = new MarketAnalyzer(this.exchange, config, this.logger.child({ component: 'market_analyzer' }));
    const risk = new RiskGovernor(config.risk, {
      logger: this.logger.child({ component: 'risk_governor' }),
      clock: this.clock,
    });
    const ledger = new OrderLedger({
      exchange: this.exchange,
      linkIds: this.linkIds,
      risk,
      journal: this.journal,
      logger: this.logger.child({ component: 'order_ledger' }),
      makerFee: config.fees.maker,
      settleDelayMs: config.execution.settleDelayMs,
      orderPacingMs: config.execution.orderPacingMs,
      historyLookback: config.execution.historyLookback,
      sleep: this.sleep,
      clock: this.clock,
    });
    return { analyzer, risk, ledger };
  }

  get activeConfig(): BotConfig {
    return this.config;
  }

  get riskGovernor(): RiskGovernor {
    return this.risk;
  }

  get orderLedger(): OrderLedger {
    return this.ledger;
  }

  get gridEngine(): GridEngine {
    return this.engine;
  }

  get iterationCount() {
    return this.iterations;
  }

  async initialize(): Promise<void> {
    assertValidBotConfig(this.config);
    this.logger.info('bot_initializing', { event: 'bot_initializing', ...describeBotConfig(this.config) });

    await this.exchange.connect();
    await this.ledger.cancelAll('startup');
    if (this.config.execution.settleDelayMs > 0) {
      await this.sleep(this.config.execution.settleDelayMs);
    }

    const balance = await attempt('fetch_balance', () => this.exchange.getBalance());
    if (!balance.ok) {
      throw new StartupFailureError('balance_unavailable', { cause: balance.error });
    }
    if (balance.value.available < this.config.execution.minAvailableBalance) {
      throw new StartupFailureError(
        `insufficient_balance: ${balance.value.available} < ${this.config.execution.minAvailableBalance}`
      );
    }
    this.lastBalance = balance.value;

    if (this.config.grid.dynamicTiers) {
      this.applyTier(balance.value.total);
    }
    this.risk.initialize(balance.value.total);

    const summary = await this.analyzer.marketSummary();
    if (!summary.ok) {
      throw new StartupFailureError('market_data_unavailable', { cause: summary.error });
    }
    this.logger.info('market_summary', { event: 'market_summary', ...summary.value });

    await this.setLeverage();

    // sized while the book is empty; later reads have margin reserved by resting rungs
    this.orderSize = computeOrderSize(
      balance.value.available,
      summary.value.currentPrice,
      this.config.grid.levelCount,
      this.config.risk.maxPositionRatio,
      this.config.leverage
    );
    const placed = await this.buildAndPlace(summary.value.currentPrice, summary.value.band);
    if (placed.buyPlaced + placed.sellPlaced === 0) {
      throw new StartupFailureError('no_orders_placed');
    }

    this.initialized = true;
    this.lastPositionCheck = this.clock();
    this.logger.info('bot_initialized', { event: 'bot_initialized', ...placed });
    await this.notify(
      `Grid bot started on ${this.config.symbol}: ${placed.buyPlaced} buys, ${placed.sellPlaced} sells`
    );
  }

  private applyTier(balance: number) {
    const tier = selectBalanceTier(balance);
    if (!tier) {
      this.logger.warn('balance_tier_unavailable', { event: 'balance_tier_unavailable', balance });
      return;
    }
    this.config = applyBalanceTier(this.config, tier);
    const components = this.buildComponents(this.config);
    this.analyzer = components.analyzer;
    this.risk = components.risk;
    this.ledger = components.ledger;
    this.logger.info('balance_tier_applied', {
      event: 'balance_tier_applied',
      balance,
      tier: tier.label,
      levelCount: tier.levelCount,
      rangePercent: tier.rangePercent,
      maxPositionRatio: tier.maxPositionRatio,
    });
  }

  private async setLeverage() {
    if (!this.exchange.setLeverage) return;
    try {
      await this.exchange.setLeverage(this.config.leverage);
    } catch (error) {
      this.logger.warn('set_leverage_failed', {
        event: 'set_leverage_failed',
        leverage: this.config.leverage,
        error: formatError(error),
      });
    }
  }

  private async buildAndPlace(
    currentPrice: number,
    band: { lower: number; upper: number }
  ): Promise<LadderResult> {
    const build = this.engine.rebuild(currentPrice, band, this.config.grid.levelCount, this.clock());
    this.ledger.useGrid(build.config);
    gridRebuildCounter.labels(this.config.symbol).inc();

    const expectedProfit = expectedRoundTripProfitPercent(build.config.step, currentPrice, this.config.fees.maker);
    if (expectedProfit < this.config.order.minProfitPercent) {
      this.logger.warn('grid_profit_below_minimum', {
        event: 'grid_profit_below_minimum',
        expectedProfit,
        minProfitPercent: this.config.order.minProfitPercent,
      });
    } else {
      this.logger.info('grid_expected_profit', { event: 'grid_expected_profit', expectedProfit });
    }

    const result = await this.ledger.placeLadder([...build.buyLevels, ...build.sellLevels], this.orderSize);
    if (result.buyPlaced + result.sellPlaced > 0) {
      this.ordersPlaced = true;
    }
    return result;
  }

  /**
   * One tick. Recoverable failures come back as a degraded outcome; a latched
   * risk stop is raised as RiskLimitBreachError.
   */
  async runIteration(): Promise<IterationOutcome> {
    const now = this.clock();
    const balance = await attempt('fetch_balance', () => this.exchange.getBalance());
    if (!balance.ok) {
      this.logger.warn('iteration_balance_unavailable', {
        event: 'iteration_balance_unavailable',
        error: balance.error.message,
      });
      return { kind: 'degraded', reason: 'balance_unavailable' };
    }
    this.lastBalance = balance.value;

    const decision = this.risk.shouldStop(balance.value.total);
    if (decision.stopped) {
      riskStopGauge.labels(this.config.symbol).set(1);
      throw new RiskLimitBreachError(decision.reason ?? 'risk_stop');
    }

    const price = await this.analyzer.currentPrice();
    if (!price.ok) {
      this.logger.warn('iteration_price_unavailable', {
        event: 'iteration_price_unavailable',
        error: price.error.message,
      });
      return { kind: 'degraded', reason: 'price_unavailable' };
    }

    let rebalanced = false;
    if (this.engine.needsRebalance(price.value, this.config.execution.gridUpdateIntervalMs, now)) {
      const range = await this.analyzer.optimalGridRange(price.value);
      const placed = await this.buildAndPlace(price.value, range.band);
      rebalanced = true;
      this.logger.info('grid_rebalanced', {
        event: 'grid_rebalanced',
        currentPrice: price.value,
        rangeSource: range.source,
        ...placed,
      });
    }

    await this.ledger.reconcile();

    if (now - this.lastPositionCheck >= this.config.execution.positionCheckIntervalMs) {
      await this.refreshPosition(price.value, balance.value.total);
      this.lastPositionCheck = now;
    }

    this.iterations += 1;
    if (this.iterations % this.config.execution.performanceLogEvery === 0) {
      this.logPerformance(balance.value.total);
    }

    this.ledger.setCounterOrdersSuppressed(this.risk.checkDailyProfitTarget(balance.value.total));
    return { kind: 'ok', rebalanced };
  }

  private async refreshPosition(currentPrice: number, totalBalance: number) {
    const position = await attempt('fetch_position', () => this.exchange.getPosition());
    if (!position.ok) {
      this.logger.warn('position_unavailable', { event: 'position_unavailable', error: position.error.message });
      return;
    }
    this.lastPosition = position.value;
    if (!position.value || position.value.side === 'flat') return;
    const positionValue = position.value.size * currentPrice;
    this.risk.checkPositionSize(positionValue, totalBalance);
    this.logger.debug('position_refreshed', { event: 'position_refreshed', ...position.value, positionValue });
  }

  performanceSnapshot(totalBalance: number): PerformanceSnapshot {
    return {
      totalBalance,
      unrealizedPnl: this.lastPosition ? this.lastPosition.unrealizedPnl : 0,
      realizedPnl: this.ledger.statistics().realizedPnl,
      totalTrades: this.risk.state.totalTrades,
      winRate: this.risk.winRate(),
      dailyReturn: this.risk.dailyReturn(totalBalance),
    };
  }

  private logPerformance(totalBalance: number) {
    const snapshot = this.performanceSnapshot(totalBalance);
    this.journal.performance(snapshot);
    publishPerformance(this.config.symbol, snapshot);
    this.logger.info('ledger_statistics', { event: 'ledger_statistics', ...this.ledger.statistics() });
    return snapshot;
  }

  /** Cooperative: takes effect at the next iteration boundary. */
  requestStop(reason = 'operator_stop') {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.stopReason = reason;
    this.logger.info('stop_requested', { event: 'stop_requested', reason });
  }

  private pendingExit(): { exit: ExitReason; reason: string } | null {
    if (this.stopRequested) return { exit: 'operator_stop', reason: this.stopReason ?? 'operator_stop' };
    if (this.killSwitch && this.killSwitch.isActive()) {
      return { exit: 'kill_switch', reason: this.killSwitch.getReason() ?? 'kill_switch' };
    }
    return null;
  }

  async run(): Promise<RunResult> {
    if (!this.initialized) {
      try {
        await this.initialize();
      } catch (error) {
        this.logger.error('bot_startup_failed', { event: 'bot_startup_failed', error: formatError(error) });
        if (this.ordersPlaced) {
          await this.shutdown('startup_failed');
        }
        throw error;
      }
    }

    let exit = this.pendingExit();
    while (!exit) {
      try {
        const outcome = await this.runIteration();
        exit = this.pendingExit();
        if (exit) break;
        await this.sleep(
          outcome.kind === 'ok' ? this.config.execution.pollIntervalMs : this.config.execution.errorCooldownMs
        );
      } catch (error) {
        if (error instanceof RiskLimitBreachError) {
          this.logger.error('risk_stop', { event: 'risk_stop', reason: error.reason });
          await this.notify(`Grid bot stopped by risk governor: ${error.reason}`);
          exit = { exit: 'risk_stop', reason: error.reason };
          break;
        }
        loopErrorCounter.labels(this.config.symbol).inc();
        this.logger.error('iteration_failed', { event: 'iteration_failed', error: formatError(error) });
        exit = this.pendingExit();
        if (exit) break;
        await this.sleep(this.config.execution.errorCooldownMs);
      }
      exit = exit ?? this.pendingExit();
    }

    const performance = await this.shutdown(exit.reason);
    return { ...exit, iterations: this.iterations, performance };
  }

  /** Best-effort cancel-all and final report. Safe to call more than once. */
  async shutdown(reason: string): Promise<PerformanceSnapshot | null> {
    if (this.shutDown) return null;
    this.shutDown = true;
    this.logger.info('bot_shutting_down', { event: 'bot_shutting_down', reason });

    await this.ledger.cancelAll(`shutdown:${reason}`);

    let performance: PerformanceSnapshot | null = null;
    const balance = await attempt('fetch_balance', () => this.exchange.getBalance());
    const total = balance.ok ? balance.value.total : this.lastBalance ? this.lastBalance.total : null;
    if (total !== null && this.risk.isInitialized()) {
      performance = this.logPerformance(total);
      this.logger.info('risk_final_metrics', { event: 'risk_final_metrics', ...this.risk.metrics(total) });
    }

    try {
      await this.exchange.disconnect();
    } catch (error) {
      this.logger.warn('exchange_disconnect_failed', { event: 'exchange_disconnect_failed', error: formatError(error) });
    }
    await this.notify(`Grid bot stopped on ${this.config.symbol}: ${reason}`);
    return performance;
  }

  private async notify(message: string) {
    if (!this.alerts) return;
    try {
      await this.alerts.sendMessage(message);
    } catch (error) {
      this.logger.warn('alert_failed', { event: 'alert_failed', error: formatError(error) });
    }
  }
}

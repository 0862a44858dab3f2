import type { GridExchangeClient } from '../../exchanges/adapters/types';
import type { RiskGovernor } from '../../risk/riskGovernor';
import type { TradeJournal } from '../../services/tradeJournal';
import type { Logger } from '../../utils/logger';
import { PlacementFailureError, ReconciliationAmbiguityError } from '../../errors';
import { formatError } from '../../utils/formatError';
import { attempt } from '../../utils/result';
import { sleep as defaultSleep } from '../../utils/retry';
import {
  activeOrdersGauge,
  counterOrderCounter,
  fillCounter,
  ordersPlacedCounter,
  placementFailureCounter,
  pnlGauge,
} from '../../telemetry/metrics';
import { oppositeSide } from '../types';
import type { GridConfig, GridLevel, Order, OrderSide, OrderStatus } from '../types';
import type { LinkIdPolicy } from './linkIdPolicy';

export type LifecycleState = 'pending' | OrderStatus;

export type OrderRole = 'ladder' | 'counter' | 'adopted';

export interface TrackedOrder extends Order {
  state: LifecycleState;
  role: OrderRole;
  /** Rung the order was placed for; null for orders adopted from the exchange. */
  rung: number | null;
}

export interface OrderPair {
  entryOrderId: string;
  counterOrderId: string;
  entrySide: OrderSide;
  entryPrice: number;
  qty: number;
  rung: number | null;
  realizedPnl: number | null;
  openedAt: number;
  closedAt: number | null;
}

export interface LadderResult {
  buyPlaced: number;
  sellPlaced: number;
  failures: number;
}

export interface ReconcileSummary {
  skipped: boolean;
  filled: number;
  cancelled: number;
  rejected: number;
  dropped: number;
  unresolved: number;
  adopted: number;
}

export interface PnlAttribution {
  pair: OrderPair;
  buyPrice: number;
  sellPrice: number;
  gross: number;
  fees: number;
  net: number;
}

export interface FillOutcome {
  order: Order;
  fee: number;
  counter: TrackedOrder | null;
  attribution: PnlAttribution | null;
}

export interface LedgerStatistics {
  activeOrders: number;
  pendingOrders: number;
  filledOrders: number;
  openPairs: number;
  completedPairs: number;
  realizedPnl: number;
}

export interface OrderLedgerOptions {
  exchange: GridExchangeClient;
  linkIds: LinkIdPolicy;
  risk: RiskGovernor;
  journal: TradeJournal;
  logger: Logger;
  makerFee: number;
  settleDelayMs: number;
  orderPacingMs: number;
  historyLookback: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
}

const EMPTY_SUMMARY: ReconcileSummary = {
  skipped: false,
  filled: 0,
  cancelled: 0,
  rejected: 0,
  dropped: 0,
  unresolved: 0,
  adopted: 0,
};

/**
 * Owns every order the bot believes is resting and the pairs that link a fill
 * to its counter order. The exchange is authoritative: orders only leave the
 * active set after they disappear from the open-order list and history says
 * why.
 */
export class OrderLedger {
  private readonly exchange: GridExchangeClient;
  private readonly linkIds: LinkIdPolicy;
  private readonly risk: RiskGovernor;
  private readonly journal: TradeJournal;
  private readonly logger: Logger;
  private readonly makerFee: number;
  private readonly settleDelayMs: number;
  private readonly orderPacingMs: number;
  private readonly historyLookback: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;

  private readonly active = new Map<string, TrackedOrder>();
  private readonly pending = new Map<string, TrackedOrder>();
  // keyed by counter order id
  private readonly openPairs = new Map<string, OrderPair>();
  private readonly completedPairs: OrderPair[] = [];
  private grid: GridConfig | null = null;
  private filledOrders = 0;
  private realizedPnl = 0;
  private counterOrdersSuppressed = false;

  constructor(options: OrderLedgerOptions) {
    this.exchange = options.exchange;
    this.linkIds = options.linkIds;
    this.risk = options.risk;
    this.journal = options.journal;
    this.logger = options.logger;
    this.makerFee = options.makerFee;
    this.settleDelayMs = options.settleDelayMs;
    this.orderPacingMs = options.orderPacingMs;
    this.historyLookback = options.historyLookback;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
  }

  get symbol() {
    return this.exchange.symbol;
  }

  /** Grid the counter orders are priced and bounded against. */
  useGrid(config: GridConfig) {
    this.grid = config;
  }

  setCounterOrdersSuppressed(suppressed: boolean) {
    if (suppressed === this.counterOrdersSuppressed) return;
    this.counterOrdersSuppressed = suppressed;
    this.logger.info('counter_orders_suppression_changed', {
      event: 'counter_orders_suppression_changed',
      suppressed,
    });
  }

  get counterOrdersAreSuppressed() {
    return this.counterOrdersSuppressed;
  }

  activeOrders(): TrackedOrder[] {
    return [...this.active.values()].map((order) => ({ ...order }));
  }

  pairs(): { open: OrderPair[]; completed: OrderPair[] } {
    return {
      open: [...this.openPairs.values()].map((pair) => ({ ...pair })),
      completed: this.completedPairs.map((pair) => ({ ...pair })),
    };
  }

  /** Cancels everything on the instrument and forgets resting orders and open pairs. */
  async cancelAll(reason: string): Promise<boolean> {
    const cancelled = await attempt('cancel_all_orders', () => this.exchange.cancelAllOrders());
    const success = cancelled.ok && cancelled.value;
    if (!success) {
      this.logger.warn('cancel_all_failed', {
        event: 'cancel_all_failed',
        reason,
        error: cancelled.ok ? 'exchange_returned_false' : cancelled.error.message,
      });
    } else {
      this.logger.info('cancel_all_orders', { event: 'cancel_all_orders', reason, tracked: this.active.size });
    }
    this.discardTracking(reason);
    return success;
  }

  private discardTracking(reason: string) {
    if (this.openPairs.size) {
      this.logger.info('open_pairs_abandoned', {
        event: 'open_pairs_abandoned',
        reason,
        count: this.openPairs.size,
      });
    }
    this.active.clear();
    this.pending.clear();
    this.openPairs.clear();
    activeOrdersGauge.labels(this.symbol).set(0);
  }

  async placeLadder(levels: GridLevel[], orderSize: number): Promise<LadderResult> {
    await this.cancelAll('ladder_replace');
    if (this.settleDelayMs > 0) {
      await this.sleep(this.settleDelayMs);
    }

    const result: LadderResult = { buyPlaced: 0, sellPlaced: 0, failures: 0 };
    if (!(orderSize > 0)) {
      this.logger.warn('ladder_skipped_zero_size', { event: 'ladder_skipped_zero_size', orderSize });
      return result;
    }

    this.linkIds.nextBuild(this.clock());
    for (let index = 0; index < levels.length; index++) {
      const level = levels[index];
      if (index > 0 && this.orderPacingMs > 0) {
        await this.sleep(this.orderPacingMs);
      }
      const placed = await this.place(
        level.side,
        level.adjustedPrice,
        orderSize,
        () => this.linkIds.ladderLinkId(level.side, index),
        'ladder',
        level.rung
      );
      if (!placed) {
        result.failures += 1;
      } else if (level.side === 'buy') {
        result.buyPlaced += 1;
      } else {
        result.sellPlaced += 1;
      }
    }

    this.logger.info('grid_ladder_placed', {
      event: 'grid_ladder_placed',
      buildStamp: this.linkIds.currentBuild,
      orderSize,
      ...result,
    });
    return result;
  }

  private async place(
    side: OrderSide,
    price: number,
    qty: number,
    nextLinkId: () => string,
    role: OrderRole,
    rung: number | null
  ): Promise<TrackedOrder | null> {
    let linkId: string;
    try {
      linkId = nextLinkId();
    } catch (error) {
      return this.placementFailed(side, price, qty, null, role, error);
    }
    const tracked: TrackedOrder = {
      orderId: linkId,
      linkId,
      side,
      price,
      qty,
      status: 'open',
      state: 'pending',
      role,
      rung,
      createdTime: this.clock(),
    };
    this.pending.set(linkId, tracked);
    try {
      const placed = await this.exchange.placeLimitOrder({ side, qty, price, linkId });
      const confirmed: TrackedOrder = {
        ...tracked,
        orderId: placed.orderId,
        linkId: placed.linkId ?? linkId,
        price: placed.price > 0 ? placed.price : price,
        qty: placed.qty > 0 ? placed.qty : qty,
        state: 'open',
      };
      this.active.set(confirmed.orderId, confirmed);
      ordersPlacedCounter.labels(this.symbol, side).inc();
      activeOrdersGauge.labels(this.symbol).set(this.active.size);
      this.logger.debug('order_placed', {
        event: 'order_placed',
        orderId: confirmed.orderId,
        linkId: confirmed.linkId,
        side,
        price: confirmed.price,
        qty: confirmed.qty,
        role,
      });
      return confirmed;
    } catch (error) {
      return this.placementFailed(side, price, qty, linkId, role, error);
    } finally {
      this.pending.delete(linkId);
    }
  }

  /** A link id the venue would refuse is handled like a refused order. */
  private placementFailed(
    side: OrderSide,
    price: number,
    qty: number,
    linkId: string | null,
    role: OrderRole,
    error: unknown
  ): null {
    const failure = new PlacementFailureError(side, price, { cause: error });
    placementFailureCounter.labels(this.symbol, side).inc();
    this.logger.warn('order_placement_failed', {
      event: 'order_placement_failed',
      linkId,
      side,
      price,
      qty,
      role,
      error: formatError(failure),
      cause: formatError(error),
    });
    return null;
  }

  /**
   * Diffs the tracked set against the exchange's open orders. Removals are
   * computed and applied before additions; a removal is only applied once
   * history has been consulted.
   */
  async reconcile(): Promise<ReconcileSummary> {
    const summary: ReconcileSummary = { ...EMPTY_SUMMARY };
    const open = await attempt('fetch_open_orders', () => this.exchange.getOpenOrders());
    if (!open.ok) {
      this.logger.warn('reconcile_skipped', { event: 'reconcile_skipped', error: open.error.message });
      return { ...summary, skipped: true };
    }

    const openIds = new Set(open.value.map((order) => order.orderId));
    const removals = [...this.active.values()].filter((order) => !openIds.has(order.orderId));
    const additions = open.value.filter((order) => !this.active.has(order.orderId));

    if (removals.length) {
      const history = await attempt('fetch_order_history', () => this.exchange.getOrderHistory(this.historyLookback));
      if (!history.ok) {
        summary.unresolved = removals.length;
        this.logger.warn('reconcile_history_unavailable', {
          event: 'reconcile_history_unavailable',
          pending: removals.length,
          error: history.error.message,
        });
      } else {
        for (const tracked of removals) {
          await this.resolveVanished(tracked, history.value, summary);
        }
      }
    }

    for (const order of additions) {
      this.active.set(order.orderId, { ...order, status: 'open', state: 'open', role: 'adopted', rung: null });
      summary.adopted += 1;
      this.logger.info('order_adopted', {
        event: 'order_adopted',
        orderId: order.orderId,
        linkId: order.linkId,
        side: order.side,
        price: order.price,
      });
    }

    activeOrdersGauge.labels(this.symbol).set(this.active.size);
    if (summary.filled || summary.cancelled || summary.rejected || summary.dropped || summary.adopted) {
      this.logger.info('reconcile_summary', { event: 'reconcile_summary', active: this.active.size, ...summary });
    }
    return summary;
  }

  private async resolveVanished(tracked: TrackedOrder, history: Order[], summary: ReconcileSummary) {
    const match =
      history.find((order) => order.orderId === tracked.orderId) ??
      (tracked.linkId ? history.find((order) => order.linkId === tracked.linkId) : undefined);

    if (match && match.status === 'open') {
      // history still lists it as resting; the open-order page missed it
      summary.unresolved += 1;
      return;
    }

    this.active.delete(tracked.orderId);
    if (!match || match.status === 'unknown') {
      const ambiguity = new ReconciliationAmbiguityError(tracked.orderId, match ? 'unknown_status' : 'not_in_history');
      summary.dropped += 1;
      this.abandonPair(tracked.orderId, 'dropped');
      this.logger.warn('order_dropped', {
        event: 'order_dropped',
        orderId: tracked.orderId,
        linkId: tracked.linkId,
        error: formatError(ambiguity),
      });
      return;
    }

    if (match.status === 'filled') {
      summary.filled += 1;
      await this.handleFill(
        {
          orderId: tracked.orderId,
          linkId: tracked.linkId,
          side: tracked.side,
          price: match.price > 0 ? match.price : tracked.price,
          qty: match.qty > 0 ? match.qty : tracked.qty,
          status: 'filled',
          createdTime: tracked.createdTime,
        },
        tracked.rung
      );
      return;
    }

    if (match.status === 'cancelled') {
      summary.cancelled += 1;
      this.logger.debug('order_cancelled', { event: 'order_cancelled', orderId: tracked.orderId });
    } else {
      summary.rejected += 1;
      this.logger.info('order_rejected', { event: 'order_rejected', orderId: tracked.orderId });
    }
    this.abandonPair(tracked.orderId, match.status);
  }

  private abandonPair(counterOrderId: string, status: string) {
    const pair = this.openPairs.get(counterOrderId);
    if (!pair) return;
    this.openPairs.delete(counterOrderId);
    this.logger.info('pair_abandoned', {
      event: 'pair_abandoned',
      entryOrderId: pair.entryOrderId,
      counterOrderId,
      status,
    });
  }

  async handleFill(order: Order, rung: number | null = null): Promise<FillOutcome> {
    const fee = order.price * order.qty * this.makerFee;
    this.filledOrders += 1;
    fillCounter.labels(this.symbol, order.side).inc();
    this.logger.info('order_filled', {
      event: 'order_filled',
      orderId: order.orderId,
      side: order.side,
      price: order.price,
      qty: order.qty,
      fee,
    });

    let counter: TrackedOrder | null = null;
    if (this.counterOrdersSuppressed) {
      this.logger.info('counter_order_suppressed', { event: 'counter_order_suppressed', orderId: order.orderId });
    } else {
      counter = await this.placeCounterOrder(order, rung);
    }

    const attribution = this.attributePnl(order);
    if (attribution) {
      this.risk.recordTrade(attribution.net, attribution.net > 0);
    }

    let note = 'entry leg, no counter order';
    if (attribution) {
      note = `pair closed against ${attribution.pair.entryOrderId}`;
    } else if (counter) {
      note = `counter ${counter.side} @ ${counter.price}`;
    }
    this.journal.record({
      timestamp: new Date(this.clock()).toISOString(),
      symbol: this.symbol,
      side: order.side,
      price: order.price,
      qty: order.qty,
      orderId: order.orderId,
      status: 'filled',
      pnl: attribution ? attribution.net : 0,
      fee,
      note,
    });
    return { order, fee, counter, attribution };
  }

  /** Adjacent rung on the other side of the fill; nothing outside the band. */
  async placeCounterOrder(filled: Order, rung: number | null = null): Promise<TrackedOrder | null> {
    if (!this.grid) {
      this.logger.warn('counter_order_without_grid', { event: 'counter_order_without_grid', orderId: filled.orderId });
      return null;
    }
    const side = oppositeSide(filled.side);
    const price = filled.side === 'buy' ? filled.price + this.grid.step : filled.price - this.grid.step;
    if (price < this.grid.lowerPrice || price > this.grid.upperPrice) {
      this.logger.debug('counter_order_out_of_band', {
        event: 'counter_order_out_of_band',
        orderId: filled.orderId,
        side,
        price,
        lower: this.grid.lowerPrice,
        upper: this.grid.upperPrice,
      });
      return null;
    }

    const counterRung = rung ?? this.rungOf(filled);
    const counter = await this.place(
      side,
      price,
      filled.qty,
      () => this.linkIds.counterLinkId(side),
      'counter',
      counterRung
    );
    if (!counter) return null;

    counterOrderCounter.labels(this.symbol, side).inc();
    this.openPairs.set(counter.orderId, {
      entryOrderId: filled.orderId,
      counterOrderId: counter.orderId,
      entrySide: filled.side,
      entryPrice: filled.price,
      qty: filled.qty,
      rung: counterRung,
      realizedPnl: null,
      openedAt: this.clock(),
      closedAt: null,
    });
    this.logger.info('counter_order_placed', {
      event: 'counter_order_placed',
      entryOrderId: filled.orderId,
      counterOrderId: counter.orderId,
      side,
      price,
      qty: filled.qty,
    });
    return counter;
  }

  private rungOf(order: Order) {
    if (!this.grid || !(this.grid.step > 0)) return null;
    return Math.round(Math.abs(order.price - this.grid.centerPrice) / this.grid.step);
  }

  /**
   * Closes the pair whose counter leg is `order`. Entry legs have no pair and
   * return null; a pair is only ever closed once.
   */
  attributePnl(order: Order): PnlAttribution | null {
    const pair = this.openPairs.get(order.orderId);
    if (!pair || pair.realizedPnl !== null) return null;

    const buyPrice = pair.entrySide === 'buy' ? pair.entryPrice : order.price;
    const sellPrice = pair.entrySide === 'buy' ? order.price : pair.entryPrice;
    const qty = pair.qty;
    const gross = (sellPrice - buyPrice) * qty;
    const fees = (buyPrice + sellPrice) * qty * this.makerFee;
    const net = gross - fees;

    const closed: OrderPair = { ...pair, realizedPnl: net, closedAt: this.clock() };
    this.openPairs.delete(order.orderId);
    this.completedPairs.push(closed);
    this.realizedPnl += net;
    pnlGauge.labels(this.symbol).set(this.realizedPnl);
    this.logger.info('pair_closed', {
      event: 'pair_closed',
      entryOrderId: pair.entryOrderId,
      counterOrderId: pair.counterOrderId,
      buyPrice,
      sellPrice,
      qty,
      gross,
      fees,
      net,
    });
    return { pair: closed, buyPrice, sellPrice, gross, fees, net };
  }

  statistics(): LedgerStatistics {
    return {
      activeOrders: this.active.size,
      pendingOrders: this.pending.size,
      filledOrders: this.filledOrders,
      openPairs: this.openPairs.size,
      completedPairs: this.completedPairs.length,
      realizedPnl: this.realizedPnl,
    };
  }
}

import http from 'http';
import { Counter, Gauge, register } from 'prom-client';
import type { PerformanceSnapshot } from '../strategies/types';

const metricsRegistered: { started: boolean; server: http.Server | null } = { started: false, server: null };

export const ordersPlacedCounter = new Counter({
  name: 'grid_orders_placed_total',
  help: 'Limit orders accepted by the exchange, by side',
  labelNames: ['symbol', 'side'] as const,
});

export const placementFailureCounter = new Counter({
  name: 'grid_order_placement_failures_total',
  help: 'Limit orders the exchange refused, by side',
  labelNames: ['symbol', 'side'] as const,
});

export const fillCounter = new Counter({
  name: 'grid_fills_total',
  help: 'Count of fills by side',
  labelNames: ['symbol', 'side'] as const,
});

export const counterOrderCounter = new Counter({
  name: 'grid_counter_orders_total',
  help: 'Counter orders placed after a fill, by side',
  labelNames: ['symbol', 'side'] as const,
});

export const gridRebuildCounter = new Counter({
  name: 'grid_rebuilds_total',
  help: 'Ladder builds, including the initial one',
  labelNames: ['symbol'] as const,
});

export const loopErrorCounter = new Counter({
  name: 'grid_loop_errors_total',
  help: 'Polling iterations that ended in an error',
  labelNames: ['symbol'] as const,
});

export const pnlGauge = new Gauge({
  name: 'grid_pnl_realized_usd',
  help: 'Realized P&L from completed pairs',
  labelNames: ['symbol'] as const,
});

export const balanceGauge = new Gauge({
  name: 'grid_balance_total',
  help: 'Total account balance in the settlement currency',
  labelNames: ['symbol'] as const,
});

export const activeOrdersGauge = new Gauge({
  name: 'grid_active_orders',
  help: 'Orders currently tracked as resting',
  labelNames: ['symbol'] as const,
});

export const riskStopGauge = new Gauge({
  name: 'grid_risk_stopped',
  help: '1 once the risk governor has latched a stop',
  labelNames: ['symbol'] as const,
});

export const winRateGauge = new Gauge({
  name: 'grid_win_rate_percent',
  help: 'Share of completed pairs that closed positive',
  labelNames: ['symbol'] as const,
});

export function publishPerformance(symbol: string, snapshot: PerformanceSnapshot) {
  balanceGauge.labels(symbol).set(snapshot.totalBalance);
  pnlGauge.labels(symbol).set(snapshot.realizedPnl);
  winRateGauge.labels(symbol).set(snapshot.winRate);
}

export function startMetricsServer(port = Number(process.env.METRICS_PORT || 9100)) {
  if (metricsRegistered.started) return metricsRegistered.server;
  metricsRegistered.started = true;
  const server = http.createServer(async (_req, res) => {
    if (_req.url === '/metrics') {
      try {
        const metrics = await register.metrics();
        res.writeHead(200, { 'Content-Type': register.contentType });
        res.end(metrics);
      } catch (err) {
        res.writeHead(500);
        res.end(String(err));
      }
    } else {
      res.writeHead(404);
      res.end('Not found');
    }
  });
  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Metrics server listening on :${port}/metrics`);
  });
  metricsRegistered.server = server;
  return server;
}

export function resetMetrics() {
  ordersPlacedCounter.reset();
  placementFailureCounter.reset();
  fillCounter.reset();
  counterOrderCounter.reset();
  gridRebuildCounter.reset();
  loopErrorCounter.reset();
  pnlGauge.reset();
  balanceGauge.reset();
  activeOrdersGauge.reset();
  riskStopGauge.reset();
  winRateGauge.reset();
}

import http from 'http';
import { Telegram, type AlertSink } from '../alerts/telegram';
import { logger } from '../utils/logger';
import { formatError } from '../utils/formatError';

export class KillSwitch {
  private active = false;
  private reason: string | null = null;
  private readonly alerts: AlertSink;

  constructor(alerts: AlertSink = Telegram) {
    this.alerts = alerts;
  }

  isActive() {
    return this.active;
  }

  getReason() {
    return this.reason;
  }

  async activate(reason: string) {
    if (this.active) return;
    this.active = true;
    this.reason = reason;
    logger.warn('kill_switch_activated', { event: 'kill_switch_activated', reason });
    await this.alerts.sendMessage(`KILL SWITCH ACTIVATED: ${reason}`);
  }

  async reset(reason = 'manual reset') {
    if (!this.active) return;
    this.active = false;
    this.reason = null;
    logger.info('kill_switch_reset', { event: 'kill_switch_reset', reason });
    await this.alerts.sendMessage(`Kill switch reset: ${reason}`);
  }
}

export const killSwitch = new KillSwitch();

function respond(res: http.ServerResponse, status: number, body: Record<string, unknown>) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function fail(res: http.ServerResponse, error: unknown) {
  logger.error('kill_switch_request_failed', { event: 'kill_switch_request_failed', error: formatError(error) });
  respond(res, 500, { status: 'error' });
}

export function createKillSwitchServer(target: KillSwitch = killSwitch) {
  return http.createServer((req, res) => {
    if (req.method === 'POST' && req.url === '/kill') {
      let body = '';
      req.on('data', (chunk) => {
        body += chunk;
      });
      req.on('end', () => {
        const reason = body.trim() || 'manual';
        target.activate(reason).then(
          () => respond(res, 200, { status: 'killed', reason }),
          (error: unknown) => fail(res, error)
        );
      });
      return;
    }

    if (req.method === 'POST' && req.url === '/reset') {
      target.reset('manual reset').then(
        () => respond(res, 200, { status: 'reset' }),
        (error: unknown) => fail(res, error)
      );
      return;
    }

    if (req.method === 'GET' && req.url === '/status') {
      respond(res, 200, { active: target.isActive(), reason: target.getReason() });
      return;
    }

    res.writeHead(404);
    res.end('Not found');
  });
}

export function startKillSwitchServer(port = Number(process.env.KILL_SWITCH_PORT || 9101), target: KillSwitch = killSwitch) {
  const server = createKillSwitchServer(target);
  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Kill switch server listening on :${port}`);
  });
  return server;
}

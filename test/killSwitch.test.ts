import type http from 'http';
import axios from 'axios';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { KillSwitch, createKillSwitchServer } from '../src/guard/killSwitch';

function sink() {
  return { sendMessage: vi.fn<(message: string) => Promise<void>>(async () => undefined) };
}

describe('KillSwitch', () => {
  it('latches the first reason until reset', async () => {
    const alerts = sink();
    const kill = new KillSwitch(alerts);
    await kill.activate('drawdown');
    await kill.activate('again');
    expect(kill.isActive()).toBe(true);
    expect(kill.getReason()).toBe('drawdown');

    await kill.reset();
    expect(kill.isActive()).toBe(false);
    expect(kill.getReason()).toBeNull();
    expect(alerts.sendMessage.mock.calls.map(([message]) => message)).toEqual([
      'KILL SWITCH ACTIVATED: drawdown',
      'Kill switch reset: manual reset',
    ]);
  });
});

describe('kill switch server', () => {
  let server: http.Server | null = null;

  afterEach(async () => {
    const running = server;
    server = null;
    if (running) {
      await new Promise<void>((resolve) => running.close(() => resolve()));
    }
  });

  async function listen(target: KillSwitch) {
    const created = createKillSwitchServer(target);
    server = created;
    await new Promise<void>((resolve) => created.listen(0, '127.0.0.1', resolve));
    const address = created.address();
    if (!address || typeof address === 'string') throw new Error('server_not_listening');
    return axios.create({ baseURL: `http://127.0.0.1:${address.port}`, proxy: false, validateStatus: () => true });
  }

  it('engages, reports and resets over http', async () => {
    const kill = new KillSwitch(sink());
    const client = await listen(kill);

    const killed = await client.post('/kill', 'operator drill', { headers: { 'Content-Type': 'text/plain' } });
    expect(killed.status).toBe(200);
    expect(killed.data).toEqual({ status: 'killed', reason: 'operator drill' });
    expect((await client.get('/status')).data).toEqual({ active: true, reason: 'operator drill' });

    const reset = await client.post('/reset');
    expect(reset.data).toEqual({ status: 'reset' });
    expect((await client.get('/status')).data).toEqual({ active: false, reason: null });
  });

  it('uses a default reason for an empty body', async () => {
    const kill = new KillSwitch(sink());
    const client = await listen(kill);
    await client.post('/kill');
    expect(kill.getReason()).toBe('manual');
  });

  it('answers 404 elsewhere', async () => {
    const client = await listen(new KillSwitch(sink()));
    expect((await client.get('/metrics')).status).toBe(404);
  });
});

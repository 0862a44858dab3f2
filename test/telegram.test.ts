import { beforeEach, describe, expect, it, vi } from 'vitest';
import { TELEGRAM_MAX_TEXT, TelegramNotifier } from '../src/alerts/telegram';
import { recordingLogger } from './helpers/testLogger';

const http = vi.hoisted(() => ({ post: vi.fn<(url: string, body: unknown) => Promise<unknown>>() }));

vi.mock('axios', () => ({ default: { post: http.post } }));

function notifier(token = 'test-token') {
  const logger = recordingLogger();
  const sink = new TelegramNotifier({ token, chatId: '42', logger, retry: { delayMs: 0 } });
  return { logger, sink };
}

beforeEach(() => {
  http.post.mockReset();
  http.post.mockResolvedValue({ ok: true });
});

describe('TelegramNotifier', () => {
  it('posts the message to the bot endpoint', async () => {
    const { sink } = notifier();
    await sink.sendMessage('grid rebuilt');
    expect(http.post).toHaveBeenCalledWith('https://api.telegram.org/bottest-token/sendMessage', {
      chat_id: '42',
      text: 'grid rebuilt',
    });
  });

  it('stays silent without a token', async () => {
    const { sink } = notifier('');
    await sink.sendMessage('grid rebuilt');
    expect(http.post).not.toHaveBeenCalled();
  });

  it('cuts messages to the bot api limit', async () => {
    const { sink } = notifier();
    await sink.sendMessage('x'.repeat(5000));
    const [, body] = http.post.mock.calls[0];
    expect(body).toEqual({ chat_id: '42', text: `${'x'.repeat(TELEGRAM_MAX_TEXT - 3)}...` });
  });

  it('logs and swallows delivery failures after retrying', async () => {
    http.post.mockRejectedValue(new Error('network_down'));
    const { sink, logger } = notifier();

    await expect(sink.sendMessage('grid rebuilt')).resolves.toBeUndefined();
    expect(http.post).toHaveBeenCalledTimes(3);
    expect(logger.events('telegram_send_retry').map((entry) => entry.meta.attempt)).toEqual([1, 2]);
    const [failed] = logger.events('telegram_send_failed');
    expect(failed.meta).toMatchObject({ component: 'telegram', length: 12 });
  });
});

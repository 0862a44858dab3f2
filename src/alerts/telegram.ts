import axios from 'axios';
import { CONFIG } from '../config';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { formatError } from '../utils/formatError';
import { retry, type RetryOptions } from '../utils/retry';

export interface AlertSink {
  sendMessage(msg: string): Promise<void>;
}

/** Bot API rejects longer texts outright. */
export const TELEGRAM_MAX_TEXT = 4096;

export interface TelegramOptions {
  token?: string;
  chatId?: string;
  logger?: Logger;
  retry?: RetryOptions;
}

/**
 * Operator alerts over the Telegram Bot API. Unconfigured sinks do nothing;
 * delivery failures are logged and never reach the caller.
 */
export class TelegramNotifier implements AlertSink {
  private readonly logger: Logger;

  constructor(private readonly options: TelegramOptions = {}) {
    this.logger = (options.logger ?? rootLogger).child({ component: 'telegram' });
  }

  async sendMessage(msg: string) {
    const token = this.token();
    const chatId = this.chatId();
    if (!token || !chatId) return;
    const text = msg.length > TELEGRAM_MAX_TEXT ? `${msg.slice(0, TELEGRAM_MAX_TEXT - 3)}...` : msg;
    try {
      await retry(() => axios.post(`https://api.telegram.org/bot${token}/sendMessage`, { chat_id: chatId, text }), {
        attempts: 3,
        delayMs: 500,
        ...this.options.retry,
        onRetry: (error, attempt) => {
          this.logger.warn('telegram_send_retry', { event: 'telegram_send_retry', attempt, error: formatError(error) });
        },
      });
    } catch (error) {
      this.logger.warn('telegram_send_failed', {
        event: 'telegram_send_failed',
        length: text.length,
        error: formatError(error),
      });
    }
  }

  private token() {
    return this.options.token ?? CONFIG.TELEGRAM_TOKEN;
  }

  private chatId() {
    return this.options.chatId ?? CONFIG.TELEGRAM_CHAT_ID;
  }
}

export const Telegram = new TelegramNotifier();

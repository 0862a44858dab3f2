import { afterEach } from 'vitest';
import { resetMetrics } from '../src/telemetry/metrics';

process.env.LOG_LEVEL = 'error';
process.env.TELEGRAM_TOKEN = '';
process.env.TELEGRAM_CHAT_ID = '';
process.env.LOG_INGEST_WEBHOOK = '';

afterEach(() => {
  resetMetrics();
});

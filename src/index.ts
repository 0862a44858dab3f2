#!/usr/bin/env node
import { CONFIG, loadBotConfig } from './config';
import { startMetricsServer } from './telemetry/metrics';
import { killSwitch, startKillSwitchServer } from './guard/killSwitch';
import { Telegram } from './alerts/telegram';
import { DerivativesExchangeAdapter } from './exchanges/adapters/derivativesAdapter';
import { GridBotController } from './bot/gridBotController';
import { TradeJournal, journalPathFor } from './services/tradeJournal';
import { createLogger, logger, setLogIngestionWebhook, setLogLevel } from './utils/logger';
import { formatError } from './utils/formatError';

async function main() {
  setLogLevel(CONFIG.LOG_LEVEL);
  if (CONFIG.LOG_INGEST_WEBHOOK) {
    setLogIngestionWebhook(CONFIG.LOG_INGEST_WEBHOOK);
  }

  const config = loadBotConfig();
  const botLogger = createLogger({ symbol: config.symbol, exchange: config.exchange.id });

  if (CONFIG.ENABLE_SERVICES) {
    startMetricsServer(CONFIG.METRICS_PORT);
    startKillSwitchServer(CONFIG.KILL_SWITCH_PORT);
  }

  const exchange = new DerivativesExchangeAdapter(
    {
      id: config.exchange.id,
      symbol: config.symbol,
      apiKey: config.exchange.apiKey,
      apiSecret: config.exchange.apiSecret,
      passphrase: config.exchange.passphrase,
      sandbox: config.exchange.testnet,
      settleCurrency: config.exchange.settleCurrency,
    },
    {
      logger: botLogger.child({ component: 'exchange' }),
      retry: {
        attempts: CONFIG.EXCHANGE_RETRY.ATTEMPTS,
        delayMs: CONFIG.EXCHANGE_RETRY.DELAY_MS,
        backoffFactor: CONFIG.EXCHANGE_RETRY.BACKOFF,
      },
    }
  );
  const journal = new TradeJournal(
    config.journal.enabled ? journalPathFor(config.journal.dir, new Date()) : null,
    botLogger.child({ component: 'journal' })
  );
  const controller = new GridBotController({
    config,
    exchange,
    logger: botLogger,
    journal,
    alerts: Telegram,
    killSwitch,
  });

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info('signal_received', { event: 'signal_received', signal });
    controller.requestStop(`signal:${signal}`);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const result = await controller.run();
  logger.info('bot_exited', { event: 'bot_exited', exit: result.exit, reason: result.reason, iterations: result.iterations });
  process.exit(result.exit === 'risk_stop' ? 2 : 0);
}

main().catch((error: unknown) => {
  logger.error('bot_fatal', { event: 'bot_fatal', error: formatError(error) });
  process.exit(1);
});

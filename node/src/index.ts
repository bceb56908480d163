// Load environment variables FIRST
import 'dotenv/config';

import { loadConfig } from '@/config/app.config';
import { createPipelineDeps } from '@/services/pipeline-deps';
import { createApp } from '@/app';
import { logger } from '@/services/logger';
import { errorMessage } from '@/services/pipeline-errors';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

function main(): void {
  const config = loadConfig();
  const deps = createPipelineDeps(config);

  setupUnhandledRejectionHandler();
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const app = createApp(deps);
  const server = app.listen(config.port, () => {
    logger.info('server:listening', { port: config.port });
  });
  setServerInstance(server);

  const telegram = deps.telegram;
  if (!telegram) {
    logger.warn('telegram:disabled', { reason: 'TELEGRAM_BOT_TOKEN not set' });
  } else if (config.telegramMode === 'polling') {
    onShutdown(() => telegram.stop());
    telegram.startPolling().catch((err: unknown) => {
      logger.error('telegram:polling_crashed', { error: errorMessage(err) });
    });
  } else {
    logger.info('telegram:webhook', { path: '/telegram/webhook' });
  }
}

try {
  main();
} catch (err) {
  logger.fatal('server:startup_failed', { error: errorMessage(err) });
  process.exit(1);
}

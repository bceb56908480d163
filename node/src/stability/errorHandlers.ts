// Process-level handlers: nothing in the pipeline may take the process down.

import type { Server } from 'http';
import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/services/logger';
import { errorMessage } from '@/services/pipeline-errors';

let serverInstance: Server | null = null;
const shutdownHooks: Array<() => void | Promise<void>> = [];

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Runs before the HTTP server closes (e.g. stop Telegram polling). */
export function onShutdown(hook: () => void | Promise<void>): void {
  shutdownHooks.push(hook);
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info(`process:${signal.toLowerCase()}`);
      gracefulShutdown(signal, 0);
    });
  });
}

function gracefulShutdown(reason: string, exitCode: number): void {
  logger.info('process:shutdown', { reason });

  // In-flight runs get 10 seconds to reply.
  const forced = setTimeout(() => {
    logger.error('process:forced_shutdown');
    process.exit(1);
  }, 10000);
  forced.unref();

  const hooks = shutdownHooks.map((hook) =>
    Promise.resolve()
      .then(hook)
      .catch((err: unknown) => {
        logger.warn('process:shutdown_hook_failed', { error: errorMessage(err) });
      }),
  );

  Promise.all(hooks)
    .then(() => {
      if (!serverInstance) {
        process.exit(exitCode);
      }
      serverInstance.close(() => {
        logger.info('process:http_closed');
        process.exit(exitCode);
      });
    })
    .catch((err: unknown) => {
      logger.error('process:shutdown_failed', { error: errorMessage(err) });
      process.exit(1);
    });
}

/** Last-resort express error middleware; details stay in the log. */
export function errorMiddleware(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  // body-parser errors carry their own 4xx status
  const status =
    typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
      ? err.status
      : 500;
  logger.error('http:unhandled_error', { status, error: errorMessage(err) });
  if (res.headersSent) return;
  if (status < 500) {
    res.status(status).json({ error: 'bad_request' });
    return;
  }
  res.status(500).json({ error: 'internal_error', message: 'Internal Server Error' });
}

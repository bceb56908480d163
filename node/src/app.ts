// Express app around the pipeline
import express from 'express';
import helmet from 'helmet';
import type { PipelineDeps } from '@/services/pipeline-deps';
import { attachCorrelationId } from '@/middleware/correlation';
import { createFlightsRouter } from '@/routes/flights';
import { createTelegramRouter } from '@/routes/telegram';
import { errorMiddleware } from '@/stability/errorHandlers';

export function createApp(deps: PipelineDeps): express.Express {
  const app = express();

  app.use(helmet());
  app.use(attachCorrelationId);
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', telegram: deps.telegram ? deps.config.telegramMode : 'disabled' });
  });

  app.use('/api/flights', createFlightsRouter(deps.orchestrator));
  if (deps.telegram && deps.config.telegramMode === 'webhook') {
    app.use('/telegram', createTelegramRouter(deps.telegram, deps.config.telegramWebhookSecret));
  }

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found' });
  });
  app.use(errorMiddleware);

  return app;
}

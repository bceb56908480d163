// Telegram webhook: acknowledge at once, answer in the background
import express, { Request, Response } from 'express';
import { telegramUpdateSchema, type TelegramTransport } from '@/services/chat/telegram-transport';
import { logger } from '@/services/logger';
import { errorMessage } from '@/services/pipeline-errors';

const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export function createTelegramRouter(
  transport: Pick<TelegramTransport, 'handleUpdate'>,
  webhookSecret?: string,
): express.Router {
  const router = express.Router();

  router.post('/webhook', (req: Request, res: Response) => {
    if (webhookSecret && req.header(SECRET_HEADER) !== webhookSecret) {
      return res.status(401).json({ error: 'unauthorized' });
    }

    const parsed = telegramUpdateSchema.safeParse(req.body);
    // Telegram redelivers on non-2xx, so unusable updates are acknowledged and skipped.
    res.sendStatus(200);
    if (!parsed.success) {
      logger.warn('telegram:bad_update', { issues: parsed.error.errors.length });
      return;
    }

    transport.handleUpdate(parsed.data).catch((err: unknown) => {
      logger.error('telegram:update_failed', { updateId: parsed.data.update_id, error: errorMessage(err) });
    });
  });

  return router;
}

// Plain JSON chat endpoint: { text } in, { reply } out
import express, { Request, Response } from 'express';
import { z } from 'zod';
import type { Orchestrator } from '@/services/orchestrator';
import { getCorrelationId } from '@/middleware/correlation';

const flightQuerySchema = z.object({
  text: z.string().trim().min(1, 'text is required').max(1000, 'text is too long'),
});

function sendJsonError(res: Response, status: number, code: string, details?: unknown) {
  return res.status(status).json({ error: code, details });
}

export function createFlightsRouter(orchestrator: Pick<Orchestrator, 'run'>): express.Router {
  const router = express.Router();

  /**
   * POST /api/flights/query
   * A client that disconnects before the reply is ready gets nothing; the run is dropped.
   */
  router.post('/query', async (req: Request, res: Response) => {
    const validation = flightQuerySchema.safeParse(req.body);
    if (!validation.success) {
      return sendJsonError(
        res,
        400,
        'invalid_request',
        validation.error.errors.map((e) => ({ path: e.path.join('.') || 'root', message: e.message })),
      );
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const correlationId = getCorrelationId(req);
    const outcome = await orchestrator.run(validation.data.text, {
      signal: controller.signal,
      ...(correlationId && { correlationId }),
    });
    if (outcome.status === 'dropped') return;

    return res.json({ reply: outcome.reply });
  });

  return router;
}

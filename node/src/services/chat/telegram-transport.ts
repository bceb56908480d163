// Telegram Bot API adapter (webhook or long polling)
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Orchestrator } from '@/services/orchestrator';
import { DeliveryError, errorMessage } from '@/services/pipeline-errors';
import { logger } from '@/services/logger';

export const GREETING = "Hi! Tell me where you want to fly and when, and I'll find the cheapest tickets.";
export const HELP_TEXT = [
  'Send me a trip in plain words, for example:',
  '• flight from HYD to BER on Oct 2',
  '• Toronto to NYC from Oct 10 to 20',
].join('\n');

export const telegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: z
    .object({
      message_id: z.number().int(),
      chat: z.object({ id: z.number().int() }),
      text: z.string().optional(),
    })
    .optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

const updateIdSchema = z.object({ update_id: z.number().int() });

const getUpdatesSchema = z.object({
  ok: z.boolean(),
  result: z.array(z.unknown()).default([]),
});

export interface TelegramTransportOptions {
  botToken: string;
  orchestrator: Pick<Orchestrator, 'run'>;
  timeoutSeconds: number;
  /** Long-poll wait passed to getUpdates. */
  pollTimeoutSeconds?: number;
  http?: AxiosInstance;
}

export class TelegramTransport {
  private readonly http: AxiosInstance;
  private readonly pollTimeoutSeconds: number;
  private offset = 0;
  private polling: AbortController | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: TelegramTransportOptions) {
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 25;
    this.http =
      options.http ??
      axios.create({
        baseURL: `https://api.telegram.org/bot${options.botToken}/`,
        timeout: options.timeoutSeconds * 1000,
      });
  }

  /** One inbound update → at most one reply. Never throws. */
  async handleUpdate(update: TelegramUpdate, signal?: AbortSignal): Promise<void> {
    const message = update.message;
    if (!message?.text) return;

    const chatId = message.chat.id;
    const text = message.text.trim();
    const command = text.split(/\s+/)[0]?.split('@')[0];

    let reply: string | null;
    if (command === '/start') {
      reply = GREETING;
    } else if (command?.startsWith('/')) {
      reply = HELP_TEXT;
    } else {
      const outcome = await this.options.orchestrator.run(text, {
        correlationId: `tg-${update.update_id}`,
        ...(signal && { signal }),
      });
      reply = outcome.status === 'replied' ? outcome.reply : null;
    }
    if (reply === null) return;

    try {
      await this.sendMessage(chatId, reply);
    } catch (err) {
      logger.error('telegram:delivery_failed', { chatId, error: errorMessage(err) });
    }
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    try {
      await this.http.post('sendMessage', { chat_id: chatId, text });
    } catch (err) {
      throw new DeliveryError(chatId, { cause: err });
    }
  }

  /**
   * Fetches one batch of updates and starts a run for each; returns how many were started.
   * Runs for different chats overlap; `idle()` waits for them.
   */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const res = await this.http.get('getUpdates', {
      params: { offset: this.offset, timeout: this.pollTimeoutSeconds },
      timeout: (this.pollTimeoutSeconds + this.options.timeoutSeconds) * 1000,
      ...(signal && { signal }),
    });
    const body = getUpdatesSchema.parse(res.data);

    let handled = 0;
    for (const raw of body.result) {
      const id = updateIdSchema.safeParse(raw);
      if (id.success) this.offset = Math.max(this.offset, id.data.update_id + 1);

      const parsed = telegramUpdateSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('telegram:bad_update', { issues: parsed.error.errors.length });
        continue;
      }
      const run: Promise<void> = this.handleUpdate(parsed.data, signal)
        .catch((err: unknown) => {
          logger.error('telegram:update_failed', { updateId: parsed.data.update_id, error: errorMessage(err) });
        })
        .finally(() => this.inFlight.delete(run));
      this.inFlight.add(run);
      handled++;
    }
    return handled;
  }

  /** Polls until stop(); a failed poll is logged and retried after a short pause. */
  async startPolling(): Promise<void> {
    if (this.polling) return;
    const controller = new AbortController();
    this.polling = controller;
    logger.info('telegram:polling_started');

    while (!controller.signal.aborted) {
      try {
        await this.pollOnce(controller.signal);
      } catch (err) {
        if (controller.signal.aborted) break;
        logger.warn('telegram:poll_failed', { error: errorMessage(err) });
        await new Promise((resolve) => setTimeout(resolve, 2000));
      }
    }
    logger.info('telegram:polling_stopped');
  }

  /** Resolves once every run started by polling has settled. */
  async idle(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  /** Stops polling; runs in flight drop after their current stage. */
  async stop(): Promise<void> {
    this.polling?.abort();
    this.polling = null;
    await this.idle();
  }
}

/** App configuration, read once at startup and handed to each component. */
import { z } from 'zod';
import { ConfigError } from '@/services/pipeline-errors';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1, 'NLU API key is required'),
  NLU_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  SERPAPI_KEY: z.string().trim().min(1, 'Search provider API key is required'),
  SEARCH_TIMEOUT_SECONDS: z.coerce.number().positive().max(300).default(30),
  MAX_OPTIONS_PER_LEG: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_MODE: z.enum(['webhook', 'polling']).default('webhook'),
  TELEGRAM_WEBHOOK_SECRET: optionalString,
  SEARCH_CURRENCY: z.string().trim().length(3).toUpperCase().default('USD'),
  SEARCH_COUNTRY: z.string().trim().length(2).toLowerCase().default('us'),
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
});

export interface AppConfig {
  nluApiKey: string;
  nluModel: string;
  searchApiKey: string;
  searchTimeoutSeconds: number;
  maxOptionsPerLeg: number;
  retryAttempts: number;
  chatBotToken?: string;
  telegramMode: 'webhook' | 'polling';
  telegramWebhookSecret?: string;
  currency: string;
  country: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    );
  }

  const e = result.data;
  return Object.freeze({
    nluApiKey: e.OPENAI_API_KEY,
    nluModel: e.NLU_MODEL,
    searchApiKey: e.SERPAPI_KEY,
    searchTimeoutSeconds: e.SEARCH_TIMEOUT_SECONDS,
    maxOptionsPerLeg: e.MAX_OPTIONS_PER_LEG,
    retryAttempts: e.RETRY_ATTEMPTS,
    chatBotToken: e.TELEGRAM_BOT_TOKEN,
    telegramMode: e.TELEGRAM_MODE,
    telegramWebhookSecret: e.TELEGRAM_WEBHOOK_SECRET,
    currency: e.SEARCH_CURRENCY,
    country: e.SEARCH_COUNTRY,
    port: e.PORT,
  });
}

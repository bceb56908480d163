// Builds the pipeline once from config for the HTTP routes and the bot
import type { AppConfig } from '@/config/app.config';
import { OpenAiNluClient } from '@/services/llm-client';
import { SerpApiFlightProvider } from '@/services/providers/flights/serpapi-flight-provider';
import { Orchestrator } from '@/services/orchestrator';
import { TelegramTransport } from '@/services/chat/telegram-transport';

export interface PipelineDeps {
  config: AppConfig;
  orchestrator: Orchestrator;
  /** Present only when a bot token is configured. */
  telegram?: TelegramTransport;
}

export function createPipelineDeps(config: AppConfig): PipelineDeps {
  const orchestrator = new Orchestrator({
    nlu: new OpenAiNluClient({
      apiKey: config.nluApiKey,
      model: config.nluModel,
      timeoutSeconds: config.searchTimeoutSeconds,
    }),
    provider: new SerpApiFlightProvider({
      apiKey: config.searchApiKey,
      timeoutSeconds: config.searchTimeoutSeconds,
      currency: config.currency,
      country: config.country,
    }),
    maxOptionsPerLeg: config.maxOptionsPerLeg,
    retryAttempts: config.retryAttempts,
  });

  const telegram = config.chatBotToken
    ? new TelegramTransport({
        botToken: config.chatBotToken,
        orchestrator,
        timeoutSeconds: config.searchTimeoutSeconds,
      })
    : undefined;

  return { config, orchestrator, ...(telegram && { telegram }) };
}

// NLU client: free text + schema hint in, raw JSON text out

import OpenAI from 'openai';

export interface NluClient {
  classify(rawText: string, schemaHint: string): Promise<string>;
}

export interface OpenAiNluOptions {
  apiKey: string;
  model: string;
  timeoutSeconds: number;
}

const SYSTEM = 'You are a JSON-only classifier/extractor for flight search requests.';

export class OpenAiNluClient implements NluClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiNluOptions) {
    // SDK retries off: the orchestrator owns retry policy.
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutSeconds * 1000,
      maxRetries: 0,
    });
    this.model = options.model;
  }

  async classify(rawText: string, schemaHint: string): Promise<string> {
    const res = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: `${SYSTEM}\n\n${schemaHint}` },
        { role: 'user', content: rawText },
      ],
      temperature: 0,
      max_tokens: 256,
      response_format: { type: 'json_object' },
    });
    return res.choices[0]?.message?.content ?? '';
  }
}

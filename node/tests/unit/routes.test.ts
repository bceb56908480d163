import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../../src/app';
import { loadConfig } from '../../src/config/app.config';
import { Orchestrator } from '../../src/services/orchestrator';
import { TelegramTransport } from '../../src/services/chat/telegram-transport';
import { NOW, nluJson, providerReturning, serpRecord } from '../helpers/fixtures';

const HYD_BER = nluJson({ origin: 'HYD', destination: 'BER', depart_date: '2026-10-02', return_date: null });

let releaseNlu: () => void = () => undefined;
const nluGate = new Promise<void>((resolve) => {
  releaseNlu = resolve;
});
let blockNlu = false;

const classify = vi.fn(async () => {
  if (blockNlu) await nluGate;
  return HYD_BER;
});
const { provider } = providerReturning({
  records: [serpRecord('Lufthansa', 612, '2026-10-02 03:10', '2026-10-02 12:20')],
  currency: 'EUR',
});

const config = loadConfig({
  OPENAI_API_KEY: 'test-openai',
  SERPAPI_KEY: 'test-serp',
  TELEGRAM_BOT_TOKEN: 'test-token',
  TELEGRAM_WEBHOOK_SECRET: 'test-secret',
});
const orchestrator = new Orchestrator({
  nlu: { classify },
  provider,
  maxOptionsPerLeg: 3,
  retryAttempts: 1,
  now: () => NOW,
});
const telegram = new TelegramTransport({ botToken: 'test-token', orchestrator, timeoutSeconds: 5 });
const handleUpdate = vi.spyOn(telegram, 'handleUpdate').mockResolvedValue(undefined);
const run = vi.spyOn(orchestrator, 'run');

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  server = createApp({ config, orchestrator, telegram }).listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

function postJson(path: string, body: unknown, headers: Record<string, string> = {}, signal?: AbortSignal) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
    ...(signal && { signal }),
  });
}

describe('POST /api/flights/query', () => {
  it('answers with the pipeline reply', async () => {
    const res = await postJson('/api/flights/query', { text: 'flight from HYD to BER on Oct 2' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      reply: 'Outbound: HYD → BER on 2026-10-02\n1. Lufthansa · EUR 612 · nonstop · 2026-10-02 03:10 → 2026-10-02 12:20 (1h 25m)',
    });
  });

  it('rejects a blank text with 400', async () => {
    const res = await postJson('/api/flights/query', { text: '   ' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'invalid_request',
      details: [{ path: 'text', message: 'text is required' }],
    });
  });

  it('drops the run when the client disconnects before the reply', async () => {
    run.mockClear();
    blockNlu = true;
    const client = new AbortController();

    const pending = postJson('/api/flights/query', { text: 'flight from HYD to BER on Oct 2' }, {}, client.signal);
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));
    client.abort();
    await expect(pending).rejects.toThrow();

    const signal = run.mock.calls[0][1]?.signal;
    await vi.waitFor(() => expect(signal?.aborted).toBe(true));
    releaseNlu();

    await expect(run.mock.results[0].value).resolves.toEqual({ status: 'dropped', state: 'EXTRACTING' });
    blockNlu = false;
  });
});

describe('POST /telegram/webhook', () => {
  const update = { update_id: 9, message: { message_id: 90, chat: { id: 555 }, text: 'HYD to BER' } };

  it('rejects a wrong secret token with 401', async () => {
    handleUpdate.mockClear();

    const res = await postJson('/telegram/webhook', update, { 'x-telegram-bot-api-secret-token': 'wrong' });

    expect(res.status).toBe(401);
    expect(handleUpdate).not.toHaveBeenCalled();
  });

  it('acknowledges a malformed update and skips it', async () => {
    handleUpdate.mockClear();

    const res = await postJson(
      '/telegram/webhook',
      { update_id: 'nine', message: 'garbled' },
      { 'x-telegram-bot-api-secret-token': 'test-secret' },
    );

    expect(res.status).toBe(200);
    expect(handleUpdate).not.toHaveBeenCalled();
  });

  it('acknowledges a valid update and hands it to the transport', async () => {
    handleUpdate.mockClear();

    const res = await postJson('/telegram/webhook', update, { 'x-telegram-bot-api-secret-token': 'test-secret' });

    expect(res.status).toBe(200);
    expect(handleUpdate).toHaveBeenCalledWith(update);
  });
});

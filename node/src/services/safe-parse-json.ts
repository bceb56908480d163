/**
 * JSON parse for model output: strips markdown fences and retries single-quoted objects.
 * Used by the intent extractor; never throws.
 */
import { logger } from '@/services/logger';

export type JsonObjectParse =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; reason: string };

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function stripFences(raw: string): string {
  let txt = raw.trim();

  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```(json)?\s*/, '').replace(/\s*```$/, '').trim();
    }
  }
  return txt;
}

export function safeParseJsonObject(raw: string, context: string): JsonObjectParse {
  const txt = stripFences(raw);
  if (!txt) return { ok: false, reason: 'empty response' };

  try {
    const parsed: unknown = JSON.parse(txt);
    if (isObject(parsed)) return { ok: true, value: parsed };
    logger.warn('safeParseJson:non_object', { context, raw: txt.slice(0, 300) });
    return { ok: false, reason: 'response is not a JSON object' };
  } catch {
    // {'key': 'value'}; a value holding an apostrophe still fails
    try {
      const parsed: unknown = JSON.parse(txt.replace(/'/g, '"'));
      if (isObject(parsed)) return { ok: true, value: parsed };
    } catch {
      // fall through to final warn
    }
    logger.warn('safeParseJson:parse_error', {
      context,
      error: 'Invalid JSON after stripping fences',
      raw: txt.slice(0, 300),
    });
    return { ok: false, reason: 'invalid JSON' };
  }
}

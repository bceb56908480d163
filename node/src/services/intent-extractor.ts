// src/services/intent-extractor.ts
// Free text → FlightQuery. The NLU service does the language work (names → codes, relative
// dates); this module only checks what comes back and never trusts its shape.
import { z } from 'zod';
import type { FlightQuery, Passengers } from '@/types/flights';
import type { NluClient } from './llm-client';
import { buildFlightSchemaHint, FLIGHT_FIELDS } from './prompt-templates';
import { safeParseJsonObject } from './safe-parse-json';
import { ExtractionError, errorMessage } from './pipeline-errors';
import { isCalendarDate, toCalendarDate } from '@/utils/calendarDate';
import { logger } from '@/services/logger';

export type ExtractionOutcome =
  | { kind: 'parsed'; query: FlightQuery }
  | { kind: 'malformed'; reason: string }
  | { kind: 'incomplete'; missingFields: string[] };

const nullableText = z.union([z.string(), z.null()]).optional();

const nluResponseSchema = z.object({
  [FLIGHT_FIELDS.origin]: nullableText,
  [FLIGHT_FIELDS.destination]: nullableText,
  [FLIGHT_FIELDS.departDate]: nullableText,
  [FLIGHT_FIELDS.returnDate]: nullableText,
  [FLIGHT_FIELDS.adults]: z.unknown().optional(),
  [FLIGHT_FIELDS.children]: z.unknown().optional(),
});

/** Empty strings and a literal "null" count as absent; models emit both. */
function present(value: string | null | undefined): string | undefined {
  if (value == null) return undefined;
  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase() === 'null') return undefined;
  return trimmed;
}

function count(value: unknown, min: number, max: number, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max
    ? value
    : fallback;
}

/** Turns one raw NLU response into a tagged outcome. Pure. */
export function parseExtraction(raw: string): ExtractionOutcome {
  const json = safeParseJsonObject(raw, 'parseExtraction');
  if (!json.ok) return { kind: 'malformed', reason: json.reason };

  const shape = nluResponseSchema.safeParse(json.value);
  if (!shape.success) {
    const fields = shape.error.errors.map((e) => e.path.join('.') || 'root');
    return { kind: 'malformed', reason: `unexpected field types: ${fields.join(', ')}` };
  }

  const p = shape.data;
  const origin = present(p[FLIGHT_FIELDS.origin]);
  const destination = present(p[FLIGHT_FIELDS.destination]);
  const departDate = present(p[FLIGHT_FIELDS.departDate]);

  const missingFields: string[] = [];
  if (!origin) missingFields.push(FLIGHT_FIELDS.origin);
  if (!destination) missingFields.push(FLIGHT_FIELDS.destination);
  if (!departDate) missingFields.push(FLIGHT_FIELDS.departDate);
  if (!origin || !destination || !departDate) return { kind: 'incomplete', missingFields };

  if (!isCalendarDate(departDate)) {
    return { kind: 'malformed', reason: `unreadable ${FLIGHT_FIELDS.departDate}: ${departDate}` };
  }

  const passengers: Passengers = {
    adults: count(p[FLIGHT_FIELDS.adults], 1, 9, 1),
    children: count(p[FLIGHT_FIELDS.children], 0, 8, 0),
  };
  const base = {
    origin: origin.toUpperCase(),
    destination: destination.toUpperCase(),
    departDate,
    passengers,
  };

  const returnDate = present(p[FLIGHT_FIELDS.returnDate]);
  const query: FlightQuery =
    returnDate && isCalendarDate(returnDate)
      ? { ...base, tripType: 'ROUND_TRIP', returnDate }
      : { ...base, tripType: 'ONE_WAY' };

  return { kind: 'parsed', query };
}

export class IntentExtractor {
  constructor(
    private readonly nlu: NluClient,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** One NLU call; no retries here. */
  async extract(rawText: string): Promise<FlightQuery> {
    const schemaHint = buildFlightSchemaHint(toCalendarDate(this.now()));

    let raw: string;
    try {
      raw = await this.nlu.classify(rawText, schemaHint);
    } catch (err) {
      throw new ExtractionError('unreachable', `NLU service call failed: ${errorMessage(err)}`, [], {
        cause: err,
      });
    }

    const outcome = parseExtraction(raw);
    switch (outcome.kind) {
      case 'parsed':
        logger.debug('intent-extractor:parsed', outcome.query);
        return outcome.query;
      case 'malformed':
        throw new ExtractionError('malformed', `NLU response malformed: ${outcome.reason}`);
      case 'incomplete':
        throw new ExtractionError(
          'incomplete',
          `NLU response missing ${outcome.missingFields.join(', ')}`,
          outcome.missingFields,
        );
    }
  }
}

// src/services/providers/flights/normalize-flight.ts
// Maps provider records onto FlightOption. Understands SerpAPI's grouped itineraries
// ({ flights: [...segments], layovers, price, total_duration }) and flat records
// ({ carrier | airline, price, departure_time, arrival_time, stops }).
import type { FlightOption, Leg } from '@/types/flights';

type RawRecord = Record<string, unknown>;

function isRecord(v: unknown): v is RawRecord {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function safeString(v: unknown): string {
  if (typeof v === 'string') return v.trim();
  if (typeof v === 'number') return String(v);
  return '';
}

/** 412, "412", "$1,204.50" → number; negatives and anything else → undefined. */
function safeAmount(v: unknown): number | undefined {
  if (typeof v === 'number') return Number.isFinite(v) && v >= 0 ? v : undefined;
  if (typeof v === 'string') {
    if (/^[^\d]*-/.test(v)) return undefined;
    const cleaned = v.replace(/[^\d.]/g, '');
    if (!cleaned) return undefined;
    const n = Number(cleaned);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function safeCount(v: unknown): number | undefined {
  const n = typeof v === 'string' ? Number(v) : v;
  return typeof n === 'number' && Number.isInteger(n) && n >= 0 ? n : undefined;
}

function timeOf(endpoint: unknown): string {
  return isRecord(endpoint) ? safeString(endpoint.time) : safeString(endpoint);
}

function fromSegments(item: RawRecord, segments: RawRecord[]): Omit<FlightOption, 'leg' | 'price'> {
  const first = segments[0];
  const last = segments[segments.length - 1];
  const layovers = Array.isArray(item.layovers) ? item.layovers.length : undefined;
  const durationMinutes = safeCount(item.total_duration);

  return {
    carrier: safeString(first?.airline),
    departTime: timeOf(first?.departure_airport),
    arriveTime: timeOf(last?.arrival_airport),
    stops: layovers ?? Math.max(segments.length - 1, 0),
    ...(durationMinutes !== undefined && { durationMinutes }),
  };
}

function fromFlat(item: RawRecord): Omit<FlightOption, 'leg' | 'price'> {
  const durationMinutes = safeCount(item.duration_minutes ?? item.durationMinutes);
  return {
    carrier: safeString(item.carrier ?? item.airline),
    departTime: safeString(item.departure_time ?? item.departTime) || timeOf(item.departure),
    arriveTime: safeString(item.arrival_time ?? item.arriveTime) || timeOf(item.arrival),
    stops: safeCount(item.stops ?? item.stop_count) ?? 0,
    ...(durationMinutes !== undefined && { durationMinutes }),
  };
}

/**
 * One raw record → FlightOption tagged with `leg`, or null when the record has no price or
 * no carrier (nothing a user could act on).
 */
export function normalizeFlightRecord(raw: unknown, leg: Leg, currency: string): FlightOption | null {
  if (!isRecord(raw)) return null;

  const amount = safeAmount(raw.price ?? raw.extracted_price ?? raw.total_price);
  if (amount === undefined) return null;

  const segments = Array.isArray(raw.flights) ? raw.flights.filter(isRecord) : [];
  const fields = segments.length > 0 ? fromSegments(raw, segments) : fromFlat(raw);
  if (!fields.carrier) return null;

  return {
    leg,
    price: { amount, currency: safeString(raw.currency) || currency },
    ...fields,
  };
}

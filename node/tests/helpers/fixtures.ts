import { vi } from 'vitest';
import type { FlightOption, FlightQuery, Leg, LegResult } from '../../src/types/flights';
import type { FlightProvider, ProviderLegResponse } from '../../src/services/providers/flights/flight-provider';
import type { NluClient } from '../../src/services/llm-client';

/** 2026-09-01, local noon. */
export const NOW = new Date(2026, 8, 1, 12, 0, 0);
export const TODAY = '2026-09-01';

export function oneWay(overrides: Partial<Omit<FlightQuery, 'tripType'>> = {}): FlightQuery {
  return {
    tripType: 'ONE_WAY',
    origin: 'HYD',
    destination: 'BER',
    departDate: '2026-10-02',
    passengers: { adults: 1, children: 0 },
    ...overrides,
  };
}

export function roundTrip(overrides: Partial<Omit<FlightQuery, 'tripType'>> & { returnDate?: string } = {}): FlightQuery {
  return {
    tripType: 'ROUND_TRIP',
    origin: 'YTO',
    destination: 'NYC',
    departDate: '2026-10-10',
    returnDate: '2026-10-20',
    passengers: { adults: 1, children: 0 },
    ...overrides,
  };
}

export function option(overrides: Partial<FlightOption> & { amount?: number } = {}): FlightOption {
  const { amount, ...rest } = overrides;
  return {
    leg: 'OUTBOUND',
    carrier: 'Air Canada',
    price: { amount: amount ?? 200, currency: 'CAD' },
    departTime: '2026-10-10 07:00',
    arriveTime: '2026-10-10 08:25',
    stops: 0,
    ...rest,
  };
}

export function legResult(leg: Leg, options: FlightOption[], overrides: Partial<LegResult> = {}): LegResult {
  return {
    leg,
    origin: leg === 'OUTBOUND' ? 'YTO' : 'NYC',
    destination: leg === 'OUTBOUND' ? 'NYC' : 'YTO',
    date: leg === 'OUTBOUND' ? '2026-10-10' : '2026-10-20',
    currency: 'CAD',
    options,
    ...overrides,
  };
}

/** A SerpAPI-style grouped itinerary. */
export function serpRecord(airline: string, price: number, departs: string, arrives: string, layovers = 0) {
  return {
    flights: [
      {
        airline,
        departure_airport: { id: 'YYZ', time: departs },
        arrival_airport: { id: 'LGA', time: arrives },
      },
    ],
    layovers: Array.from({ length: layovers }, (_, i) => ({ id: `L${i}` })),
    total_duration: 85,
    price,
  };
}

export function nluReturning(...responses: Array<string | Error>) {
  const classify = vi.fn<[string, string], Promise<string>>();
  for (const r of responses) {
    if (r instanceof Error) classify.mockRejectedValueOnce(r);
    else classify.mockResolvedValueOnce(r);
  }
  const client: NluClient = { classify };
  return { client, classify };
}

export function providerReturning(...responses: Array<ProviderLegResponse | Error>) {
  const search = vi.fn<Parameters<FlightProvider['search']>, Promise<ProviderLegResponse>>();
  for (const r of responses) {
    if (r instanceof Error) search.mockRejectedValueOnce(r);
    else search.mockResolvedValueOnce(r);
  }
  const provider: FlightProvider = { name: 'fake-provider', search };
  return { provider, search };
}

export function nluJson(fields: Record<string, unknown>): string {
  return JSON.stringify(fields);
}

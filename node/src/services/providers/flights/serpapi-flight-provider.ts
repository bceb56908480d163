// src/services/providers/flights/serpapi-flight-provider.ts
// Google Flights through SerpAPI, one one-way search per leg.
import axios, { type AxiosInstance } from 'axios';
import type { LegSearchRequest, PriceInsights } from '@/types/flights';
import type { FlightProvider, ProviderLegResponse } from './flight-provider';
import { logger } from '@/services/logger';

const SERPAPI_URL = 'https://serpapi.com/search';
/** SerpAPI google_flights `type`: 1 = round trip, 2 = one way. */
const ONE_WAY = 2;

export interface SerpApiOptions {
  apiKey: string;
  timeoutSeconds: number;
  currency: string;
  country: string;
  language?: string;
  http?: AxiosInstance;
}

interface SerpApiResponse {
  search_metadata?: { status?: string };
  error?: string;
  best_flights?: unknown[];
  other_flights?: unknown[];
  price_insights?: { lowest_price?: unknown; price_level?: unknown };
}

function asArray(v: unknown): unknown[] {
  return Array.isArray(v) ? v : [];
}

function readInsights(raw: SerpApiResponse['price_insights']): PriceInsights | undefined {
  if (!raw) return undefined;
  const insights: PriceInsights = {
    ...(typeof raw.lowest_price === 'number' && { lowestPrice: raw.lowest_price }),
    ...(typeof raw.price_level === 'string' && { priceLevel: raw.price_level }),
  };
  return Object.keys(insights).length > 0 ? insights : undefined;
}

export class SerpApiFlightProvider implements FlightProvider {
  readonly name = 'serpapi-google-flights';
  private readonly http: AxiosInstance;

  constructor(private readonly options: SerpApiOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutSeconds * 1000 });
  }

  async search(request: LegSearchRequest): Promise<ProviderLegResponse> {
    const params = {
      engine: 'google_flights',
      type: ONE_WAY,
      departure_id: request.origin,
      arrival_id: request.destination,
      outbound_date: request.date,
      adults: request.passengers.adults,
      children: request.passengers.children,
      currency: this.options.currency,
      gl: this.options.country,
      hl: this.options.language ?? 'en',
      api_key: this.options.apiKey,
    };

    logger.debug('serpapi:search', {
      origin: request.origin,
      destination: request.destination,
      date: request.date,
    });
    const res = await this.http.get<SerpApiResponse>(SERPAPI_URL, { params });
    const body = res.data;

    // An empty search comes back as status "Success" with an `error` text; only a
    // failed status (or an error without metadata) is a provider failure.
    const status = body.search_metadata?.status;
    if (status === 'Error' || (status === undefined && body.error)) {
      throw new Error(`SerpAPI error: ${body.error ?? 'unknown'}`);
    }
    if (body.error) {
      logger.debug('serpapi:no_results', { origin: request.origin, destination: request.destination, message: body.error });
    }

    const records = [...asArray(body.best_flights), ...asArray(body.other_flights)];
    const insights = readInsights(body.price_insights);
    return {
      records,
      currency: this.options.currency,
      ...(insights && { insights }),
    };
  }
}

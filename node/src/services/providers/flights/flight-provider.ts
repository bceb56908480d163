// src/services/providers/flights/flight-provider.ts
// Provider boundary: one call per leg, raw records out. Field names differ per provider;
// normalize-flight.ts maps them onto FlightOption.
import type { LegSearchRequest, PriceInsights } from '@/types/flights';

export interface ProviderLegResponse {
  /** Raw option records in the provider's own ranking order. */
  records: unknown[];
  /** Currency the provider priced the records in. */
  currency: string;
  insights?: PriceInsights;
}

export interface FlightProvider {
  name: string;
  search(request: LegSearchRequest): Promise<ProviderLegResponse>;
}

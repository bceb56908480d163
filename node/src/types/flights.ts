// src/types/flights.ts
// Canonical shapes that flow through the pipeline: text → FlightQuery → SearchResult → reply.

export type TripType = 'ONE_WAY' | 'ROUND_TRIP';

/** One direction of travel within a query. */
export type Leg = 'OUTBOUND' | 'RETURN';

export interface Passengers {
  adults: number;
  children: number;
}

interface BaseQuery {
  origin: string;        // "YTO"
  destination: string;   // "NYC"
  departDate: string;    // YYYY-MM-DD
  passengers: Passengers;
}

export type FlightQuery =
  | (BaseQuery & { tripType: 'ONE_WAY' })
  | (BaseQuery & { tripType: 'ROUND_TRIP'; returnDate: string });

export interface Money {
  amount: number;
  currency: string;
}

export interface FlightOption {
  leg: Leg;
  carrier: string;
  price: Money;
  departTime: string;   // provider local time, "YYYY-MM-DD HH:mm"
  arriveTime: string;
  /** 0 = nonstop. */
  stops: number;
  durationMinutes?: number;
}

/** Provider-level pricing hints for one leg, when the provider reports them. */
export interface PriceInsights {
  lowestPrice?: number;
  priceLevel?: string;
}

export interface LegResult {
  leg: Leg;
  origin: string;
  destination: string;
  date: string;
  currency: string;
  options: FlightOption[];
  insights?: PriceInsights;
}

export type SearchResult =
  | { tripType: 'ONE_WAY'; outbound: LegResult }
  | { tripType: 'ROUND_TRIP'; outbound: LegResult; return: LegResult };

/** Parameters of a single provider call. */
export interface LegSearchRequest {
  origin: string;
  destination: string;
  date: string;
  passengers: Passengers;
}

// src/services/search-dispatcher.ts
// Validated query → one provider call per leg → SearchResult. Provider order is kept as-is;
// ranking for display belongs to the formatter.
import type { FlightOption, FlightQuery, Leg, LegResult, LegSearchRequest, SearchResult } from '@/types/flights';
import type { FlightProvider, ProviderLegResponse } from './providers/flights/flight-provider';
import { normalizeFlightRecord } from './providers/flights/normalize-flight';
import { SearchError, errorMessage } from './pipeline-errors';
import { logger } from '@/services/logger';

export type LegOutcome = { ok: true; result: LegResult } | { ok: false; error: SearchError };

export class SearchDispatcher {
  constructor(private readonly provider: FlightProvider) {}

  async searchLeg(leg: Leg, request: LegSearchRequest): Promise<LegOutcome> {
    let response: ProviderLegResponse;
    try {
      response = await this.provider.search(request);
    } catch (err) {
      logger.warn('search-dispatcher:provider_failure', {
        provider: this.provider.name,
        leg,
        error: errorMessage(err),
      });
      return { ok: false, error: new SearchError(leg, 'provider_failure', { cause: err }) };
    }

    const { currency } = response;
    const options = response.records
      .map((raw) => normalizeFlightRecord(raw, leg, currency))
      .filter((o): o is FlightOption => o !== null);

    logger.info('search-dispatcher:leg', {
      leg,
      route: `${request.origin}-${request.destination}`,
      date: request.date,
      raw: response.records.length,
      usable: options.length,
    });

    if (options.length === 0) {
      return { ok: false, error: new SearchError(leg, 'no_options') };
    }

    return {
      ok: true,
      result: {
        leg,
        origin: request.origin,
        destination: request.destination,
        date: request.date,
        currency,
        options,
        ...(response.insights && { insights: response.insights }),
      },
    };
  }

  /**
   * Outbound always; return only for round trips. A failed return leg fails the whole
   * query and the outbound options are dropped with it.
   */
  async search(query: FlightQuery): Promise<SearchResult> {
    const outbound = await this.searchLeg('OUTBOUND', {
      origin: query.origin,
      destination: query.destination,
      date: query.departDate,
      passengers: query.passengers,
    });
    if (!outbound.ok) throw outbound.error;

    if (query.tripType === 'ONE_WAY') {
      return { tripType: 'ONE_WAY', outbound: outbound.result };
    }

    const inbound = await this.searchLeg('RETURN', {
      origin: query.destination,
      destination: query.origin,
      date: query.returnDate,
      passengers: query.passengers,
    });
    if (!inbound.ok) {
      logger.warn('search-dispatcher:return_failed', {
        discardedOutbound: outbound.result.options.length,
        reason: inbound.error.reason,
      });
      throw inbound.error;
    }

    return { tripType: 'ROUND_TRIP', outbound: outbound.result, return: inbound.result };
  }
}

import { describe, it, expect } from 'vitest';
import {
  NO_OPTIONS_MESSAGE,
  formatSearchResult,
  rankOptions,
} from '../../src/services/result-formatter';
import type { SearchResult } from '../../src/types/flights';
import { legResult, option } from '../helpers/fixtures';

const outboundOptions = [
  option({ carrier: 'WestJet', amount: 210, stops: 1, departTime: '2026-10-10 09:00', arriveTime: '2026-10-10 13:10', durationMinutes: 250 }),
  option({ carrier: 'Air Canada', amount: 189 }),
  option({ carrier: 'Porter', amount: 189, departTime: '2026-10-10 06:00', arriveTime: '2026-10-10 07:25' }),
  option({ carrier: 'Flair', amount: 189, stops: 1, departTime: '2026-10-10 05:00', arriveTime: '2026-10-10 09:00' }),
];

const roundTripResult: SearchResult = {
  tripType: 'ROUND_TRIP',
  outbound: legResult('OUTBOUND', outboundOptions, { insights: { lowestPrice: 189, priceLevel: 'typical' } }),
  return: legResult('RETURN', [
    option({
      leg: 'RETURN',
      carrier: 'Porter',
      amount: 175.5,
      stops: 2,
      departTime: '2026-10-20 18:00',
      arriveTime: '2026-10-20 19:30',
      durationMinutes: 90,
    }),
  ]),
};

describe('rankOptions', () => {
  it('orders by price, then stops, then departure time', () => {
    expect(rankOptions(outboundOptions).map((o) => o.carrier)).toEqual(['Porter', 'Air Canada', 'Flair', 'WestJet']);
  });

  it('leaves the input untouched', () => {
    const before = outboundOptions.map((o) => o.carrier);
    rankOptions(outboundOptions);
    expect(outboundOptions.map((o) => o.carrier)).toEqual(before);
  });

  it('yields non-decreasing price, and non-decreasing stops within a price', () => {
    const ranked = rankOptions(outboundOptions);
    for (let i = 1; i < ranked.length; i++) {
      const [prev, cur] = [ranked[i - 1], ranked[i]];
      expect(cur.price.amount).toBeGreaterThanOrEqual(prev.price.amount);
      if (cur.price.amount === prev.price.amount) expect(cur.stops).toBeGreaterThanOrEqual(prev.stops);
    }
  });
});

describe('formatSearchResult', () => {
  it('renders both legs under their own headings, top three per leg', () => {
    expect(formatSearchResult(roundTripResult)).toBe(
      [
        'Outbound: YTO → NYC on 2026-10-10',
        '1. Porter · CAD 189 · nonstop · 2026-10-10 06:00 → 2026-10-10 07:25',
        '2. Air Canada · CAD 189 · nonstop · 2026-10-10 07:00 → 2026-10-10 08:25',
        '3. Flair · CAD 189 · 1 stop · 2026-10-10 05:00 → 2026-10-10 09:00',
        'Lowest price seen: CAD 189 (typical)',
        '',
        'Return: NYC → YTO on 2026-10-20',
        '1. Porter · CAD 175.50 · 2 stops · 2026-10-20 18:00 → 2026-10-20 19:30 (1h 30m)',
      ].join('\n')
    );
  });

  it('honours a custom per-leg cap', () => {
    const oneWay: SearchResult = { tripType: 'ONE_WAY', outbound: legResult('OUTBOUND', outboundOptions) };

    expect(formatSearchResult(oneWay, { maxOptionsPerLeg: 1 })).toBe(
      'Outbound: YTO → NYC on 2026-10-10\n1. Porter · CAD 189 · nonstop · 2026-10-10 06:00 → 2026-10-10 07:25'
    );
  });

  it('has no Return heading for one-way results', () => {
    const oneWay: SearchResult = { tripType: 'ONE_WAY', outbound: legResult('OUTBOUND', outboundOptions) };

    expect(formatSearchResult(oneWay)).not.toContain('Return:');
  });

  it('shows the price level alone when no lowest price is known', () => {
    const oneWay: SearchResult = {
      tripType: 'ONE_WAY',
      outbound: legResult('OUTBOUND', [option()], { insights: { priceLevel: 'high' } }),
    };

    expect(formatSearchResult(oneWay).split('\n').pop()).toBe('Price level: high');
  });

  it('returns the fixed no-options message when a leg is empty', () => {
    const empty: SearchResult = {
      tripType: 'ROUND_TRIP',
      outbound: legResult('OUTBOUND', outboundOptions),
      return: legResult('RETURN', []),
    };

    expect(formatSearchResult(empty)).toBe(NO_OPTIONS_MESSAGE);
  });

  it('is idempotent on a fixed result', () => {
    expect(formatSearchResult(roundTripResult)).toBe(formatSearchResult(roundTripResult));
  });
});

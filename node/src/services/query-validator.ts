// Shape and consistency checks; no I/O.
import type { FlightQuery } from '@/types/flights';
import { ValidationError } from './pipeline-errors';
import { isCalendarDate } from '@/utils/calendarDate';

const AIRPORT_CODE = /^[A-Z]{3}$/;

/**
 * Returns `query` itself when it is a searchable trip as of `today` (YYYY-MM-DD).
 * Only the syntax of codes is checked; whether a code exists is the provider's business.
 */
export function validateQuery(query: FlightQuery, today: string): FlightQuery {
  for (const [field, code] of [
    ['origin', query.origin],
    ['destination', query.destination],
  ] as const) {
    if (!AIRPORT_CODE.test(code)) {
      throw new ValidationError('bad_code', `${field} is not a 3-letter code: ${code}`);
    }
  }

  if (query.origin === query.destination) {
    throw new ValidationError('same_airport', `origin and destination are both ${query.origin}`);
  }

  if (!isCalendarDate(query.departDate)) {
    throw new ValidationError('bad_date', `departDate is not a calendar date: ${query.departDate}`);
  }

  if (query.departDate < today) {
    throw new ValidationError('past_departure', `departDate ${query.departDate} is before ${today}`);
  }

  if (query.tripType === 'ROUND_TRIP') {
    if (!query.returnDate) {
      throw new ValidationError('missing_return', 'round trip without returnDate');
    }
    if (!isCalendarDate(query.returnDate)) {
      throw new ValidationError('bad_date', `returnDate is not a calendar date: ${query.returnDate}`);
    }
    if (query.returnDate <= query.departDate) {
      throw new ValidationError(
        'return_not_after_departure',
        `returnDate ${query.returnDate} is not after departDate ${query.departDate}`,
      );
    }
  }

  return query;
}

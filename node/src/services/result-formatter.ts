// SearchResult → chat reply text. Pure.
import type { FlightOption, LegResult, Money, PriceInsights, SearchResult } from '@/types/flights';

export const NO_OPTIONS_MESSAGE = 'No flights found for that trip. Try other dates or nearby airports.';
export const DEFAULT_MAX_OPTIONS_PER_LEG = 3;

export interface FormatOptions {
  maxOptionsPerLeg?: number;
}

/** Cheapest first, then fewer stops, then earlier departure. */
export function compareOptions(a: FlightOption, b: FlightOption): number {
  if (a.price.amount !== b.price.amount) return a.price.amount - b.price.amount;
  if (a.stops !== b.stops) return a.stops - b.stops;
  if (a.departTime === b.departTime) return 0;
  return a.departTime < b.departTime ? -1 : 1;
}

/** Sorted copy; the input is left untouched. */
export function rankOptions(options: readonly FlightOption[]): FlightOption[] {
  return [...options].sort(compareOptions);
}

function formatAmount(amount: number): string {
  return Number.isInteger(amount) ? String(amount) : amount.toFixed(2);
}

function formatMoney(price: Money): string {
  return `${price.currency} ${formatAmount(price.amount)}`;
}

function formatStops(stops: number): string {
  if (stops === 0) return 'nonstop';
  return stops === 1 ? '1 stop' : `${stops} stops`;
}

function formatDuration(minutes: number): string {
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

function formatOption(option: FlightOption, index: number): string {
  const times = `${option.departTime || 'n/a'} → ${option.arriveTime || 'n/a'}`;
  const duration = option.durationMinutes !== undefined ? ` (${formatDuration(option.durationMinutes)})` : '';
  return `${index + 1}. ${option.carrier} · ${formatMoney(option.price)} · ${formatStops(option.stops)} · ${times}${duration}`;
}

function formatInsights(insights: PriceInsights, currency: string): string | undefined {
  const { lowestPrice, priceLevel } = insights;
  if (lowestPrice !== undefined) {
    const level = priceLevel ? ` (${priceLevel})` : '';
    return `Lowest price seen: ${currency} ${formatAmount(lowestPrice)}${level}`;
  }
  return priceLevel ? `Price level: ${priceLevel}` : undefined;
}

function formatLeg(title: string, leg: LegResult, max: number): string {
  const lines = [`${title}: ${leg.origin} → ${leg.destination} on ${leg.date}`];
  rankOptions(leg.options)
    .slice(0, max)
    .forEach((option, i) => lines.push(formatOption(option, i)));
  const insights = leg.insights && formatInsights(leg.insights, leg.currency);
  if (insights) lines.push(insights);
  return lines.join('\n');
}

export function formatSearchResult(result: SearchResult, options: FormatOptions = {}): string {
  const max = options.maxOptionsPerLeg ?? DEFAULT_MAX_OPTIONS_PER_LEG;
  const legs: Array<[string, LegResult]> = [['Outbound', result.outbound]];
  if (result.tripType === 'ROUND_TRIP') legs.push(['Return', result.return]);

  // An empty leg means no inventory, which is a normal answer rather than a failure.
  if (legs.some(([, leg]) => leg.options.length === 0)) return NO_OPTIONS_MESSAGE;

  return legs.map(([title, leg]) => formatLeg(title, leg, max)).join('\n\n');
}

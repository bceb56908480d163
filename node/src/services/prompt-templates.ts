// Fixed instructions sent to the NLU service

/** Field names the extractor reads back from the NLU response. */
export const FLIGHT_FIELDS = {
  origin: 'origin',
  destination: 'destination',
  departDate: 'depart_date',
  returnDate: 'return_date',
  adults: 'adults',
  children: 'children',
} as const;

/**
 * Schema hint for flight extraction. `today` anchors relative dates and the year the
 * model should assume when the user leaves it out.
 */
export function buildFlightSchemaHint(today: string): string {
  const year = today.slice(0, 4);
  return `
Extract flight search details from the user's message.

Today is ${today}.

Return ONLY this JSON object:
{
  "${FLIGHT_FIELDS.origin}": string|null,       // 3-letter IATA airport or metropolitan city code
  "${FLIGHT_FIELDS.destination}": string|null,  // 3-letter IATA airport or metropolitan city code
  "${FLIGHT_FIELDS.departDate}": string|null,   // YYYY-MM-DD
  "${FLIGHT_FIELDS.returnDate}": string|null,   // YYYY-MM-DD, null for one-way trips
  "${FLIGHT_FIELDS.adults}": number,            // default 1
  "${FLIGHT_FIELDS.children}": number           // default 0
}

Rules:
- Convert city or airport names to codes (Toronto → YTO, New York → NYC, Hyderabad → HYD).
- When a date has no year, use ${year}.
- "from Oct 10 to 20" means depart Oct 10 and return Oct 20.
- Use null for anything the message does not say. Never guess a city.

Example: {"${FLIGHT_FIELDS.origin}": "YYZ", "${FLIGHT_FIELDS.destination}": "JFK", "${FLIGHT_FIELDS.departDate}": "${year}-03-10", "${FLIGHT_FIELDS.returnDate}": "${year}-03-15", "${FLIGHT_FIELDS.adults}": 1, "${FLIGHT_FIELDS.children}": 0}

No markdown, no code fences. Use double quotes.
`.trim();
}

/**
 * Flight Filter
 *
 * Parses the display strings of extracted rows into comparable values,
 * applies budget / time-of-day / stopover predicates, and picks the cheapest
 * match, earliest departure first on equal prices.
 */

import type {
  FilterCriteria,
  FlightRecord,
  ParsedFlight,
  StopoverPreference,
  TimeBucket,
} from '../types/flights.js';
import { logger } from '../utils/logger.js';

// ============================================
// FIELD PARSERS
// ============================================

/**
 * Strip everything but digits and '.', then parse.
 * "€1,234.50" -> 1234.5, "1234€" -> 1234, "N/A" -> null
 */
export function parsePrice(text: string): number | null {
  const digits = text.replace(/[^\d.]/g, '');
  if (digits === '') {
    return null;
  }
  const value = Number(digits);
  return Number.isFinite(value) && value >= 0 ? value : null;
}

const TWELVE_HOUR = /^(\d{1,2}):(\d{2})\s*([AaPp])\.?\s*[Mm]\.?$/;
const TWENTY_FOUR_HOUR = /^(\d{1,2}):(\d{2})$/;

/**
 * Minutes since midnight for a rendered clock time, or null.
 *
 * Day-offset markers ("+1") and everything after them are dropped, and
 * no-break spaces count as spaces. "6:05 PM" -> 1085, "11:20 AM+1" -> 680,
 * "12:15 AM" -> 15. Plain "HH:mm" is read as a 24-hour clock.
 */
export function parseClockTime(text: string): number | null {
  const cleaned = text
    .replace(/\+.*$/, '')
    .replace(/[\u202f\u00a0]/g, ' ')
    .trim();

  const twelve = TWELVE_HOUR.exec(cleaned);
  if (twelve) {
    const hour = Number(twelve[1]);
    const minute = Number(twelve[2]);
    if (hour < 1 || hour > 12 || minute > 59) {
      return null;
    }
    const isPm = twelve[3].toLowerCase() === 'p';
    return ((hour % 12) + (isPm ? 12 : 0)) * 60 + minute;
  }

  const twentyFour = TWENTY_FOUR_HOUR.exec(cleaned);
  if (twentyFour) {
    const hour = Number(twentyFour[1]);
    const minute = Number(twentyFour[2]);
    if (hour > 23 || minute > 59) {
      return null;
    }
    return hour * 60 + minute;
  }

  return null;
}

/**
 * morning [0,12), afternoon [12,18), evening [18,24)
 */
export function classifyTimeBucket(minutes: number): Exclude<TimeBucket, 'any'> {
  const hour = Math.floor(minutes / 60);
  if (hour < 12) return 'morning';
  if (hour < 18) return 'afternoon';
  return 'evening';
}

/**
 * Number of stops in the rendered stops badge.
 * An absent badge ('' or 'N/A') means a nonstop flight; text that is not
 * a recognised phrase gives null.
 */
export function parseStopCount(text: string): number | null {
  const cleaned = text.trim();
  if (cleaned === '' || /^n\/?a$/i.test(cleaned)) {
    return 0;
  }
  if (/\b(non-?stop|direct|sans escale)\b/i.test(cleaned)) {
    return 0;
  }
  const counted = /(\d+)\s*(stops?|escales?)\b/i.exec(cleaned);
  if (counted) {
    return Number(counted[1]);
  }
  return null;
}

/**
 * Parse a record, or null when its price is unusable
 */
export function parseFlight(record: FlightRecord): ParsedFlight | null {
  const priceValue = parsePrice(record.price);
  if (priceValue === null) {
    return null;
  }
  return {
    record,
    priceValue,
    departureMinutes: parseClockTime(record.departureTime),
    stopCount: parseStopCount(record.stops),
  };
}

// ============================================
// PREDICATES
// ============================================

export function matchesTimeBucket(flight: ParsedFlight, bucket: TimeBucket): boolean {
  if (bucket === 'any') return true;
  if (flight.departureMinutes === null) return false;
  return classifyTimeBucket(flight.departureMinutes) === bucket;
}

/**
 * 'none' keeps only nonstop flights, so one-stop and multi-stop rows are
 * both excluded. Rows with an unrecognised stop count pass only 'any'.
 */
export function matchesStopover(flight: ParsedFlight, preference: StopoverPreference): boolean {
  if (preference === 'any') return true;
  if (flight.stopCount === null) return false;
  return preference === 'none' ? flight.stopCount === 0 : flight.stopCount >= 1;
}

export function matchesBudget(flight: ParsedFlight, maxPrice: number | undefined): boolean {
  return maxPrice === undefined || flight.priceValue <= maxPrice;
}

/**
 * Ascending price, then ascending departure. Unknown departures sort last.
 */
export function compareFlights(a: ParsedFlight, b: ParsedFlight): number {
  if (a.priceValue !== b.priceValue) {
    return a.priceValue - b.priceValue;
  }
  if (a.departureMinutes === b.departureMinutes) return 0;
  if (a.departureMinutes === null) return 1;
  if (b.departureMinutes === null) return -1;
  return a.departureMinutes - b.departureMinutes;
}

// ============================================
// SELECTION
// ============================================

export interface FilterOutcome {
  /** Matching flights, best first */
  matches: ParsedFlight[];
  /** Rows dropped because their price did not parse */
  droppedRows: number;
  /** Rows with a usable price */
  candidates: number;
}

export function filterFlights(records: readonly FlightRecord[], criteria: FilterCriteria): FilterOutcome {
  const parsed: ParsedFlight[] = [];
  let droppedRows = 0;

  for (const record of records) {
    const flight = parseFlight(record);
    if (flight) {
      parsed.push(flight);
    } else {
      droppedRows++;
    }
  }

  // Array.prototype.sort is stable, so equal keys keep page order
  const matches = parsed
    .filter((flight) =>
      matchesBudget(flight, criteria.maxPrice) &&
      matchesTimeBucket(flight, criteria.timeBucket) &&
      matchesStopover(flight, criteria.stopover)
    )
    .sort(compareFlights);

  logger.filter.debug('Filtered flights', {
    rows: records.length,
    droppedRows,
    matches: matches.length,
    criteria,
  });

  return { matches, droppedRows, candidates: parsed.length };
}

/**
 * Best flight for the criteria, or null when nothing matches
 */
export function select(records: readonly FlightRecord[], criteria: FilterCriteria): ParsedFlight | null {
  return filterFlights(records, criteria).matches[0] ?? null;
}

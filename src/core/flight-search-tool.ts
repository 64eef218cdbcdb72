/**
 * Flight Search Tool
 *
 * The capability the recommender hands to the model: structured filter
 * criteria in, a plain-text listing of matching flights out.
 */

import type { FilterCriteria, FlightRecord, ParsedFlight } from '../types/flights.js';
import { filterFlights } from './flight-filter.js';
import { logger } from '../utils/logger.js';

export interface FlightSearchCapability {
  readonly name: string;
  readonly description: string;
  run(criteria: FilterCriteria): Promise<string>;
}

export const FLIGHT_SEARCH_TOOL_NAME = 'flight_search';

export const NO_FLIGHTS_FOUND = 'No flights found matching these filters.';

const TABLE_COLUMNS: ReadonlyArray<{ header: string; value: (flight: ParsedFlight) => string }> = [
  { header: 'Departure', value: (f) => f.record.departureTime },
  { header: 'Airline', value: (f) => f.record.airline },
  { header: 'Stops', value: (f) => f.record.stops || 'Nonstop' },
  { header: 'Price', value: (f) => f.record.price },
  { header: 'Duration', value: (f) => f.record.duration },
  { header: 'CO2', value: (f) => f.record.co2Emissions },
];

/**
 * Left-aligned text table, columns separated by two spaces, no trailing
 * whitespace on any line.
 */
export function formatFlightTable(flights: readonly ParsedFlight[]): string {
  const cells = flights.map((flight) => TABLE_COLUMNS.map((column) => column.value(flight)));
  const widths = TABLE_COLUMNS.map((column, i) =>
    Math.max(column.header.length, ...cells.map((row) => row[i].length))
  );
  const line = (row: readonly string[]) =>
    row.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

  return [line(TABLE_COLUMNS.map((column) => column.header)), ...cells.map(line)].join('\n');
}

export interface RecordSearchToolOptions {
  /** Rows listed at most; the count line still reports every match */
  maxRows: number;
}

/**
 * Searches a fixed set of records, typically the ones loaded for the
 * route the user asked about.
 */
export class RecordSearchTool implements FlightSearchCapability {
  readonly name = FLIGHT_SEARCH_TOOL_NAME;
  readonly description =
    'Search the loaded flights by time of day (morning, afternoon, evening), ' +
    'stopover preference (none, required) and maximum price. ' +
    'Returns matching flights, cheapest first.';

  private options: RecordSearchToolOptions;

  constructor(
    private readonly records: readonly FlightRecord[],
    options: Partial<RecordSearchToolOptions> = {}
  ) {
    this.options = { maxRows: 10, ...options };
  }

  async run(criteria: FilterCriteria): Promise<string> {
    const { matches } = filterFlights(this.records, criteria);
    logger.recommender.debug('Flight search tool ran', { criteria, matches: matches.length });

    if (matches.length === 0) {
      return NO_FLIGHTS_FOUND;
    }
    const shown = matches.slice(0, this.options.maxRows);
    return `Flights found (${matches.length}):\n\n${formatFlightTable(shown)}`;
  }
}

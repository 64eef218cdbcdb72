/**
 * Flight search domain types
 */

/**
 * A one-way search. Codes are IATA airport codes, date is YYYY-MM-DD.
 * Nothing is validated: a malformed value yields a token the results page
 * cannot fulfill.
 */
export interface SearchRequest {
  readonly origin: string;
  readonly destination: string;
  readonly date: string;
}

/**
 * One rendered result row, exactly as the page displayed it
 */
export interface FlightRecord {
  readonly departureTime: string;
  readonly arrivalTime: string;
  readonly airline: string;
  readonly duration: string;
  readonly stops: string;
  readonly price: string;
  readonly co2Emissions: string;
  readonly emissionsVariation: string;
}

export type FlightField = keyof FlightRecord;

/**
 * Column order of the results file, paired with the record field it holds
 */
export const FLIGHT_COLUMNS: ReadonlyArray<{ header: string; field: FlightField }> = [
  { header: 'Departure Time', field: 'departureTime' },
  { header: 'Arrival Time', field: 'arrivalTime' },
  { header: 'Airline Company', field: 'airline' },
  { header: 'Flight Duration', field: 'duration' },
  { header: 'Stops', field: 'stops' },
  { header: 'Price', field: 'price' },
  { header: 'co2 emissions', field: 'co2Emissions' },
  { header: 'emissions variation', field: 'emissionsVariation' },
];

export type TimeBucket = 'morning' | 'afternoon' | 'evening' | 'any';

export type StopoverPreference = 'any' | 'none' | 'required';

export const TIME_BUCKETS: readonly TimeBucket[] = ['morning', 'afternoon', 'evening', 'any'];

export const STOPOVER_PREFERENCES: readonly StopoverPreference[] = ['any', 'none', 'required'];

export interface FilterCriteria {
  maxPrice?: number;
  timeBucket: TimeBucket;
  stopover: StopoverPreference;
}

export const DEFAULT_CRITERIA: FilterCriteria = {
  timeBucket: 'any',
  stopover: 'any',
};

/**
 * A record with the values filtering works on
 */
export interface ParsedFlight {
  readonly record: FlightRecord;
  readonly priceValue: number;
  /** Minutes since midnight, null when the departure text did not parse */
  readonly departureMinutes: number | null;
  /** null when the stops text is neither empty nor a recognised phrase */
  readonly stopCount: number | null;
}

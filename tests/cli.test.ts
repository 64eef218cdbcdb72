import { describe, it, expect } from 'vitest';
import { CliUsageError, formatAdvice, parseCliArgs } from '../src/cli.js';
import { parseFlight } from '../src/core/flight-filter.js';
import type { BestFlightResult } from '../src/sdk.js';
import type { ParsedFlight } from '../src/types/flights.js';

describe('parseCliArgs', () => {
  it('reads a filtered search', () => {
    expect(
      parseCliArgs(['TUN', 'CDG', '2025-07-14', '--time', 'Morning', '--stops', 'none', '--budget', '250'])
    ).toEqual({
      kind: 'advise',
      search: {
        origin: 'TUN',
        destination: 'CDG',
        date: '2025-07-14',
        criteria: { maxPrice: 250, timeBucket: 'morning', stopover: 'none' },
      },
      recommend: true,
      json: false,
    });
  });

  it('leaves unset filters open', () => {
    const command = parseCliArgs(['TUN', 'CDG', '2025-07-14', '--no-recommend', '--json']);

    expect(command).toMatchObject({ kind: 'advise', recommend: false, json: true });
    expect(command.kind === 'advise' && command.search.criteria).toEqual({
      maxPrice: undefined,
      timeBucket: undefined,
      stopover: undefined,
    });
  });

  it('treats a zero budget as no limit', () => {
    const command = parseCliArgs(['TUN', 'CDG', '2025-07-14', '--budget', '0', '--stops', 'none']);

    expect(command.kind === 'advise' && command.search.criteria).toEqual({
      maxPrice: undefined,
      timeBucket: undefined,
      stopover: 'none',
    });
  });

  it('reads a question', () => {
    expect(parseCliArgs(['TUN', 'CDG', '2025-07-14', '--ask', 'vol sans escale le soir'])).toEqual({
      kind: 'ask',
      question: { origin: 'TUN', destination: 'CDG', date: '2025-07-14', question: 'vol sans escale le soir' },
      json: false,
    });
  });

  it('shows help', () => {
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['TUN', '-h'])).toEqual({ kind: 'help' });
  });

  it.each([
    [['TUN', 'CDG'], 'Expected <FROM> <TO> <DATE>'],
    [['TUN', 'CDG', '14/07/2025'], 'Date must be in YYYY-MM-DD format'],
    [['TUN', 'CDG', '2025-07-14', '--time', 'dawn'], '--time must be one of: morning, afternoon, evening, any'],
    [['TUN', 'CDG', '2025-07-14', '--stops', 'two'], '--stops must be one of: any, none, required'],
    [['TUN', 'CDG', '2025-07-14', '--budget', '-5'], '--budget must be a non-negative number'],
    [['TUN', 'CDG', '2025-07-14', '--budget'], '--budget needs a value'],
    [['TUN', 'CDG', '2025-07-14', '--ask', '--json'], '--ask needs a value'],
    [['TUN', 'CDG', '2025-07-14', '--fast'], 'Unknown option: --fast'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new CliUsageError(message));
  });
});

describe('formatAdvice', () => {
  const flight = parseFlight({
    departureTime: '6:05 AM',
    arrivalTime: '8:40 AM',
    airline: 'Tunisair',
    duration: '2 hr 35 min',
    stops: '',
    price: '€189',
    co2Emissions: '118 kg CO2e',
    emissionsVariation: '',
  });

  function result(selected: ParsedFlight): BestFlightResult {
    return {
      request: { origin: 'TUN', destination: 'CDG', date: '2025-07-14' },
      searchUrl: 'http://localhost:9999/search?tfs=x',
      source: 'store',
      totalRows: 12,
      criteria: { timeBucket: 'morning', stopover: 'none' },
      flight: selected,
      droppedRows: 1,
      matchCount: 3,
    };
  }

  it('prints the selected flight', () => {
    if (!flight) throw new Error('test flight must have a price');

    expect(formatAdvice(result(flight))).toBe(
      [
        'TUN -> CDG on 2025-07-14',
        '3 of 12 flight(s) match (stored results)',
        '',
        'Airline:   Tunisair',
        'Departure: 6:05 AM',
        'Arrival:   8:40 AM',
        'Duration:  2 hr 35 min',
        'Stops:     Nonstop',
        'Price:     €189',
      ].join('\n')
    );
  });

  it('appends the recommendation', () => {
    if (!flight) throw new Error('test flight must have a price');

    const text = formatAdvice({ ...result(flight), source: 'extraction', recommendation: 'Book it.' });

    expect(text.split('\n')[1]).toBe('3 of 12 flight(s) match (fresh extraction)');
    expect(text.endsWith('\nPrice:     €189\n\nBook it.')).toBe(true);
  });
});

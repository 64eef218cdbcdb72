import { describe, it, expect } from 'vitest';
import {
  parseFilterQuery,
  parseBudget,
  parseStopoverPreference,
  parseTimeBucket,
} from '../../src/core/query-parser.js';

describe('parseFilterQuery', () => {
  it('reads an English request', () => {
    expect(parseFilterQuery('direct flight in the morning under 200 euros')).toEqual({
      timeBucket: 'morning',
      stopover: 'none',
      maxPrice: 200,
    });
  });

  it('reads a French request', () => {
    expect(parseFilterQuery('vol sans escale le matin moins de 200 €')).toEqual({
      timeBucket: 'morning',
      stopover: 'none',
      maxPrice: 200,
    });
    expect(parseFilterQuery("avec escale l'après-midi, 350 TND max")).toEqual({
      timeBucket: 'afternoon',
      stopover: 'required',
      maxPrice: 350,
    });
  });

  it('leaves everything open when nothing is recognised', () => {
    expect(parseFilterQuery('anything from Tunis to Paris')).toEqual({
      timeBucket: 'any',
      stopover: 'any',
    });
  });
});

describe('parseStopoverPreference', () => {
  it('recognises nonstop phrasing', () => {
    expect(parseStopoverPreference('a nonstop please')).toBe('none');
    expect(parseStopoverPreference('non-stop only')).toBe('none');
    expect(parseStopoverPreference('non stop flight, morning')).toBe('none');
    expect(parseStopoverPreference('without stops')).toBe('none');
    expect(parseStopoverPreference('no stopover')).toBe('none');
    expect(parseStopoverPreference('Sans escale')).toBe('none');
  });

  it('recognises requests for a stop', () => {
    expect(parseStopoverPreference('with a stopover in Rome')).toBe('required');
    expect(parseStopoverPreference('avec escale')).toBe('required');
    expect(parseStopoverPreference('one stop is fine')).toBe('required');
    expect(parseStopoverPreference('1 stop, soir')).toBe('required');
  });

  it('defaults to any', () => {
    expect(parseStopoverPreference('cheapest flight')).toBe('any');
  });
});

describe('parseBudget', () => {
  it('reads an amount followed by a currency', () => {
    expect(parseBudget('300 usd')).toBe(300);
    expect(parseBudget('100 dollars')).toBe(100);
    expect(parseBudget('budget 450€')).toBe(450);
  });

  it('reads a currency symbol followed by an amount', () => {
    expect(parseBudget('a flight with a stopover tonight for $180')).toBe(180);
    expect(parseBudget('£95 direct')).toBe(95);
  });

  it('reads an upper bound without a currency', () => {
    expect(parseBudget('non-stop evening flight below 1,250')).toBe(1250);
    expect(parseBudget('max 99.5')).toBe(99.5);
  });

  it('reads French space-grouped thousands', () => {
    expect(parseBudget('vol direct moins de 1 200 €')).toBe(1200);
    expect(parseBudget('moins de 1\u00A0450 euros')).toBe(1450);
    expect(parseBudget('max 2\u202F000 €')).toBe(2000);
    expect(parseBudget('under 1 200')).toBe(1200);
  });

  it('ignores numbers that are not prices', () => {
    expect(parseBudget('1 stop, soir')).toBeUndefined();
  });
});

describe('parseTimeBucket', () => {
  it('maps English and French keywords to buckets', () => {
    expect(parseTimeBucket('Morning flight')).toBe('morning');
    expect(parseTimeBucket('le matin')).toBe('morning');
    expect(parseTimeBucket('in the afternoon')).toBe('afternoon');
    expect(parseTimeBucket('apres-midi')).toBe('afternoon');
    expect(parseTimeBucket('depart apm')).toBe('afternoon');
    expect(parseTimeBucket('tonight')).toBe('evening');
    expect(parseTimeBucket('late night')).toBe('evening');
    expect(parseTimeBucket('ce soir')).toBe('evening');
  });

  it('takes the earliest bucket when several are mentioned', () => {
    expect(parseTimeBucket('evening or morning')).toBe('morning');
  });

  it('defaults to any', () => {
    expect(parseTimeBucket('whenever')).toBe('any');
  });
});

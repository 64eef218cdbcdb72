/**
 * Query Parser
 *
 * Reads filter criteria out of a free-text question ("direct flight in the
 * morning under 200 euros", "vol sans escale le matin moins de 200 €").
 * Keyword matching only; anything it does not recognise leaves the
 * corresponding criterion at 'any'.
 */

import type { FilterCriteria, StopoverPreference, TimeBucket } from '../types/flights.js';

const NONSTOP_PATTERN =
  /\bnon[\s-]?stop\b|\bdirect\b|\bwithout\s+(?:a\s+)?stop(?:over)?s?\b|\bno\s+stop(?:over)?s?\b|\bsans\s+escales?\b/i;
const WITH_STOP_PATTERN =
  /\bwith\s+(?:a\s+)?stop(?:over)?s?\b|\bavec\s+escales?\b|\bone\s+stop\b|\b1\s+stop\b/i;

// "1,250", "99.5", and French space-grouped "1 200" (plain, no-break or narrow no-break space)
const AMOUNT = String.raw`(\d{1,3}(?:[ \u00A0\u202F]\d{3})+(?:\.\d+)?|\d[\d,]*(?:\.\d+)?)`;
const AMOUNT_THEN_CURRENCY = new RegExp(
  String.raw`${AMOUNT}\s?(?:€|\$|£|eur(?:os?)?\b|usd\b|dollars?\b|tnd\b|gbp\b)`,
  'i'
);
const CURRENCY_THEN_AMOUNT = new RegExp(String.raw`(?:\$|€|£)\s?${AMOUNT}`);
const UPPER_BOUND = new RegExp(
  String.raw`\b(?:under|below|max(?:imum)?|less\s+than|moins\s+de)\s+${AMOUNT}`,
  'i'
);

// Checked in order, first match wins
const TIME_PATTERNS: ReadonlyArray<{ bucket: Exclude<TimeBucket, 'any'>; pattern: RegExp }> = [
  { bucket: 'morning', pattern: /\bmorning\b|\bmatin/i },
  { bucket: 'afternoon', pattern: /\bafternoon\b|\bapr[eè]s-midi\b|\bapm\b/i },
  { bucket: 'evening', pattern: /\bevening\b|\b(?:to)?night\b|\bsoir/i },
];

export function parseStopoverPreference(text: string): StopoverPreference {
  if (NONSTOP_PATTERN.test(text)) return 'none';
  if (WITH_STOP_PATTERN.test(text)) return 'required';
  return 'any';
}

/**
 * Budget ceiling mentioned in the text, or undefined.
 * "200 euros", "€200", "under 200" all give 200; "1,250 usd" and
 * "1 250 €" give 1250.
 */
export function parseBudget(text: string): number | undefined {
  for (const pattern of [AMOUNT_THEN_CURRENCY, CURRENCY_THEN_AMOUNT, UPPER_BOUND]) {
    const match = pattern.exec(text);
    if (match) {
      const value = Number(match[1].replace(/[,\s]/g, ''));
      if (Number.isFinite(value)) {
        return value;
      }
    }
  }
  return undefined;
}

export function parseTimeBucket(text: string): TimeBucket {
  const found = TIME_PATTERNS.find(({ pattern }) => pattern.test(text));
  return found ? found.bucket : 'any';
}

export function parseFilterQuery(text: string): FilterCriteria {
  const criteria: FilterCriteria = {
    timeBucket: parseTimeBucket(text),
    stopover: parseStopoverPreference(text),
  };
  const maxPrice = parseBudget(text);
  if (maxPrice !== undefined) {
    criteria.maxPrice = maxPrice;
  }
  return criteria;
}

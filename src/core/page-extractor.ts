/**
 * Page Extractor
 *
 * Navigates a fresh browser session to the results page for a token, waits
 * for the result rows to render, and reads eight text fields from each row.
 * Rows come back in page order.
 */

import type { FlightField, FlightRecord } from '../types/flights.js';
import { ExtractionError } from '../types/errors.js';
import { buildResultsUrl, DEFAULT_FLIGHTS_BASE_URL } from './request-encoder.js';
import type { BrowserSession, BrowserSessionFactory, ResultElement } from './browser-manager.js';
import { resolveTimeouts } from '../utils/timeouts.js';
import { logger } from '../utils/logger.js';

export const RESULT_ROW_SELECTOR = '.pIav2d';

/**
 * Selector per record field, looked up inside a result row
 */
export const FIELD_SELECTORS: Readonly<Record<FlightField, string>> = {
  departureTime: 'span[aria-label*="Departure time"]',
  arrivalTime: 'span[aria-label*="Arrival time"]',
  airline: '.sSHqwe',
  duration: 'div.gvkrdb',
  stops: 'div.EfT7Ae span.ogfYpf',
  price: 'div.FpEdX span',
  co2Emissions: 'div.O7CXue',
  emissionsVariation: 'div.N6PNV',
};

export interface PageExtractorOptions {
  baseUrl: string;
  navigationTimeoutMs?: number;
  selectorTimeoutMs?: number;
  /** Value for a field the row does not render. '' or 'N/A' */
  missingFieldPlaceholder: string;
}

const DEFAULT_OPTIONS: PageExtractorOptions = {
  baseUrl: DEFAULT_FLIGHTS_BASE_URL,
  missingFieldPlaceholder: '',
};

/**
 * Collapse the whitespace the page renders: narrow no-break spaces in
 * times ("6:05 AM"), no-break spaces in prices, and line breaks
 * inside multi-line badges.
 */
export function normalizeCellText(text: string): string {
  return text.replace(/[\u202f\u00a0]/g, ' ').replace(/\s+/g, ' ').trim();
}

export interface Extractor {
  extract(token: string): Promise<FlightRecord[]>;
}

export class PageExtractor implements Extractor {
  private options: PageExtractorOptions;

  constructor(
    private readonly sessions: BrowserSessionFactory,
    options: Partial<PageExtractorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * @throws ExtractionError on navigation failure, selector timeout, or any
   *   browser error. The session is closed on every path.
   */
  async extract(token: string): Promise<FlightRecord[]> {
    const url = buildResultsUrl(token, this.options.baseUrl);
    const timeouts = resolveTimeouts(this.options);
    const log = logger.extractor.child({ url });
    const startTime = Date.now();

    let session: BrowserSession;
    try {
      session = await this.sessions.openSession();
    } catch (error) {
      log.error('Could not open browser session', { error });
      throw new ExtractionError(url, describe(error), { cause: error });
    }

    try {
      await session.page.goto(url, timeouts.pageLoad);
      await session.page.waitForSelector(RESULT_ROW_SELECTOR, timeouts.selectorWait);

      const rows = await session.page.queryAll(RESULT_ROW_SELECTOR);
      const records: FlightRecord[] = [];
      for (const row of rows) {
        records.push(await this.readRow(row));
      }

      log.timed('Extracted flight rows', startTime, { rows: records.length });
      return records;
    } catch (error) {
      log.error('Extraction failed', { error });
      throw new ExtractionError(url, describe(error), { cause: error });
    } finally {
      try {
        await session.close();
      } catch (error) {
        log.warn('Failed to close browser session', { error: describe(error) });
      }
    }
  }

  private async readRow(row: ResultElement): Promise<FlightRecord> {
    const read = async (field: FlightField): Promise<string> => {
      const text = await row.textOf(FIELD_SELECTORS[field]);
      return text === null ? this.options.missingFieldPlaceholder : normalizeCellText(text);
    };

    return {
      departureTime: await read('departureTime'),
      arrivalTime: await read('arrivalTime'),
      airline: await read('airline'),
      duration: await read('duration'),
      stops: await read('stops'),
      price: await read('price'),
      co2Emissions: await read('co2Emissions'),
      emissionsVariation: await read('emissionsVariation'),
    };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Flight Advisor SDK
 *
 * Programmatic entry point: encode a search, load or extract its results,
 * pick the best flight for the criteria, and have the model explain it.
 * The MCP server and the CLI are thin layers over this module.
 *
 * Usage:
 * ```typescript
 * import { createFlightAdvisor } from 'flight-advisor';
 *
 * const advisor = createFlightAdvisor();
 * const advice = await advisor.advise({
 *   origin: 'TUN',
 *   destination: 'CDG',
 *   date: '2025-07-14',
 *   criteria: { timeBucket: 'morning', stopover: 'none', maxPrice: 250 },
 * });
 * console.log(advice.recommendation);
 * ```
 */

import { BrowserManager, type BrowserSessionFactory } from './core/browser-manager.js';
import { PageExtractor } from './core/page-extractor.js';
import {
  RecordStore,
  maxAgePolicy,
  normalizeRequest,
  writeOncePolicy,
  type LoadSource,
} from './core/record-store.js';
import { buildSearchUrl } from './core/request-encoder.js';
import { filterFlights } from './core/flight-filter.js';
import { RecordSearchTool } from './core/flight-search-tool.js';
import { OpenAIChatModel, RecommenderAgent, type LanguageModel } from './core/recommender-agent.js';
import { parseAdvisorConfig, type Env } from './utils/env-parser.js';
import { EmptyResultError } from './types/errors.js';
import { DEFAULT_CRITERIA, type FilterCriteria, type ParsedFlight, type SearchRequest } from './types/flights.js';
import { logger } from './utils/logger.js';

export type {
  SearchRequest,
  FlightRecord,
  FilterCriteria,
  ParsedFlight,
  TimeBucket,
  StopoverPreference,
} from './types/flights.js';
export {
  FlightAdvisorError,
  ExtractionError,
  EmptyResultError,
  RecommendationError,
  isFlightAdvisorError,
} from './types/errors.js';
export { encode, decodeToken, buildSearchUrl } from './core/request-encoder.js';
export { select, filterFlights } from './core/flight-filter.js';
export { parseFilterQuery } from './core/query-parser.js';
export { RecordStore, writeOncePolicy, maxAgePolicy } from './core/record-store.js';
export { PageExtractor } from './core/page-extractor.js';
export { BrowserManager } from './core/browser-manager.js';
export { RecommenderAgent, OpenAIChatModel } from './core/recommender-agent.js';
export type { LanguageModel, ChatMessage, ChatCompletion } from './core/recommender-agent.js';

// =============================================================================
// TYPES
// =============================================================================

export interface FlightSearch extends SearchRequest {
  /** Missing fields default to no budget, any time, any stopover */
  criteria?: Partial<FilterCriteria>;
}

export interface FlightQuestion extends SearchRequest {
  question: string;
}

export interface SearchOutcome {
  request: SearchRequest;
  searchUrl: string;
  source: LoadSource;
  totalRows: number;
}

export interface BestFlightResult extends SearchOutcome {
  criteria: FilterCriteria;
  flight: ParsedFlight;
  /** Rows skipped because their price did not parse */
  droppedRows: number;
  /** Flights that passed every filter */
  matchCount: number;
}

export interface AdviceResult extends BestFlightResult {
  recommendation: string;
}

export interface AnswerResult extends SearchOutcome {
  question: string;
  answer: string;
}

export interface FlightAdvisorDeps {
  store: RecordStore;
  model: LanguageModel;
  baseUrl: string;
  maxToolRounds?: number;
}

// =============================================================================
// CLIENT
// =============================================================================

export function resolveCriteria(partial: Partial<FilterCriteria> = {}): FilterCriteria {
  const criteria: FilterCriteria = {
    timeBucket: partial.timeBucket ?? DEFAULT_CRITERIA.timeBucket,
    stopover: partial.stopover ?? DEFAULT_CRITERIA.stopover,
  };
  if (partial.maxPrice !== undefined) {
    criteria.maxPrice = partial.maxPrice;
  }
  return criteria;
}

export class FlightAdvisor {
  constructor(private readonly deps: FlightAdvisorDeps) {}

  getStore(): RecordStore {
    return this.deps.store;
  }

  getSearchUrl(request: SearchRequest): string {
    const key = normalizeRequest(request);
    return buildSearchUrl(key.origin, key.destination, key.date, this.deps.baseUrl);
  }

  /**
   * Encode, load or extract, then filter. No model call.
   *
   * @throws ExtractionError when the results page could not be read
   * @throws EmptyResultError when no flight passes the criteria
   */
  async findBestFlight(search: FlightSearch): Promise<BestFlightResult> {
    const criteria = resolveCriteria(search.criteria);
    const outcome = await this.load(search);
    const { records } = outcome;
    const { matches, droppedRows, candidates } = filterFlights(records, criteria);

    const flight = matches[0];
    if (!flight) {
      logger.advisor.info('No flight matched', { criteria, candidates });
      throw new EmptyResultError(candidates);
    }

    return {
      request: outcome.request,
      searchUrl: outcome.searchUrl,
      source: outcome.source,
      totalRows: records.length,
      criteria,
      flight,
      droppedRows,
      matchCount: matches.length,
    };
  }

  /**
   * findBestFlight, then a written recommendation for the winner
   *
   * @throws RecommendationError when the model fails or answers with nothing
   */
  async advise(search: FlightSearch): Promise<AdviceResult> {
    const best = await this.findBestFlight(search);
    const agent = new RecommenderAgent(this.deps.model, undefined, this.agentOptions());
    const recommendation = await agent.summarize({ kind: 'flight', flight: best.flight });
    return { ...best, recommendation };
  }

  /**
   * Answer a free-text question about one route and date. The model can
   * search the loaded flights through the flight_search tool.
   */
  async ask(question: FlightQuestion): Promise<AnswerResult> {
    const outcome = await this.load(question);
    const tool = new RecordSearchTool(outcome.records);
    const agent = new RecommenderAgent(this.deps.model, tool, this.agentOptions());
    const answer = await agent.summarize({ kind: 'query', text: question.question });

    return {
      request: outcome.request,
      searchUrl: outcome.searchUrl,
      source: outcome.source,
      totalRows: outcome.records.length,
      question: question.question,
      answer,
    };
  }

  private agentOptions(): { maxToolRounds?: number } {
    return this.deps.maxToolRounds === undefined ? {} : { maxToolRounds: this.deps.maxToolRounds };
  }

  private async load(search: SearchRequest) {
    const request = normalizeRequest(search);
    const searchUrl = this.getSearchUrl(request);
    const startTime = Date.now();
    const { records, source } = await this.deps.store.loadOrFetchWithSource(request);
    logger.advisor.timed('Loaded flights', startTime, { source, rows: records.length, url: searchUrl });
    return { request, searchUrl, source, records };
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export interface CreateFlightAdvisorOptions {
  /** Environment to read configuration from (default: process.env) */
  env?: Env;
  /** Replaces the Playwright-backed browser */
  sessions?: BrowserSessionFactory;
  /** Replaces the OpenAI-compatible chat model */
  model?: LanguageModel;
}

/**
 * Wire a FlightAdvisor from environment configuration
 *
 * @throws ConfigValidationError when an environment variable is invalid
 */
export function createFlightAdvisor(options: CreateFlightAdvisorOptions = {}): FlightAdvisor {
  const config = parseAdvisorConfig(options.env);

  const sessions = options.sessions ?? new BrowserManager({
    headless: config.browser.headless,
    proxy: config.proxy,
  });
  const extractor = new PageExtractor(sessions, {
    baseUrl: config.browser.baseUrl,
    navigationTimeoutMs: config.browser.navigationTimeoutMs,
    selectorTimeoutMs: config.browser.selectorTimeoutMs,
  });

  const policy = config.store.maxAgeMinutes === undefined
    ? writeOncePolicy
    : maxAgePolicy(config.store.maxAgeMinutes * 60_000);
  const store = new RecordStore(extractor, { dataDir: config.store.dataDir, policy });

  const model = options.model ?? new OpenAIChatModel(config.recommender);

  logger.advisor.debug('Flight advisor configured', {
    dataDir: config.store.dataDir,
    policy: policy.name,
    model: config.recommender.model,
    proxied: config.proxy !== undefined,
  });

  return new FlightAdvisor({ store, model, baseUrl: config.browser.baseUrl });
}

/**
 * Tests for the MCP flight tool handlers
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { handleToolCall } from '../../src/mcp/handlers/flight-handlers.js';
import {
  errorCodeOf,
  errorResponse,
  jsonResponse,
  ToolArgumentError,
  type McpResponse,
} from '../../src/mcp/response-formatters.js';
import { TOOL_NAMES } from '../../src/mcp/tool-schemas.js';
import { FlightAdvisor, RecordStore, buildSearchUrl } from '../../src/sdk.js';
import type { Extractor } from '../../src/core/page-extractor.js';
import type { ChatCompletion, LanguageModel } from '../../src/core/recommender-agent.js';
import { ExtractionError, RecommendationError } from '../../src/types/errors.js';
import { ConfigValidationError } from '../../src/utils/config-schemas.js';
import type { FlightRecord } from '../../src/types/flights.js';

const BASE_URL = 'http://localhost:9999/search';

const TUNISAIR: FlightRecord = {
  departureTime: '6:05 AM',
  arrivalTime: '8:40 AM',
  airline: 'Tunisair',
  duration: '2 hr 35 min',
  stops: 'Nonstop',
  price: '€189',
  co2Emissions: '118 kg CO2e',
  emissionsVariation: '-12% emissions',
};

const AIR_FRANCE: FlightRecord = {
  departureTime: '7:55 PM',
  arrivalTime: '0:55 AM+1',
  airline: 'Air France',
  duration: '5 hr',
  stops: '1 stop',
  price: '€240',
  co2Emissions: '210 kg CO2e',
  emissionsVariation: '+8% emissions',
};

const ROUTE = { origin: 'TUN', destination: 'CDG', date: '2025-07-14' };

function body(response: McpResponse): unknown {
  return JSON.parse(response.content[0].text);
}

function answering(content: string): LanguageModel {
  return { complete: async (): Promise<ChatCompletion> => ({ content, toolCalls: [] }) };
}

describe('handleToolCall', () => {
  let testDir: string;
  let extractor: Extractor;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'flight-handlers-test-'));
    extractor = { extract: vi.fn(async () => [AIR_FRANCE, TUNISAIR]) };
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  function advisor(model: LanguageModel = answering('Fly Tunisair.')) {
    return new FlightAdvisor({ store: new RecordStore(extractor, { dataDir: testDir }), model, baseUrl: BASE_URL });
  }

  describe('build_search_url', () => {
    it('returns the route and its results URL', async () => {
      const response = await handleToolCall(advisor(), 'build_search_url', {
        origin: ' tun ',
        destination: 'cdg',
        date: '2025-07-14',
      });

      expect(response.isError).toBeUndefined();
      expect(body(response)).toEqual({
        schemaVersion: '1.0',
        route: { origin: 'tun', destination: 'cdg', date: '2025-07-14' },
        searchUrl: buildSearchUrl('TUN', 'CDG', '2025-07-14', BASE_URL),
      });
    });

    it('lists every missing argument', async () => {
      const response = await handleToolCall(advisor(), 'build_search_url', { origin: 'TUN' });

      expect(response.isError).toBe(true);
      expect(body(response)).toEqual({
        schemaVersion: '1.0',
        error: {
          code: 'INVALID_ARGUMENTS',
          message: 'Invalid arguments for build_search_url:\n  - destination: Required\n  - date: Required',
        },
      });
    });

    it('treats absent arguments as an empty object', async () => {
      const response = await handleToolCall(advisor(), 'build_search_url', undefined);

      expect(body(response)).toMatchObject({
        error: {
          code: 'INVALID_ARGUMENTS',
          message: 'Invalid arguments for build_search_url:\n  - origin: Required\n  - destination: Required\n  - date: Required',
        },
      });
    });
  });

  describe('find_best_flight', () => {
    it('returns the flight without a recommendation when asked not to recommend', async () => {
      const response = await handleToolCall(advisor(), 'find_best_flight', { ...ROUTE, recommend: false });

      expect(body(response)).toEqual({
        schemaVersion: '1.0',
        route: ROUTE,
        searchUrl: buildSearchUrl('TUN', 'CDG', '2025-07-14', BASE_URL),
        source: 'extraction',
        criteria: { timeBucket: 'any', stopover: 'any' },
        flight: { ...TUNISAIR, priceValue: 189, stopCount: 0 },
        matchCount: 2,
        totalRows: 2,
        droppedRows: 0,
      });
    });

    it('includes the recommendation by default', async () => {
      const response = await handleToolCall(advisor(answering('Air France is the only one.')), 'find_best_flight', {
        ...ROUTE,
        stopover: 'required',
        maxPrice: 300,
      });

      expect(body(response)).toMatchObject({
        criteria: { timeBucket: 'any', stopover: 'required', maxPrice: 300 },
        flight: { airline: 'Air France', priceValue: 240, stopCount: 1 },
        matchCount: 1,
        recommendation: 'Air France is the only one.',
      });
    });

    it('reports NO_MATCH when the filters remove every flight', async () => {
      const response = await handleToolCall(advisor(), 'find_best_flight', { ...ROUTE, maxPrice: 10 });

      expect(response.isError).toBe(true);
      expect(body(response)).toEqual({
        schemaVersion: '1.0',
        error: { code: 'NO_MATCH', message: 'No flight matches the requested criteria (2 candidate(s) considered)' },
      });
    });

    it('reports EXTRACTION_FAILED when the page could not be read', async () => {
      extractor = {
        extract: vi.fn(async (): Promise<FlightRecord[]> => {
          throw new ExtractionError('http://localhost:9999/search?tfs=x', 'Timeout 30000ms exceeded');
        }),
      };

      const response = await handleToolCall(advisor(), 'find_best_flight', ROUTE);

      expect(body(response)).toMatchObject({ error: { code: 'EXTRACTION_FAILED' } });
    });

    it('reports RECOMMENDATION_FAILED when the model fails', async () => {
      const failing: LanguageModel = {
        complete: async (): Promise<ChatCompletion> => {
          throw new Error('connection refused');
        },
      };

      const response = await handleToolCall(advisor(failing), 'find_best_flight', ROUTE);

      expect(body(response)).toEqual({
        schemaVersion: '1.0',
        error: {
          code: 'RECOMMENDATION_FAILED',
          message: 'Could not produce a recommendation: connection refused',
        },
      });
    });

    it('rejects out-of-range filters', async () => {
      const response = await handleToolCall(advisor(), 'find_best_flight', { ...ROUTE, timeBucket: 'dawn' });

      expect(body(response)).toMatchObject({ error: { code: 'INVALID_ARGUMENTS' } });
      expect(extractor.extract).not.toHaveBeenCalled();
    });
  });

  describe('ask_flight_advisor', () => {
    it('returns the answer with the search details', async () => {
      const response = await handleToolCall(advisor(answering('Yes, Tunisair at 6:05.')), 'ask_flight_advisor', {
        ...ROUTE,
        question: 'Any morning flight?',
      });

      expect(body(response)).toEqual({
        schemaVersion: '1.0',
        route: ROUTE,
        searchUrl: buildSearchUrl('TUN', 'CDG', '2025-07-14', BASE_URL),
        source: 'extraction',
        totalRows: 2,
        question: 'Any morning flight?',
        answer: 'Yes, Tunisair at 6:05.',
      });
    });

    it('requires a question', async () => {
      const response = await handleToolCall(advisor(), 'ask_flight_advisor', { ...ROUTE, question: '   ' });

      expect(body(response)).toMatchObject({ error: { code: 'INVALID_ARGUMENTS' } });
    });
  });

  it('rejects unknown tools with the list of known ones', async () => {
    const response = await handleToolCall(advisor(), 'book_flight', ROUTE);

    expect(response.isError).toBe(true);
    expect(body(response)).toEqual({
      schemaVersion: '1.0',
      error: {
        code: 'INVALID_ARGUMENTS',
        message: 'Unknown tool: book_flight\nAvailable tools: find_best_flight, ask_flight_advisor, build_search_url',
      },
    });
  });
});

describe('response formatters', () => {
  it('versions JSON responses', () => {
    expect(jsonResponse({ a: 1 }, 0)).toEqual({
      content: [{ type: 'text', text: '{"schemaVersion":"1.0","a":1}' }],
    });
  });

  it('maps errors to codes', () => {
    expect(errorCodeOf(new RecommendationError('x'))).toBe('RECOMMENDATION_FAILED');
    expect(errorCodeOf(new ToolArgumentError('x'))).toBe('INVALID_ARGUMENTS');
    expect(errorCodeOf(new ConfigValidationError('browser', new z.ZodError([])))).toBe('CONFIG_INVALID');
    expect(errorCodeOf(new Error('x'))).toBe('INTERNAL_ERROR');
  });

  it('formats thrown non-errors', () => {
    expect(errorResponse('boom')).toEqual({
      content: [{ type: 'text', text: '{"schemaVersion":"1.0","error":{"code":"INTERNAL_ERROR","message":"boom"}}' }],
      isError: true,
    });
  });

  it('names every tool', () => {
    expect(TOOL_NAMES).toEqual(['find_best_flight', 'ask_flight_advisor', 'build_search_url']);
  });
});

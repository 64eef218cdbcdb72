/**
 * MCP Tool Schemas
 *
 * Tool definitions for the MCP server.
 * Separated from index.ts for maintainability.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { STOPOVER_PREFERENCES, TIME_BUCKETS } from '../types/flights.js';

const routeProperties = {
  origin: { type: 'string', description: 'Departure airport IATA code, e.g. "TUN"' },
  destination: { type: 'string', description: 'Arrival airport IATA code, e.g. "CDG"' },
  date: { type: 'string', description: 'Travel date, YYYY-MM-DD' },
};

export const findBestFlightSchema: Tool = {
  name: 'find_best_flight',
  description: `Find the cheapest flight for a route and date that passes the given filters, and explain the pick.

Results for a route and date are extracted once and then reused from the local store.

Filters (all optional):
- maxPrice: highest acceptable price
- timeBucket: morning (before 12:00), afternoon (12:00-18:00), evening (after 18:00), or any
- stopover: none (nonstop only), required (at least one stop), or any

Set recommend=false to skip the written recommendation and only return the flight.`,
  inputSchema: {
    type: 'object',
    properties: {
      ...routeProperties,
      maxPrice: { type: 'number', description: 'Highest acceptable price' },
      timeBucket: { type: 'string', enum: [...TIME_BUCKETS], description: 'Departure time of day (default: any)' },
      stopover: { type: 'string', enum: [...STOPOVER_PREFERENCES], description: 'Stopover preference (default: any)' },
      recommend: { type: 'boolean', description: 'Ask the model for a written recommendation (default: true)' },
    },
    required: ['origin', 'destination', 'date'],
  },
};

export const askFlightAdvisorSchema: Tool = {
  name: 'ask_flight_advisor',
  description: `Ask a free-text question about the flights for a route and date, e.g.
"Is there a direct flight in the morning under 200 euros?" or "vol sans escale le soir".

The advisor searches the extracted flights itself and answers in prose.`,
  inputSchema: {
    type: 'object',
    properties: {
      ...routeProperties,
      question: { type: 'string', description: 'The question, in English or French' },
    },
    required: ['origin', 'destination', 'date', 'question'],
  },
};

export const buildSearchUrlSchema: Tool = {
  name: 'build_search_url',
  description: 'Build the flight results URL for a route and date without opening a browser.',
  inputSchema: {
    type: 'object',
    properties: routeProperties,
    required: ['origin', 'destination', 'date'],
  },
};

export const TOOL_SCHEMAS: Tool[] = [findBestFlightSchema, askFlightAdvisorSchema, buildSearchUrlSchema];

export const TOOL_NAMES = TOOL_SCHEMAS.map((tool) => tool.name);

/**
 * Flight Tool Handlers
 *
 * Handlers for find_best_flight, ask_flight_advisor and build_search_url.
 * Arguments arrive as untyped JSON and are validated with zod before they
 * reach the advisor.
 */

import { z } from 'zod';
import type { FlightAdvisor } from '../../sdk.js';
import {
  jsonResponse,
  errorResponse,
  formatBestFlight,
  ToolArgumentError,
  type McpResponse,
} from '../response-formatters.js';
import { TOOL_NAMES } from '../tool-schemas.js';
import { formatConfigErrors } from '../../utils/config-schemas.js';
import { unknownToolError } from '../../utils/error-messages.js';
import { logger } from '../../utils/logger.js';

const routeArgsSchema = z.object({
  origin: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  date: z.string().trim().min(1),
});

export const findBestFlightArgsSchema = routeArgsSchema.extend({
  maxPrice: z.number().nonnegative().optional(),
  timeBucket: z.enum(['morning', 'afternoon', 'evening', 'any']).optional(),
  stopover: z.enum(['any', 'none', 'required']).optional(),
  recommend: z.boolean().default(true),
});

export const askFlightAdvisorArgsSchema = routeArgsSchema.extend({
  question: z.string().trim().min(1),
});

export type RouteArgs = z.infer<typeof routeArgsSchema>;
export type FindBestFlightArgs = z.infer<typeof findBestFlightArgsSchema>;
export type AskFlightAdvisorArgs = z.infer<typeof askFlightAdvisorArgsSchema>;

function parseArgs<T extends z.ZodTypeAny>(toolName: string, schema: T, args: unknown): z.infer<T> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw new ToolArgumentError(`Invalid arguments for ${toolName}:\n${formatConfigErrors(result.error)}`);
  }
  return result.data;
}

export async function handleFindBestFlight(advisor: FlightAdvisor, args: FindBestFlightArgs): Promise<McpResponse> {
  const search = {
    origin: args.origin,
    destination: args.destination,
    date: args.date,
    criteria: {
      maxPrice: args.maxPrice,
      timeBucket: args.timeBucket,
      stopover: args.stopover,
    },
  };
  const result = args.recommend ? await advisor.advise(search) : await advisor.findBestFlight(search);
  return jsonResponse(formatBestFlight(result));
}

export async function handleAskFlightAdvisor(advisor: FlightAdvisor, args: AskFlightAdvisorArgs): Promise<McpResponse> {
  const result = await advisor.ask(args);
  return jsonResponse({
    route: result.request,
    searchUrl: result.searchUrl,
    source: result.source,
    totalRows: result.totalRows,
    question: result.question,
    answer: result.answer,
  });
}

export function handleBuildSearchUrl(advisor: FlightAdvisor, args: RouteArgs): McpResponse {
  return jsonResponse({ route: args, searchUrl: advisor.getSearchUrl(args) });
}

/**
 * Validate arguments and dispatch to the tool's handler. Never throws:
 * failures come back as isError responses.
 */
export async function handleToolCall(advisor: FlightAdvisor, name: string, args: unknown): Promise<McpResponse> {
  const startTime = Date.now();
  try {
    let response: McpResponse;
    switch (name) {
      case 'find_best_flight':
        response = await handleFindBestFlight(advisor, parseArgs(name, findBestFlightArgsSchema, args));
        break;
      case 'ask_flight_advisor':
        response = await handleAskFlightAdvisor(advisor, parseArgs(name, askFlightAdvisorArgsSchema, args));
        break;
      case 'build_search_url':
        response = handleBuildSearchUrl(advisor, parseArgs(name, routeArgsSchema, args));
        break;
      default:
        throw new ToolArgumentError(unknownToolError(name, TOOL_NAMES));
    }
    logger.server.timed('Tool call completed', startTime, { tool: name });
    return response;
  } catch (error) {
    logger.server.error('Tool call failed', { tool: name, error });
    return errorResponse(error);
  }
}

/**
 * MCP Response Formatters
 *
 * Every tool answers with one text block holding JSON. Errors carry a code
 * clients can branch on and set isError.
 */

import { ConfigValidationError } from '../utils/config-schemas.js';
import { isFlightAdvisorError } from '../types/errors.js';
import type { AdviceResult, BestFlightResult } from '../sdk.js';

/**
 * MCP response content type
 * This matches the expected return type for MCP tool handlers
 */
export type McpResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const SCHEMA_VERSION = '1.0';

export type ToolErrorCode =
  | 'EXTRACTION_FAILED'
  | 'NO_MATCH'
  | 'RECOMMENDATION_FAILED'
  | 'INVALID_ARGUMENTS'
  | 'CONFIG_INVALID'
  | 'INTERNAL_ERROR';

/**
 * Bad tool input. The message lists every offending field.
 */
export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

/**
 * Versioned JSON response for MCP tools
 */
export function jsonResponse(data: object, indent: number = 2): McpResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify({ schemaVersion: SCHEMA_VERSION, ...data }, null, indent) }],
  };
}

export function errorCodeOf(error: unknown): ToolErrorCode {
  if (isFlightAdvisorError(error)) return error.code;
  if (error instanceof ToolArgumentError) return 'INVALID_ARGUMENTS';
  if (error instanceof ConfigValidationError) return 'CONFIG_INVALID';
  return 'INTERNAL_ERROR';
}

export function errorResponse(error: unknown): McpResponse {
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{
      type: 'text',
      text: JSON.stringify({ schemaVersion: SCHEMA_VERSION, error: { code: errorCodeOf(error), message } }),
    }],
    isError: true,
  };
}

/**
 * The flight fields clients care about, with parsed values beside the
 * rendered text
 */
export function formatBestFlight(result: BestFlightResult | AdviceResult): object {
  const { record } = result.flight;
  return {
    route: result.request,
    searchUrl: result.searchUrl,
    source: result.source,
    criteria: result.criteria,
    flight: {
      ...record,
      priceValue: result.flight.priceValue,
      stopCount: result.flight.stopCount,
    },
    matchCount: result.matchCount,
    totalRows: result.totalRows,
    droppedRows: result.droppedRows,
    ...('recommendation' in result ? { recommendation: result.recommendation } : {}),
  };
}

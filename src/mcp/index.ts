/**
 * MCP Module Exports
 *
 * Unified exports for all MCP-related functionality.
 */

// Shared advisor
export { getMcpAdvisor, resetMcpAdvisor } from './sdk-client.js';

// Response formatters
export {
  jsonResponse,
  errorResponse,
  errorCodeOf,
  formatBestFlight,
  ToolArgumentError,
  SCHEMA_VERSION,
  type McpResponse,
  type ToolErrorCode,
} from './response-formatters.js';

// Tool schemas
export {
  TOOL_SCHEMAS,
  TOOL_NAMES,
  findBestFlightSchema,
  askFlightAdvisorSchema,
  buildSearchUrlSchema,
} from './tool-schemas.js';

// Tool handlers
export * from './handlers/index.js';

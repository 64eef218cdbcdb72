/**
 * MCP Handler Exports
 */

export {
  handleToolCall,
  handleFindBestFlight,
  handleAskFlightAdvisor,
  handleBuildSearchUrl,
  findBestFlightArgsSchema,
  askFlightAdvisorArgsSchema,
  type RouteArgs,
  type FindBestFlightArgs,
  type AskFlightAdvisorArgs,
} from './flight-handlers.js';

#!/usr/bin/env node

/**
 * Flight Advisor MCP Server
 *
 * Exposes the flight advisor over the Model Context Protocol (stdio):
 * - find_best_flight: cheapest flight matching budget, time-of-day and stopover filters
 * - ask_flight_advisor: free-text questions answered from the extracted flights
 * - build_search_url: the results URL for a route and date
 *
 * Architecture: this file only wires the transport. Schemas, handlers and
 * response formatting live in ./mcp/.
 */

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { getMcpAdvisor, handleToolCall, TOOL_NAMES, TOOL_SCHEMAS } from './mcp/index.js';
import { parseLogConfig } from './utils/env-parser.js';
import { configureLogger, logger } from './utils/logger.js';

const SERVER_NAME = 'flight-advisor';
const SERVER_VERSION = '0.3.0';

async function main() {
  const logConfig = parseLogConfig();
  configureLogger({ level: logConfig.level, prettyPrint: logConfig.prettyPrint });

  // Fails fast on invalid configuration
  const advisor = getMcpAdvisor();

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // ============================================
  // Tool List Handler
  // ============================================
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: TOOL_SCHEMAS,
    };
  });

  // ============================================
  // Tool Call Handler
  // ============================================
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.server.debug('Tool call received', { tool: name });
    return handleToolCall(advisor, name, args);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.server.info('Flight Advisor MCP Server started', {
    version: SERVER_VERSION,
    tools: TOOL_NAMES,
  });

  process.on('SIGINT', () => {
    logger.server.info('Shutting down');
    process.exit(0);
  });
}

main().catch((error) => {
  logger.server.error('Fatal error', { error });
  process.exit(1);
});

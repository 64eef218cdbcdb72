/**
 * MCP SDK Client Wrapper
 *
 * Holds the one FlightAdvisor the MCP tool handlers share. Configuration is
 * read from the environment the first time a handler needs it.
 */

import { createFlightAdvisor, type CreateFlightAdvisorOptions, type FlightAdvisor } from '../sdk.js';

let instance: FlightAdvisor | null = null;

export function getMcpAdvisor(options: CreateFlightAdvisorOptions = {}): FlightAdvisor {
  if (!instance) {
    instance = createFlightAdvisor(options);
  }
  return instance;
}

/**
 * Drop the shared advisor (for testing)
 */
export function resetMcpAdvisor(): void {
  instance = null;
}

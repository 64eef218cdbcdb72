/**
 * Central Timeout Configuration
 *
 * Timeouts apply only to the browser steps of a search. There is no deadline
 * across the whole pipeline.
 */

export const TIMEOUTS = {
  /**
   * Navigation to the results page
   */
  PAGE_LOAD: 60000,

  /**
   * Wait for the first result row to render. Expiry is a hard failure,
   * never a retry.
   */
  SELECTOR_WAIT: 30000,
} as const;

export type TimeoutKey = keyof typeof TIMEOUTS;

/**
 * Get a timeout value with optional override
 */
export function getTimeout(key: TimeoutKey, override?: number): number {
  return override ?? TIMEOUTS[key];
}

export function resolveTimeouts(options: {
  navigationTimeoutMs?: number;
  selectorTimeoutMs?: number;
} = {}): {
  pageLoad: number;
  selectorWait: number;
} {
  return {
    pageLoad: getTimeout('PAGE_LOAD', options.navigationTimeoutMs),
    selectorWait: getTimeout('SELECTOR_WAIT', options.selectorTimeoutMs),
  };
}

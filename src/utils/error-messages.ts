/**
 * Error Messages with Actionable Suggestions
 *
 * User-facing messages that say what went wrong and what to do about it.
 */

export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Command to run (e.g., npm install) */
  command?: string;
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.command) {
    parts.push(`Run: ${options.command}`);
  }

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// DEPENDENCY ERRORS
// =============================================================================

export function playwrightNotInstalledError(): string {
  return buildErrorMessage({
    message: 'playwright-core could not be loaded.',
    command: 'npm install playwright-core',
  });
}

export function chromiumLaunchError(reason: string): string {
  return buildErrorMessage({
    message: `Chromium could not be launched: ${reason}`,
    suggestions: [
      'Install a browser build with: npx playwright-core install chromium',
      'Check PROXY_SERVER if a proxy is configured',
    ],
  });
}

export function missingApiKeyError(): string {
  return buildErrorMessage({
    message: 'No API key is configured for the recommendation model.',
    suggestions: [
      'Set RECOMMENDER_API_KEY (or TOGETHER_API_KEY) in the environment or .env file',
      'Use RECOMMENDER_BASE_URL to point at another OpenAI-compatible endpoint',
    ],
  });
}

// =============================================================================
// TOOL ERRORS
// =============================================================================

export function unknownToolError(toolName: string, availableTools: string[]): string {
  return buildErrorMessage({
    message: `Unknown tool: ${toolName}`,
    suggestions: [`Available tools: ${availableTools.join(', ')}`],
  });
}

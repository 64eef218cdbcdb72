/**
 * Error taxonomy for a flight search
 *
 * Every failure is terminal for the current search. Unparsable rows are not
 * errors: the filter drops them and reports how many it dropped.
 */

export type FlightAdvisorErrorCode =
  | 'EXTRACTION_FAILED'
  | 'NO_MATCH'
  | 'RECOMMENDATION_FAILED';

export class FlightAdvisorError extends Error {
  readonly code: FlightAdvisorErrorCode;

  constructor(code: FlightAdvisorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'FlightAdvisorError';
  }
}

/**
 * Navigation failed, the results selector never appeared, or no browser
 * could be launched. Callers report this as "no data available".
 */
export class ExtractionError extends FlightAdvisorError {
  readonly url: string;

  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', `No data available: extraction from ${url} failed (${reason})`, options);
    this.url = url;
    this.name = 'ExtractionError';
  }
}

/**
 * Filter criteria eliminated every row
 */
export class EmptyResultError extends FlightAdvisorError {
  readonly candidates: number;

  constructor(candidates: number) {
    super('NO_MATCH', `No flight matches the requested criteria (${candidates} candidate(s) considered)`);
    this.candidates = candidates;
    this.name = 'EmptyResultError';
  }
}

/**
 * The model call failed or returned nothing usable
 */
export class RecommendationError extends FlightAdvisorError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('RECOMMENDATION_FAILED', `Could not produce a recommendation: ${reason}`, options);
    this.name = 'RecommendationError';
  }
}

export function isFlightAdvisorError(error: unknown): error is FlightAdvisorError {
  return error instanceof FlightAdvisorError;
}

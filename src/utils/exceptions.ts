/**
 * Error codes let callers (CLI, persistence jobs) branch on the failure kind
 * without matching on message text.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Configuration errors
  FORMAT_NOT_FOUND: 'FORMAT_NOT_FOUND',
  COHORT_SIZE_MISMATCH: 'COHORT_SIZE_MISMATCH',

  // Season data errors
  MISSING_DATA: 'MISSING_DATA',
  UNRESOLVED_BRACKET_GAME: 'UNRESOLVED_BRACKET_GAME',
  STANDINGS_INVARIANT: 'STANDINGS_INVARIANT',

  // Remote score errors
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',
  EXTERNAL_SCORE_FETCH: 'EXTERNAL_SCORE_FETCH',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when configuration or input data fails validation
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, errorCode);
  }
}

/**
 * Thrown when no catalog entry covers the requested season
 */
export class FormatNotFoundError extends AppException {
  constructor(public readonly season: number) {
    super(`No bracket format is configured for season ${season}`, ErrorCode.FORMAT_NOT_FOUND);
  }
}

/**
 * Thrown when a season has no games in the week range the engine needs.
 * Season resolution aborts; there is nothing to seed from.
 */
export class MissingDataError extends AppException {
  constructor(
    public readonly season: number,
    public readonly fromWeek: number,
    public readonly toWeek: number,
    message?: string
  ) {
    super(
      message ?? `No games found for season ${season} in weeks ${fromWeek}-${toWeek}`,
      ErrorCode.MISSING_DATA
    );
  }
}

/**
 * Thrown when an expected bracket matchup has no matching real game in its week.
 */
export class UnresolvedBracketGameError extends AppException {
  constructor(
    public readonly season: number,
    public readonly week: number,
    public readonly roundName: string,
    public readonly expectedTeamIds: readonly string[],
    detail?: string
  ) {
    super(
      `Season ${season} week ${week}: no ${roundName} game found for teams ` +
        `[${expectedTeamIds.join(', ')}]${detail ? ` (${detail})` : ''}`,
      ErrorCode.UNRESOLVED_BRACKET_GAME
    );
  }
}

/**
 * Thrown when cohort membership disagrees with the format's cohort sizes.
 * Always a configuration bug (format descriptor or override table).
 */
export class CohortSizeMismatchError extends AppException {
  constructor(
    public readonly cohort: string,
    public readonly expected: number,
    public readonly actual: number,
    detail?: string
  ) {
    super(
      `Cohort ${cohort} expects ${expected} teams but got ${actual}${detail ? `: ${detail}` : ''}`,
      ErrorCode.COHORT_SIZE_MISMATCH
    );
  }
}

/**
 * Thrown when a starter score for a synthesized game could not be fetched
 * after the client exhausted its retries.
 */
export class ExternalScoreFetchError extends AppException {
  public readonly originalError?: Error;

  constructor(
    public readonly season: number,
    public readonly cohort: string,
    public readonly teamId: string,
    public readonly week: number,
    originalError?: unknown
  ) {
    const cause = originalError instanceof Error ? originalError : undefined;
    super(
      `Could not fetch starter score for team ${teamId} (season ${season}, week ${week}, ` +
        `${cohort} cohort)${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.EXTERNAL_SCORE_FETCH
    );
    this.originalError = cause;
  }
}

/**
 * Thrown when assembled standings break the 1..N place invariant.
 * Indicates an engine bug rather than bad data.
 */
export class StandingsInvariantError extends AppException {
  constructor(public readonly season: number, message: string) {
    super(`Season ${season}: ${message}`, ErrorCode.STANDINGS_INVARIANT);
  }
}

/**
 * Thrown when an external API call fails.
 * Wraps the original error and provides context about the API and operation.
 */
export class ExternalApiException extends AppException {
  public readonly originalError?: Error;
  public readonly apiName: string;
  public readonly operation: string;
  public readonly statusCode: number;

  constructor(
    apiName: string,
    operation: string,
    message: string,
    statusCode: number = 502,
    originalError?: Error
  ) {
    super(`[${apiName}] ${operation}: ${message}`, ErrorCode.EXTERNAL_API_ERROR);
    this.apiName = apiName;
    this.operation = operation;
    this.originalError = originalError;
    this.statusCode = statusCode;
  }

  /**
   * Creates an ExternalApiException from a caught error.
   */
  static fromError(
    apiName: string,
    operation: string,
    error: unknown,
    statusCode: number = 502
  ): ExternalApiException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    const message = originalError.message || 'Unknown error';
    return new ExternalApiException(apiName, operation, message, statusCode, originalError);
  }

  /**
   * Creates an ExternalApiException for timeout errors.
   */
  static timeout(apiName: string, operation: string): ExternalApiException {
    return new ExternalApiException(
      apiName,
      operation,
      'Request timed out',
      504,
      new Error('Timeout')
    );
  }

  /**
   * Creates an ExternalApiException for responses that fail schema validation.
   */
  static invalidResponse(apiName: string, operation: string, detail: string): ExternalApiException {
    return new ExternalApiException(apiName, operation, `Invalid response: ${detail}`, 502);
  }
}

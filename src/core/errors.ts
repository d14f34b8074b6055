/**
 * Custom Error Classes for the travel planner
 *
 * Provides a consistent error handling pattern across the application.
 * All errors extend PlannerError for unified catching and logging.
 *
 * Tool failures are deliberately absent: adapters fold them into the
 * conversation as text and never throw past their own boundary.
 */

/**
 * Base error class for travel planner errors.
 * Includes error code and optional cause for error chaining.
 */
export class PlannerError extends Error {
  readonly code: string;
  readonly cause?: Error;

  constructor(message: string, code = 'PLANNER_ERROR', cause?: Error) {
    super(message);
    this.name = 'PlannerError';
    this.code = code;
    this.cause = cause;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get the full error chain message including cause
   */
  getFullMessage(): string {
    let msg = `[${this.code}] ${this.message}`;
    if (this.cause) {
      msg += `\n  Caused by: ${this.cause.message}`;
    }
    return msg;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 */
export class ConfigurationError extends PlannerError {
  readonly configKey?: string;

  constructor(message: string, configKey?: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

/**
 * Error thrown when a request payload fails validation.
 */
export class ValidationError extends PlannerError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Error thrown when the agent cannot turn model output into an answer.
 */
export class AgentError extends PlannerError {
  constructor(message: string, code = 'AGENT_ERROR', cause?: Error) {
    super(message, code, cause);
    this.name = 'AgentError';
  }
}

/**
 * Error thrown when the model keeps requesting tools past the iteration bound
 * without ever producing text.
 */
export class IterationLimitError extends AgentError {
  readonly maxIterations: number;

  constructor(maxIterations: number) {
    super(`Agent stopped after ${maxIterations} model calls without a final answer`, 'AGENT_ITERATION_LIMIT');
    this.name = 'IterationLimitError';
    this.maxIterations = maxIterations;
  }
}

/**
 * Error thrown when talking to the model provider fails
 * (network, authentication, rate limiting, HTTP errors).
 */
export class TransportError extends PlannerError {
  readonly provider?: string;
  readonly status?: number;

  constructor(message: string, provider?: string, status?: number, cause?: Error) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'TransportError';
    this.provider = provider;
    this.status = status;
  }
}

/**
 * Error used as the abort reason when a query runs past its deadline.
 */
export class QueryTimeoutError extends PlannerError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Query exceeded ${timeoutMs}ms`, 'QUERY_TIMEOUT');
    this.name = 'QueryTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error used as the abort reason when the client goes away mid-query.
 */
export class QueryCancelledError extends PlannerError {
  constructor(message = 'Query cancelled by client') {
    super(message, 'QUERY_CANCELLED');
    this.name = 'QueryCancelledError';
  }
}

const PUBLIC_MESSAGES: Record<string, string> = {
  CONFIGURATION_ERROR: 'The travel planner is not configured correctly.',
  AGENT_ERROR: 'The travel agent could not complete this request.',
  AGENT_ITERATION_LIMIT:
    'The travel agent was unable to complete this request within the allowed number of steps.',
  TRANSPORT_ERROR: 'The language model service is unavailable. Please try again later.',
  QUERY_TIMEOUT: 'The request timed out before a plan could be generated.',
  QUERY_CANCELLED: 'The request was cancelled.',
};

const UNEXPECTED_MESSAGE = 'An unexpected error occurred while planning your trip.';

/**
 * Type guard to check if an error is a PlannerError
 */
export function isPlannerError(error: unknown): error is PlannerError {
  return error instanceof PlannerError;
}

/**
 * Human-readable message that is safe to send to clients.
 * Validation messages describe the caller's own input, so they pass through.
 */
export function toPublicMessage(error: unknown): string {
  if (error instanceof ValidationError) {
    return error.message;
  }
  if (isPlannerError(error)) {
    return PUBLIC_MESSAGES[error.code] ?? UNEXPECTED_MESSAGE;
  }
  return UNEXPECTED_MESSAGE;
}

/**
 * Wrap an unknown error in a PlannerError if it isn't one already
 */
export function wrapError(
  error: unknown,
  defaultMessage: string,
  defaultCode = 'PLANNER_ERROR'
): PlannerError {
  if (error instanceof PlannerError) {
    return error;
  }

  if (error instanceof Error) {
    return new PlannerError(`${defaultMessage}: ${error.message}`, defaultCode, error);
  }

  return new PlannerError(`${defaultMessage}: ${String(error)}`, defaultCode);
}

/**
 * Centralized Default Configuration Values
 *
 * All magic numbers and default values are defined here for consistency.
 * Deployments override them through planner.config.json or environment variables.
 */

export const DEFAULTS = {
  /**
   * Maximum model calls per query before the agent gives up.
   * Each call after the first follows one round of tool execution.
   */
  MAX_ITERATIONS: 10,

  /**
   * Sampling temperature sent with every model call.
   */
  TEMPERATURE: 0.2,

  /**
   * Response length cap sent with every model call.
   */
  MAX_TOKENS: 4096,

  /**
   * Longest accepted question, in characters.
   */
  MAX_QUESTION_LENGTH: 2000,

  /**
   * Deadline for a whole query (all model and tool calls).
   */
  QUERY_TIMEOUT_MS: 120_000,

  /**
   * Deadline for a single tool adapter HTTP call.
   */
  TOOL_HTTP_TIMEOUT_MS: 15_000,

  /**
   * Places returned by the place search tool.
   */
  PLACE_RESULT_LIMIT: 5,

  /**
   * Results requested from the web search tool when the model does not say.
   */
  WEB_SEARCH_RESULTS: 5,

  SERVER_HOST: '0.0.0.0',
  SERVER_PORT: 8000,
  FRONTEND_URL: 'http://localhost:8080',
} as const;

/**
 * Type for the defaults object
 */
export type Defaults = typeof DEFAULTS;

export const SERVICE_INFO = {
  name: 'AI Travel Planner API',
  service: 'AI Travel Planner',
  version: '1.0.0',
  description: 'AI-powered travel planning service',
} as const;

/**
 * Application Configuration
 *
 * Resolves the typed AppConfig from, in increasing precedence:
 *   1. DEFAULTS
 *   2. an optional JSON file (PLANNER_CONFIG_PATH, default ./planner.config.json)
 *   3. environment variables
 *
 * Secrets are never read from the file; providers and tools read their keys
 * from the environment when they are constructed.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { createLogger, isLogLevel, LOG_LEVELS, type LogLevel } from '../core/logger.js';
import { DEFAULTS } from './defaults.js';

const log = createLogger('config');

export type Env = Record<string, string | undefined>;

export interface ModelConfig {
  /** LLM provider name; validated by the model loader */
  provider: string;
  /** Model to use (provider-specific); provider default when unset */
  modelName?: string;
  /** Sampling temperature, 0.0-1.0 */
  temperature: number;
  /** Maximum tokens to generate per model call */
  maxTokens: number;
  /** Base URL for Ollama or custom endpoints */
  baseUrl?: string;
}

export interface AgentSettings {
  maxIterations: number;
  /** Custom system prompt; the built-in travel prompt when unset */
  systemPrompt?: string;
}

export interface ServerConfig {
  host: string;
  port: number;
  corsOrigins: string[];
  frontendUrl: string;
}

export interface QueryConfig {
  maxQuestionLength: number;
  timeoutMs: number;
}

export interface ToolsConfig {
  httpTimeoutMs: number;
  placeResultLimit: number;
  webSearchResults: number;
}

export interface AppConfig {
  model: ModelConfig;
  agent: AgentSettings;
  server: ServerConfig;
  query: QueryConfig;
  tools: ToolsConfig;
  logLevel: LogLevel;
}

const DEFAULT_CONFIG: AppConfig = {
  model: {
    provider: 'groq',
    modelName: undefined,
    temperature: DEFAULTS.TEMPERATURE,
    maxTokens: DEFAULTS.MAX_TOKENS,
    baseUrl: undefined,
  },
  agent: {
    maxIterations: DEFAULTS.MAX_ITERATIONS,
    systemPrompt: undefined,
  },
  server: {
    host: DEFAULTS.SERVER_HOST,
    port: DEFAULTS.SERVER_PORT,
    corsOrigins: ['*'],
    frontendUrl: DEFAULTS.FRONTEND_URL,
  },
  query: {
    maxQuestionLength: DEFAULTS.MAX_QUESTION_LENGTH,
    timeoutMs: DEFAULTS.QUERY_TIMEOUT_MS,
  },
  tools: {
    httpTimeoutMs: DEFAULTS.TOOL_HTTP_TIMEOUT_MS,
    placeResultLimit: DEFAULTS.PLACE_RESULT_LIMIT,
    webSearchResults: DEFAULTS.WEB_SEARCH_RESULTS,
  },
  logLevel: 'info',
};

const fileSchema = z
  .object({
    model: z
      .object({
        provider: z.string(),
        modelName: z.string(),
        temperature: z.number(),
        maxTokens: z.number(),
        baseUrl: z.string(),
      })
      .partial(),
    agent: z
      .object({
        maxIterations: z.number(),
        systemPrompt: z.string(),
      })
      .partial(),
    server: z
      .object({
        host: z.string(),
        port: z.number(),
        corsOrigins: z.array(z.string()),
        frontendUrl: z.string(),
      })
      .partial(),
    query: z
      .object({
        maxQuestionLength: z.number(),
        timeoutMs: z.number(),
      })
      .partial(),
    tools: z
      .object({
        httpTimeoutMs: z.number(),
        placeResultLimit: z.number(),
        webSearchResults: z.number(),
      })
      .partial(),
    logLevel: z.string(),
  })
  .partial();

type FileConfig = z.infer<typeof fileSchema>;

/**
 * Get the path to the optional config file
 */
export function getConfigPath(env: Env = process.env): string {
  return path.resolve(env.PLANNER_CONFIG_PATH || 'planner.config.json');
}

/**
 * Read the config file. A missing file yields {}; a broken one is logged and ignored.
 */
function readConfigFile(configPath: string): FileConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const parsed = fileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      log.warn({ configPath, issues: parsed.error.issues }, 'Ignoring invalid config file');
      return {};
    }
    return parsed.data;
  } catch (err) {
    log.warn({ err, configPath }, 'Could not parse config file, using defaults');
    return {};
  }
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, key: string): number | undefined {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Invalid number value for ${key}: ${raw}`, key);
  }
  return value;
}

function readList(env: Env, key: string): string[] | undefined {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function requireLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new ConfigurationError(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${value}`, 'logLevel');
  }
  return value;
}

function requirePositiveInteger(value: number, key: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${key} must be a positive integer, got ${value}`, key);
  }
  return value;
}

/**
 * Load the application configuration
 *
 * @throws ConfigurationError when a value is malformed or out of range
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const file = readConfigFile(getConfigPath(env));

  const model: ModelConfig = {
    ...DEFAULT_CONFIG.model,
    ...file.model,
  };
  model.provider = readString(env, 'LLM_PROVIDER') ?? model.provider;
  model.modelName = readString(env, 'LLM_MODEL') ?? model.modelName;
  model.temperature = readNumber(env, 'LLM_TEMPERATURE') ?? model.temperature;
  model.maxTokens = readNumber(env, 'LLM_MAX_TOKENS') ?? model.maxTokens;
  model.baseUrl = readString(env, 'LLM_BASE_URL') ?? model.baseUrl;

  if (model.temperature < 0 || model.temperature > 1) {
    throw new ConfigurationError(
      `temperature must be between 0.0 and 1.0, got ${model.temperature}`,
      'temperature'
    );
  }
  requirePositiveInteger(model.maxTokens, 'maxTokens');

  const agent: AgentSettings = {
    ...DEFAULT_CONFIG.agent,
    ...file.agent,
  };
  agent.maxIterations = requirePositiveInteger(
    readNumber(env, 'AGENT_MAX_ITERATIONS') ?? agent.maxIterations,
    'maxIterations'
  );
  agent.systemPrompt = readString(env, 'AGENT_SYSTEM_PROMPT') ?? agent.systemPrompt;

  const server: ServerConfig = {
    ...DEFAULT_CONFIG.server,
    ...file.server,
  };
  server.host = readString(env, 'HOST') ?? server.host;
  server.port = readNumber(env, 'PORT') ?? server.port;
  server.corsOrigins = readList(env, 'CORS_ORIGINS') ?? server.corsOrigins;
  server.frontendUrl = readString(env, 'FRONTEND_URL') ?? server.frontendUrl;

  if (!Number.isInteger(server.port) || server.port < 0 || server.port > 65535) {
    throw new ConfigurationError(`port must be between 0 and 65535, got ${server.port}`, 'port');
  }

  const query: QueryConfig = {
    ...DEFAULT_CONFIG.query,
    ...file.query,
  };
  query.maxQuestionLength = requirePositiveInteger(
    readNumber(env, 'MAX_QUESTION_LENGTH') ?? query.maxQuestionLength,
    'maxQuestionLength'
  );
  query.timeoutMs = requirePositiveInteger(
    readNumber(env, 'QUERY_TIMEOUT_MS') ?? query.timeoutMs,
    'timeoutMs'
  );

  const tools: ToolsConfig = {
    ...DEFAULT_CONFIG.tools,
    ...file.tools,
  };
  tools.httpTimeoutMs = requirePositiveInteger(
    readNumber(env, 'TOOL_HTTP_TIMEOUT_MS') ?? tools.httpTimeoutMs,
    'httpTimeoutMs'
  );
  requirePositiveInteger(tools.placeResultLimit, 'placeResultLimit');
  requirePositiveInteger(tools.webSearchResults, 'webSearchResults');

  return {
    model,
    agent,
    server,
    query,
    tools,
    logLevel: requireLogLevel(readString(env, 'LOG_LEVEL') ?? file.logLevel ?? DEFAULT_CONFIG.logLevel),
  };
}

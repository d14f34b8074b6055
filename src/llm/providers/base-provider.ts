/**
 * Base LLM Provider
 *
 * Abstract base class with common functionality for all LLM providers.
 */

import { AgentError, PlannerError, TransportError } from '../../core/errors.js';
import type {
  LlmProvider,
  LlmProviderType,
  LlmMessage,
  LlmCompletionOptions,
  LlmCompletionResult,
} from '../types.js';

/**
 * Configuration passed to provider constructors
 */
export interface ProviderConfig {
  /** Model to use */
  model?: string;
  /** API key for cloud providers */
  apiKey?: string;
  /** Base URL for custom endpoints */
  baseUrl?: string;
  /** Default sampling temperature for every call */
  temperature?: number;
  /** Default response length cap for every call */
  maxTokens?: number;
}

/**
 * Abstract base class for LLM providers
 */
export abstract class BaseProvider implements LlmProvider {
  abstract readonly providerType: LlmProviderType;

  protected model: string;
  protected apiKey?: string;
  protected baseUrl?: string;
  protected temperature?: number;
  protected maxTokens?: number;

  constructor(config: ProviderConfig, defaultModel: string) {
    this.model = config.model || defaultModel;
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
  }

  /**
   * Get the current model
   */
  getModel(): string {
    return this.model;
  }

  abstract chat(messages: LlmMessage[], options?: LlmCompletionOptions): Promise<LlmCompletionResult>;

  /**
   * Helper: Per-call options fall back to the configured defaults
   */
  protected resolveOptions(options: LlmCompletionOptions): {
    temperature?: number;
    maxTokens?: number;
  } {
    return {
      temperature: options.temperature ?? this.temperature,
      maxTokens: options.maxTokens ?? this.maxTokens,
    };
  }

  /**
   * Helper: Run a provider SDK call, translating its failures.
   *
   * An abort surfaces as the signal's reason; planner errors pass through;
   * anything else becomes a TransportError.
   */
  protected async request<T>(call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    try {
      return await call();
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      if (error instanceof PlannerError) {
        throw error;
      }
      const cause = error instanceof Error ? error : undefined;
      const message = cause ? cause.message : String(error);
      throw new TransportError(
        `${this.providerType} request failed: ${message}`,
        this.providerType,
        getStatus(error),
        cause
      );
    }
  }

  /**
   * Helper: Parse a JSON-encoded tool argument string into an object
   *
   * @throws AgentError when the model produced something other than a JSON object
   */
  protected parseToolArguments(raw: string | undefined, toolName: string): Record<string, unknown> {
    if (!raw || raw.trim() === '') {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new AgentError(
        `Model produced malformed arguments for tool "${toolName}"`,
        'AGENT_ERROR',
        error instanceof Error ? error : undefined
      );
    }

    if (!isRecord(parsed)) {
      throw new AgentError(`Model produced non-object arguments for tool "${toolName}"`);
    }
    return parsed;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getStatus(error: unknown): number | undefined {
  if (isRecord(error) && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Race a promise against an abort signal for SDKs that take no signal
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * LLM Provider Types
 *
 * Shared interfaces for the LLM provider abstraction layer.
 * Supports Groq, OpenAI, Claude (Anthropic), Gemini (Google) and Ollama (local).
 */

/**
 * Supported LLM provider types
 */
export const LLM_PROVIDER_TYPES = ['groq', 'openai', 'claude', 'gemini', 'ollama'] as const;

export type LlmProviderType = (typeof LLM_PROVIDER_TYPES)[number];

export function isLlmProviderType(value: string): value is LlmProviderType {
  return LLM_PROVIDER_TYPES.some((type) => type === value);
}

/**
 * Message format for chat completions
 */
export interface LlmMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  /** Tool name (for tool messages) */
  name?: string;
  /** Tool call ID (for tool result messages) */
  toolCallId?: string;
  /** Tool calls requested by assistant */
  toolCalls?: LlmToolCall[];
}

/**
 * Tool call from the model
 */
export interface LlmToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Tool definition for the LLM
 */
export interface LlmToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, LlmToolProperty>;
    required?: string[];
  };
}

/**
 * Tool parameter property definition (a JSON Schema subset)
 */
export interface LlmToolProperty {
  type: string;
  description?: string;
  items?: LlmToolProperty;
  enum?: string[];
  properties?: Record<string, LlmToolProperty>;
  required?: string[];
}

export type LlmFinishReason = 'stop' | 'tool_calls' | 'length' | 'error';

/**
 * Options for LLM completion requests
 */
export interface LlmCompletionOptions {
  /** Sampling temperature */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Available tools for function calling */
  tools?: LlmToolDefinition[];
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * Result from a chat completion
 */
export interface LlmCompletionResult {
  /** Generated text content */
  content: string;
  /** Tool calls requested by the model */
  toolCalls?: LlmToolCall[];
  /** Reason the model stopped generating */
  finishReason: LlmFinishReason;
  /** Token usage statistics */
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * LLM Provider interface
 *
 * All providers must implement this interface. Implementations make no
 * network call until chat() is invoked.
 */
export interface LlmProvider {
  /** Provider type identifier */
  readonly providerType: LlmProviderType;

  /** Model used for every call */
  getModel(): string;

  /**
   * Chat completion with message history
   *
   * @throws TransportError when the provider cannot be reached or rejects the call
   * @throws AgentError when the reply cannot be parsed into text or tool calls
   */
  chat(messages: LlmMessage[], options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

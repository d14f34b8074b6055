/**
 * LLM Module
 *
 * Entry point for the LLM provider abstraction layer.
 */

// Types
export {
  LLM_PROVIDER_TYPES,
  isLlmProviderType,
  type LlmProviderType,
  type LlmMessage,
  type LlmToolCall,
  type LlmToolDefinition,
  type LlmToolProperty,
  type LlmFinishReason,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  type LlmProvider,
} from './types.js';

// Factory
export { loadModel, getDefaultModel, getApiKeyEnvVar, requiresApiKey } from './provider-factory.js';

// Providers
export { BaseProvider, type ProviderConfig } from './providers/base-provider.js';
export { GroqProvider } from './providers/groq-provider.js';
export { OpenAIProvider } from './providers/openai-provider.js';
export { ClaudeProvider } from './providers/claude-provider.js';
export { GeminiProvider } from './providers/gemini-provider.js';
export { OllamaProvider } from './providers/ollama-provider.js';

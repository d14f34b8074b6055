/**
 * LLM Provider Factory (model loader)
 *
 * Builds one ready-to-call provider from the model configuration.
 * Handles API key resolution from environment variables. No network call
 * is made here; a bad key only shows up on the first chat() call.
 */

import { ConfigurationError } from '../core/errors.js';
import type { Env, ModelConfig } from '../config/app-config.js';
import { isLlmProviderType, LLM_PROVIDER_TYPES, type LlmProvider, type LlmProviderType } from './types.js';
import type { ProviderConfig } from './providers/base-provider.js';
import { GroqProvider } from './providers/groq-provider.js';
import { OpenAIProvider } from './providers/openai-provider.js';
import { ClaudeProvider } from './providers/claude-provider.js';
import { GeminiProvider } from './providers/gemini-provider.js';
import { OllamaProvider } from './providers/ollama-provider.js';

/**
 * Default models for each provider
 */
const DEFAULT_MODELS: Record<LlmProviderType, string> = {
  groq: 'llama-3.3-70b-versatile',
  openai: 'gpt-4o',
  claude: 'claude-sonnet-4-20250514',
  gemini: 'gemini-2.0-flash',
  ollama: 'llama3.1:8b',
};

/**
 * Environment variable holding each cloud provider's API key
 */
const API_KEY_ENV_VARS: Record<LlmProviderType, string | undefined> = {
  groq: 'GROQ_API_KEY',
  openai: 'OPENAI_API_KEY',
  claude: 'ANTHROPIC_API_KEY',
  gemini: 'GOOGLE_API_KEY',
  ollama: undefined,
};

/**
 * Get the default model for a provider
 */
export function getDefaultModel(provider: LlmProviderType): string {
  return DEFAULT_MODELS[provider];
}

/**
 * Check if a provider requires an API key
 */
export function requiresApiKey(provider: LlmProviderType): boolean {
  return API_KEY_ENV_VARS[provider] !== undefined;
}

/**
 * Name of the environment variable holding the provider's key
 */
export function getApiKeyEnvVar(provider: LlmProviderType): string | undefined {
  return API_KEY_ENV_VARS[provider];
}

/**
 * Create an LLM provider instance
 *
 * @throws ConfigurationError if the provider is unknown or its API key is missing
 */
export function loadModel(config: ModelConfig, env: Env = process.env): LlmProvider {
  const provider = config.provider.trim().toLowerCase();
  if (!isLlmProviderType(provider)) {
    throw new ConfigurationError(
      `Unknown LLM provider "${config.provider}". Expected one of: ${LLM_PROVIDER_TYPES.join(', ')}`,
      'provider'
    );
  }

  const providerConfig: ProviderConfig = {
    model: config.modelName || DEFAULT_MODELS[provider],
    baseUrl: config.baseUrl,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  };

  const keyVar = API_KEY_ENV_VARS[provider];
  if (keyVar) {
    const apiKey = env[keyVar]?.trim();
    if (!apiKey) {
      throw new ConfigurationError(`${keyVar} is not set; it is required for the ${provider} provider`, keyVar);
    }
    providerConfig.apiKey = apiKey;
  }

  switch (provider) {
    case 'groq':
      return new GroqProvider(providerConfig);
    case 'openai':
      return new OpenAIProvider(providerConfig);
    case 'claude':
      return new ClaudeProvider(providerConfig);
    case 'gemini':
      return new GeminiProvider(providerConfig);
    case 'ollama':
      return new OllamaProvider(providerConfig);
  }
}

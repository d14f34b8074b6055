/**
 * Groq Provider
 *
 * Groq serves an OpenAI-compatible chat completions API, so this reuses
 * OpenAIProvider against Groq's endpoint.
 */

import { OpenAIProvider } from './openai-provider.js';
import type { ProviderConfig } from './base-provider.js';
import type { LlmProviderType } from '../types.js';

const DEFAULT_MODEL = 'llama-3.3-70b-versatile';
export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export class GroqProvider extends OpenAIProvider {
  readonly providerType: LlmProviderType = 'groq';

  constructor(config: ProviderConfig = {}) {
    super({ ...config, baseUrl: config.baseUrl || GROQ_BASE_URL }, DEFAULT_MODEL);
  }
}

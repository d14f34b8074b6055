/**
 * Claude Provider
 *
 * LLM provider implementation for Anthropic's Claude API.
 */

import Anthropic from '@anthropic-ai/sdk';
import { AgentError } from '../../core/errors.js';
import { BaseProvider, isRecord, type ProviderConfig } from './base-provider.js';
import type {
  LlmProviderType,
  LlmMessage,
  LlmCompletionOptions,
  LlmCompletionResult,
  LlmFinishReason,
  LlmToolDefinition,
  LlmToolCall,
} from '../types.js';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 4096;

export class ClaudeProvider extends BaseProvider {
  readonly providerType: LlmProviderType = 'claude';
  private client: Anthropic;

  constructor(config: ProviderConfig = {}) {
    super(config, DEFAULT_MODEL);
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  async chat(messages: LlmMessage[], options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const { temperature, maxTokens } = this.resolveOptions(options);
    const { systemPrompt, anthropicMessages } = this.convertMessages(messages);
    const tools = options.tools?.length ? this.convertTools(options.tools) : undefined;

    const response = await this.request(
      () =>
        this.client.messages.create(
          {
            model: this.model,
            // Anthropic requires max_tokens
            max_tokens: maxTokens || DEFAULT_MAX_TOKENS,
            system: systemPrompt,
            messages: anthropicMessages,
            tools,
            temperature,
          },
          { signal: options.signal }
        ),
      options.signal
    );

    let textContent = '';
    const toolCalls: LlmToolCall[] = [];

    for (const block of response.content) {
      if (block.type === 'text') {
        textContent += block.text;
      } else if (block.type === 'tool_use') {
        if (!isRecord(block.input)) {
          throw new AgentError(`Model produced non-object arguments for tool "${block.name}"`);
        }
        toolCalls.push({
          id: block.id,
          name: block.name,
          arguments: block.input,
        });
      }
    }

    return {
      content: textContent,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      finishReason: this.mapStopReason(response.stop_reason),
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  }

  /**
   * Convert LlmMessage[] to Anthropic format
   * Extracts system prompt separately as Anthropic requires it, and folds
   * consecutive tool results into a single user turn.
   */
  private convertMessages(messages: LlmMessage[]): {
    systemPrompt?: string;
    anthropicMessages: Anthropic.MessageParam[];
  } {
    let systemPrompt: string | undefined;
    const anthropicMessages: Anthropic.MessageParam[] = [];
    let pendingResults: Anthropic.ToolResultBlockParam[] = [];

    const flushResults = () => {
      if (pendingResults.length > 0) {
        anthropicMessages.push({ role: 'user', content: pendingResults });
        pendingResults = [];
      }
    };

    for (const msg of messages) {
      if (msg.role === 'tool') {
        pendingResults.push({
          type: 'tool_result',
          tool_use_id: msg.toolCallId || '',
          content: msg.content,
        });
        continue;
      }

      flushResults();

      if (msg.role === 'system') {
        systemPrompt = msg.content;
      } else if (msg.role === 'user') {
        anthropicMessages.push({ role: 'user', content: msg.content });
      } else {
        const content: Anthropic.ContentBlockParam[] = [];
        if (msg.content) {
          content.push({ type: 'text', text: msg.content });
        }
        for (const tc of msg.toolCalls ?? []) {
          content.push({
            type: 'tool_use',
            id: tc.id,
            name: tc.name,
            input: tc.arguments,
          });
        }
        anthropicMessages.push({ role: 'assistant', content });
      }
    }

    flushResults();
    return { systemPrompt, anthropicMessages };
  }

  /**
   * Convert LlmToolDefinition[] to Anthropic format
   */
  private convertTools(tools: LlmToolDefinition[]): Anthropic.Tool[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: {
        type: 'object' as const,
        properties: tool.parameters.properties,
        required: tool.parameters.required,
      },
    }));
  }

  /**
   * Map Anthropic stop reason to our format
   */
  private mapStopReason(reason: string | null | undefined): LlmFinishReason {
    switch (reason) {
      case 'tool_use':
        return 'tool_calls';
      case 'max_tokens':
        return 'length';
      default:
        return 'stop';
    }
  }
}

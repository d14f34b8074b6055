/**
 * OpenAI Provider
 *
 * LLM provider implementation for the OpenAI chat completions API.
 * Also serves OpenAI-compatible endpoints (see GroqProvider).
 */

import OpenAI from 'openai';
import { BaseProvider, type ProviderConfig } from './base-provider.js';
import type {
  LlmProviderType,
  LlmMessage,
  LlmCompletionOptions,
  LlmCompletionResult,
  LlmFinishReason,
  LlmToolDefinition,
  LlmToolCall,
} from '../types.js';

const DEFAULT_MODEL = 'gpt-4o';

/**
 * OpenAI message format
 */
type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;

/**
 * OpenAI tool format
 */
type OpenAITool = OpenAI.Chat.ChatCompletionTool;

export class OpenAIProvider extends BaseProvider {
  readonly providerType: LlmProviderType = 'openai';
  private client: OpenAI;

  constructor(config: ProviderConfig = {}, defaultModel = DEFAULT_MODEL) {
    super(config, defaultModel);
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      // Retries are the caller's decision, and the caller makes none
      maxRetries: 0,
    });
  }

  async chat(messages: LlmMessage[], options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const { temperature, maxTokens } = this.resolveOptions(options);
    const tools = options.tools?.length ? this.convertTools(options.tools) : undefined;

    const response = await this.request(
      () =>
        this.client.chat.completions.create(
          {
            model: this.model,
            messages: this.convertMessages(messages),
            tools,
            temperature,
            max_tokens: maxTokens,
          },
          { signal: options.signal }
        ),
      options.signal
    );

    const choice = response.choices[0];
    if (!choice) {
      return { content: '', finishReason: 'error' };
    }

    return {
      content: choice.message.content || '',
      toolCalls: this.extractToolCalls(choice.message.tool_calls),
      finishReason: this.mapFinishReason(choice.finish_reason),
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }

  /**
   * Convert LlmMessage[] to OpenAI format
   */
  private convertMessages(messages: LlmMessage[]): OpenAIMessage[] {
    const result: OpenAIMessage[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        result.push({ role: 'system', content: msg.content });
      } else if (msg.role === 'user') {
        result.push({ role: 'user', content: msg.content });
      } else if (msg.role === 'assistant') {
        const assistantMsg: OpenAI.Chat.ChatCompletionAssistantMessageParam = {
          role: 'assistant',
          content: msg.content,
        };
        if (msg.toolCalls?.length) {
          assistantMsg.tool_calls = msg.toolCalls.map((tc) => ({
            id: tc.id,
            type: 'function' as const,
            function: {
              name: tc.name,
              arguments: JSON.stringify(tc.arguments),
            },
          }));
        }
        result.push(assistantMsg);
      } else {
        result.push({
          role: 'tool',
          content: msg.content,
          tool_call_id: msg.toolCallId || '',
        });
      }
    }

    return result;
  }

  /**
   * Convert LlmToolDefinition[] to OpenAI format
   */
  private convertTools(tools: LlmToolDefinition[]): OpenAITool[] {
    return tools.map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          properties: tool.parameters.properties,
          required: tool.parameters.required,
        },
      },
    }));
  }

  /**
   * Extract tool calls from OpenAI response
   */
  private extractToolCalls(
    toolCalls?: OpenAI.Chat.ChatCompletionMessageToolCall[]
  ): LlmToolCall[] | undefined {
    if (!toolCalls || toolCalls.length === 0) return undefined;

    return toolCalls.map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: this.parseToolArguments(tc.function.arguments, tc.function.name),
    }));
  }

  /**
   * Map OpenAI finish reason to our format
   */
  private mapFinishReason(reason: string | null): LlmFinishReason {
    switch (reason) {
      case 'tool_calls':
      case 'function_call':
        return 'tool_calls';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'error';
      default:
        return 'stop';
    }
  }
}

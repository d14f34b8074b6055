/**
 * Ollama Provider
 *
 * LLM provider implementation for a local Ollama server. Needs no API key.
 */

import { Ollama, type Message, type Tool, type ToolCall } from 'ollama';
import { abortable, BaseProvider, type ProviderConfig } from './base-provider.js';
import type {
  LlmProviderType,
  LlmMessage,
  LlmCompletionOptions,
  LlmCompletionResult,
  LlmToolDefinition,
  LlmToolCall,
} from '../types.js';

const DEFAULT_MODEL = 'llama3.1:8b';
export const OLLAMA_DEFAULT_HOST = 'http://127.0.0.1:11434';

export class OllamaProvider extends BaseProvider {
  readonly providerType: LlmProviderType = 'ollama';
  private client: Ollama;

  constructor(config: ProviderConfig = {}) {
    super(config, DEFAULT_MODEL);
    this.client = new Ollama({
      host: config.baseUrl || OLLAMA_DEFAULT_HOST,
    });
  }

  async chat(messages: LlmMessage[], options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const { temperature, maxTokens } = this.resolveOptions(options);
    const tools = options.tools?.length ? this.convertTools(options.tools) : undefined;

    // The client takes no per-request signal
    const response = await this.request(
      () =>
        abortable(
          this.client.chat({
            model: this.model,
            messages: this.convertMessages(messages),
            tools,
            options: {
              temperature,
              num_predict: maxTokens,
            },
            stream: false,
          }),
          options.signal
        ),
      options.signal
    );

    const toolCalls = this.extractToolCalls(response.message.tool_calls);

    return {
      content: response.message.content,
      toolCalls,
      finishReason: toolCalls ? 'tool_calls' : response.done_reason === 'length' ? 'length' : 'stop',
      usage: {
        promptTokens: response.prompt_eval_count,
        completionTokens: response.eval_count,
        totalTokens: response.prompt_eval_count + response.eval_count,
      },
    };
  }

  /**
   * Convert LlmMessage[] to Ollama format
   */
  private convertMessages(messages: LlmMessage[]): Message[] {
    return messages.map((msg) => {
      const ollamaMsg: Message = {
        role: msg.role,
        content: msg.content,
      };

      if (msg.toolCalls?.length) {
        ollamaMsg.tool_calls = msg.toolCalls.map((tc) => ({
          function: {
            name: tc.name,
            arguments: tc.arguments,
          },
        }));
      }

      return ollamaMsg;
    });
  }

  /**
   * Convert LlmToolDefinition[] to Ollama format
   */
  private convertTools(tools: LlmToolDefinition[]): Tool[] {
    return tools.map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          properties: Object.fromEntries(
            Object.entries(tool.parameters.properties).map(([key, prop]) => [
              key,
              { type: prop.type, description: prop.description ?? '', enum: prop.enum },
            ])
          ),
          required: tool.parameters.required ?? [],
        },
      },
    }));
  }

  /**
   * Extract tool calls from Ollama response
   */
  private extractToolCalls(toolCalls?: ToolCall[]): LlmToolCall[] | undefined {
    if (!toolCalls || toolCalls.length === 0) return undefined;

    return toolCalls.map((tc, index) => ({
      id: `call_${index}`,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));
  }
}

/**
 * Gemini Provider
 *
 * LLM provider implementation for Google's Gemini API.
 */

import {
  GoogleGenerativeAI,
  SchemaType,
  type Content,
  type FunctionDeclaration,
  type GenerativeModel,
  type Part,
  type Schema,
} from '@google/generative-ai';
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
  LlmToolProperty,
} from '../types.js';

const DEFAULT_MODEL = 'gemini-2.0-flash';

export class GeminiProvider extends BaseProvider {
  readonly providerType: LlmProviderType = 'gemini';
  private client: GoogleGenerativeAI;

  constructor(config: ProviderConfig = {}) {
    super(config, DEFAULT_MODEL);
    this.client = new GoogleGenerativeAI(config.apiKey ?? '');
  }

  async chat(messages: LlmMessage[], options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const { temperature, maxTokens } = this.resolveOptions(options);
    const { systemInstruction, contents } = this.convertMessages(messages);
    const model = this.createModel(systemInstruction, options.tools);

    const result = await this.request(
      () =>
        model.generateContent(
          {
            contents,
            generationConfig: {
              temperature,
              maxOutputTokens: maxTokens,
            },
          },
          { signal: options.signal }
        ),
      options.signal
    );

    const response = result.response;
    const candidate = response.candidates?.[0];

    let textContent = '';
    const toolCalls: LlmToolCall[] = [];

    for (const part of candidate?.content?.parts ?? []) {
      if (part.text) {
        textContent += part.text;
      } else if (part.functionCall) {
        const args: unknown = part.functionCall.args ?? {};
        if (!isRecord(args)) {
          throw new AgentError(`Model produced non-object arguments for tool "${part.functionCall.name}"`);
        }
        toolCalls.push({
          id: `call_${toolCalls.length}`,
          name: part.functionCall.name,
          arguments: args,
        });
      }
    }

    return {
      content: textContent,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      finishReason: toolCalls.length > 0 ? 'tool_calls' : this.mapFinishReason(candidate?.finishReason),
      usage: response.usageMetadata
        ? {
            promptTokens: response.usageMetadata.promptTokenCount || 0,
            completionTokens: response.usageMetadata.candidatesTokenCount || 0,
            totalTokens: response.usageMetadata.totalTokenCount || 0,
          }
        : undefined,
    };
  }

  private createModel(systemInstruction?: string, tools?: LlmToolDefinition[]): GenerativeModel {
    return this.client.getGenerativeModel(
      {
        model: this.model,
        systemInstruction,
        tools: tools?.length
          ? [{ functionDeclarations: tools.map((tool) => this.convertTool(tool)) }]
          : undefined,
      },
      this.baseUrl ? { baseUrl: this.baseUrl } : undefined
    );
  }

  private convertTool(tool: LlmToolDefinition): FunctionDeclaration {
    const properties: Record<string, Schema> = {};
    for (const [key, prop] of Object.entries(tool.parameters.properties)) {
      properties[key] = this.convertSchema(prop);
    }

    return {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: SchemaType.OBJECT,
        properties,
        required: tool.parameters.required ?? [],
      },
    };
  }

  /**
   * Convert a JSON Schema property to Gemini's schema format
   */
  private convertSchema(prop: LlmToolProperty): Schema {
    const description = prop.enum
      ? `${prop.description ?? ''} One of: ${prop.enum.join(', ')}`.trim()
      : prop.description;

    switch (prop.type) {
      case 'number':
        return { type: SchemaType.NUMBER, description };
      case 'integer':
        return { type: SchemaType.INTEGER, description };
      case 'boolean':
        return { type: SchemaType.BOOLEAN, description };
      case 'array':
        return {
          type: SchemaType.ARRAY,
          description,
          items: prop.items ? this.convertSchema(prop.items) : { type: SchemaType.STRING },
        };
      case 'object': {
        const properties: Record<string, Schema> = {};
        for (const [key, child] of Object.entries(prop.properties ?? {})) {
          properties[key] = this.convertSchema(child);
        }
        return { type: SchemaType.OBJECT, description, properties, required: prop.required };
      }
      default:
        return { type: SchemaType.STRING, description };
    }
  }

  /**
   * Convert LlmMessage[] to Gemini format
   * Consecutive tool results become one function turn answering every call
   * of the preceding model turn.
   */
  private convertMessages(messages: LlmMessage[]): { systemInstruction?: string; contents: Content[] } {
    let systemInstruction: string | undefined;
    const contents: Content[] = [];
    let pendingResponses: Part[] = [];

    const flushResponses = () => {
      if (pendingResponses.length > 0) {
        contents.push({ role: 'function', parts: pendingResponses });
        pendingResponses = [];
      }
    };

    for (const msg of messages) {
      if (msg.role === 'tool') {
        // Gemini pairs function responses by name, not id
        pendingResponses.push({
          functionResponse: {
            name: msg.name || 'unknown',
            response: { result: msg.content },
          },
        });
        continue;
      }

      flushResponses();

      if (msg.role === 'system') {
        systemInstruction = msg.content;
      } else if (msg.role === 'user') {
        contents.push({ role: 'user', parts: [{ text: msg.content }] });
      } else {
        const parts: Part[] = [];
        if (msg.content) {
          parts.push({ text: msg.content });
        }
        for (const tc of msg.toolCalls ?? []) {
          parts.push({ functionCall: { name: tc.name, args: tc.arguments } });
        }
        contents.push({ role: 'model', parts });
      }
    }

    flushResponses();
    return { systemInstruction, contents };
  }

  /**
   * Map Gemini finish reason to our format
   */
  private mapFinishReason(reason: string | undefined): LlmFinishReason {
    switch (reason) {
      case 'MAX_TOKENS':
        return 'length';
      case 'SAFETY':
      case 'RECITATION':
      case 'OTHER':
        return 'error';
      default:
        return 'stop';
    }
  }
}

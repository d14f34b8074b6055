/**
 * Travel Agent
 *
 * Tool-calling loop over the LLM provider abstraction:
 *
 *   start → model_call → (tool_exec → model_call)* → end
 *
 * Each run() owns its conversation, so one agent serves concurrent requests.
 */

import { AgentError, IterationLimitError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { LlmMessage, LlmProvider, LlmToolCall, LlmToolDefinition } from '../llm/types.js';
import { getSystemPrompt } from './prompts.js';
import type { ToolRegistry } from './tool-registry.js';

const log = createLogger('agent');

export interface AgentOptions {
  provider: LlmProvider;
  registry: ToolRegistry;
  /** Upper bound on model calls per run */
  maxIterations: number;
  /** System prompt key or custom prompt */
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface AgentRunOptions {
  signal?: AbortSignal;
}

export interface AgentRunResult {
  answer: string;
  /** false when the iteration bound cut the run short */
  completed: boolean;
  /** Model calls made */
  iterations: number;
  toolCallCount: number;
  messages: LlmMessage[];
}

type AgentState =
  | { phase: 'model_call' }
  | { phase: 'tool_exec'; toolCalls: LlmToolCall[] }
  | { phase: 'end'; answer: string; completed: boolean };

interface RunContext {
  messages: LlmMessage[];
  tools: LlmToolDefinition[];
  signal?: AbortSignal;
  iterations: number;
  toolCallCount: number;
}

export class TravelAgent {
  private readonly provider: LlmProvider;
  private readonly registry: ToolRegistry;
  private readonly maxIterations: number;
  private readonly systemPrompt: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;

  constructor(options: AgentOptions) {
    if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
      throw new AgentError(`maxIterations must be a positive integer, got ${options.maxIterations}`);
    }
    this.provider = options.provider;
    this.registry = options.registry;
    this.maxIterations = options.maxIterations;
    this.systemPrompt = getSystemPrompt(options.systemPrompt);
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
  }

  /**
   * Answer one question
   *
   * @throws AgentError when the model returns an empty answer or malformed output
   * @throws IterationLimitError when the bound is reached with no text to return
   * @throws TransportError when the provider fails
   */
  async run(question: string, options: AgentRunOptions = {}): Promise<AgentRunResult> {
    const context: RunContext = {
      messages: [
        { role: 'system', content: this.systemPrompt },
        { role: 'user', content: question },
      ],
      tools: this.registry.getDefinitions(),
      signal: options.signal,
      iterations: 0,
      toolCallCount: 0,
    };

    let state: AgentState = { phase: 'model_call' };
    for (;;) {
      switch (state.phase) {
        case 'model_call':
          state = await this.callModel(context);
          break;
        case 'tool_exec':
          state = await this.executeTools(context, state.toolCalls);
          break;
        case 'end':
          log.info(
            {
              iterations: context.iterations,
              toolCalls: context.toolCallCount,
              completed: state.completed,
            },
            'Agent run finished'
          );
          return {
            answer: state.answer,
            completed: state.completed,
            iterations: context.iterations,
            toolCallCount: context.toolCallCount,
            messages: context.messages,
          };
      }
    }
  }

  private async callModel(context: RunContext): Promise<AgentState> {
    context.signal?.throwIfAborted();
    context.iterations += 1;

    const response = await this.provider.chat(context.messages, {
      tools: context.tools,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      signal: context.signal,
    });

    const toolCalls = response.toolCalls ?? [];
    const hasText = response.content.trim().length > 0;

    if (toolCalls.length === 0) {
      if (!hasText) {
        throw new AgentError('Model returned an empty answer');
      }
      context.messages.push({ role: 'assistant', content: response.content });
      return { phase: 'end', answer: response.content, completed: true };
    }

    if (context.iterations >= this.maxIterations) {
      log.warn(
        { maxIterations: this.maxIterations, pendingToolCalls: toolCalls.map((c) => c.name) },
        'Iteration limit reached with tool calls pending'
      );
      if (!hasText) {
        throw new IterationLimitError(this.maxIterations);
      }
      context.messages.push({ role: 'assistant', content: response.content });
      return { phase: 'end', answer: response.content, completed: false };
    }

    context.messages.push({ role: 'assistant', content: response.content, toolCalls });
    return { phase: 'tool_exec', toolCalls };
  }

  private async executeTools(context: RunContext, toolCalls: LlmToolCall[]): Promise<AgentState> {
    for (const call of toolCalls) {
      log.debug({ tool: call.name, args: call.arguments }, 'Calling tool');
      const result = await this.registry.dispatch(call, { signal: context.signal });
      context.toolCallCount += 1;

      context.messages.push({
        role: 'tool',
        content: result.content,
        toolCallId: result.toolCallId,
        name: result.toolName,
      });
    }
    return { phase: 'model_call' };
  }
}

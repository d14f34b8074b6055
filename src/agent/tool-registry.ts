import { ConfigurationError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { LlmToolCall, LlmToolDefinition } from '../llm/types.js';
import type { HttpClient } from '../tools/http.js';
import { isToolName, type ToolName, type TravelTool } from '../tools/types.js';
import { convertToolsToLlm } from './tool-converter.js';

const log = createLogger('agent:tools');

/**
 * Outcome of one tool call, ready to be appended to the conversation
 */
export interface ToolResult {
  toolCallId: string;
  toolName: string;
  content: string;
  isError: boolean;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

/**
 * Maps each tool name to its adapter and executes model tool calls.
 *
 * dispatch() never rejects for tool problems: unknown tools, invalid
 * arguments and adapter failures all come back as a ToolResult. Only an
 * aborted signal rejects, with the signal's reason.
 */
export class ToolRegistry {
  private readonly tools = new Map<ToolName, TravelTool>();
  private readonly definitions: LlmToolDefinition[];

  constructor(
    tools: readonly TravelTool[],
    private readonly http: HttpClient
  ) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new ConfigurationError(`Tool "${tool.name}" is registered more than once`);
      }
      this.tools.set(tool.name, tool);
    }
    this.definitions = convertToolsToLlm(tools);
  }

  getDefinitions(): LlmToolDefinition[] {
    return this.definitions;
  }

  getToolNames(): ToolName[] {
    return [...this.tools.keys()];
  }

  has(name: string): boolean {
    return isToolName(name) && this.tools.has(name);
  }

  async dispatch(call: LlmToolCall, options: DispatchOptions = {}): Promise<ToolResult> {
    const { signal } = options;
    signal?.throwIfAborted();

    const tool = isToolName(call.name) ? this.tools.get(call.name) : undefined;
    if (!tool) {
      log.warn({ tool: call.name }, 'Model requested an unknown tool');
      return this.result(call, `tool not found: ${call.name}`, true);
    }

    const startTime = Date.now();
    try {
      const content = await tool.invoke(call.arguments, { http: this.http, signal });
      log.debug({ tool: call.name, duration: Date.now() - startTime }, 'Tool call finished');
      return this.result(call, content, false);
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      const message = error instanceof Error ? error.message : String(error);
      log.error({ tool: call.name, err: error }, 'Tool call failed');
      return this.result(call, `Tool ${call.name} failed: ${message}`, true);
    }
  }

  private result(call: LlmToolCall, content: string, isError: boolean): ToolResult {
    return { toolCallId: call.id, toolName: call.name, content, isError };
  }
}

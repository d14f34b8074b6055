/**
 * Shared types for travel tools
 */
import { z } from 'zod';
import type { HttpClient } from './http.js';

/**
 * The closed set of tools the agent can call
 */
export const TOOL_NAMES = [
  'get_weather',
  'search_places',
  'convert_currency',
  'calculate_expenses',
  'search_web',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

/**
 * Per-call resources handed to a tool
 */
export interface ToolContext {
  http: HttpClient;
  signal?: AbortSignal;
}

/**
 * A tool adapter. invoke() always resolves to text for the model; failures
 * of the underlying service are reported in that text.
 */
export interface TravelTool {
  readonly name: ToolName;
  readonly description: string;
  readonly schema: z.ZodRawShape;
  invoke(args: Record<string, unknown>, context: ToolContext): Promise<string>;
}

export interface ToolSpec<Shape extends z.ZodRawShape> {
  name: ToolName;
  description: string;
  schema: Shape;
  handler: (args: z.infer<z.ZodObject<Shape>>, context: ToolContext) => Promise<string>;
}

/**
 * Validate tool arguments against a Zod schema.
 * Returns the parsed data or the message to hand back to the model.
 */
export function validateArgs<T extends z.ZodRawShape>(
  args: Record<string, unknown>,
  schema: T
): { success: true; data: z.infer<z.ZodObject<T>> } | { success: false; error: string } {
  const result = z.object(schema).safeParse(args);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
      .join(', ');
    return { success: false, error: errors };
  }

  return { success: true, data: result.data };
}

/**
 * Build a tool whose handler only ever sees validated arguments
 */
export function defineTool<Shape extends z.ZodRawShape>(spec: ToolSpec<Shape>): TravelTool {
  return {
    name: spec.name,
    description: spec.description,
    schema: spec.schema,
    invoke: async (args, context) => {
      const validated = validateArgs(args, spec.schema);
      if (!validated.success) {
        return `Invalid arguments for ${spec.name}: ${validated.error}`;
      }
      return spec.handler(validated.data, context);
    },
  };
}

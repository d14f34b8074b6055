/**
 * Tool Converter
 *
 * Converts travel tool definitions (Zod raw shapes) to the generic LLM tool format.
 */

import { z } from 'zod';
import type { LlmToolDefinition, LlmToolProperty } from '../llm/types.js';
import type { TravelTool } from '../tools/types.js';

interface ParsedSchema {
  property: LlmToolProperty;
  isOptional: boolean;
}

/**
 * Peel optional/default/effects wrappers, keeping the outermost description
 */
function unwrap(schema: z.ZodTypeAny): { inner: z.ZodTypeAny; isOptional: boolean; description?: string } {
  let current = schema;
  let isOptional = false;
  const description = schema.description;

  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      isOptional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      isOptional = true;
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      break;
    }
  }

  return { inner: current, isOptional, description: description ?? current.description };
}

function convertShape(shape: z.ZodRawShape): { properties: Record<string, LlmToolProperty>; required: string[] } {
  const properties: Record<string, LlmToolProperty> = {};
  const required: string[] = [];

  for (const [key, schema] of Object.entries(shape)) {
    const { property, isOptional } = parseZodSchema(schema);
    properties[key] = property;
    if (!isOptional) {
      required.push(key);
    }
  }

  return { properties, required };
}

/**
 * Extract JSON-schema metadata from a Zod schema
 */
export function parseZodSchema(schema: z.ZodTypeAny): ParsedSchema {
  const { inner, isOptional, description } = unwrap(schema);
  const property: LlmToolProperty = { type: 'string' };

  if (inner instanceof z.ZodString) {
    property.type = 'string';
  } else if (inner instanceof z.ZodNumber) {
    property.type = inner.isInt ? 'integer' : 'number';
  } else if (inner instanceof z.ZodBoolean) {
    property.type = 'boolean';
  } else if (inner instanceof z.ZodEnum) {
    property.type = 'string';
    property.enum = [...inner.options];
  } else if (inner instanceof z.ZodArray) {
    property.type = 'array';
    property.items = parseZodSchema(inner.element).property;
  } else if (inner instanceof z.ZodObject) {
    const { properties, required } = convertShape(inner.shape);
    property.type = 'object';
    property.properties = properties;
    property.required = required;
  } else if (inner instanceof z.ZodUnion) {
    // Tool schemas carry a single type; the first option is the preferred one
    const [first] = inner.options;
    if (first instanceof z.ZodType) {
      Object.assign(property, parseZodSchema(first).property);
    }
  }

  if (description) {
    property.description = description;
  }

  return { property, isOptional };
}

/**
 * Convert travel tools to LlmToolDefinition format
 */
export function convertToolsToLlm(tools: readonly TravelTool[]): LlmToolDefinition[] {
  return tools.map((tool) => {
    const { properties, required } = convertShape(tool.schema);
    return {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object' as const,
        properties,
        required,
      },
    };
  });
}

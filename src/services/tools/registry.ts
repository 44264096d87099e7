// Tool Registry - Central registry for all available tools
// Tools are registered on startup and can be dynamically queried

import type { JsonValue } from '../../utils/json-value.js';
import { getLogger } from '../../logger.js';
import type { ToolDefinition, ToolParameter } from './types.js';

const log = getLogger('tool-registry');

export interface ParameterSchema {
  type: ToolParameter['type'];
  description: string;
  enum?: string[];
  default?: JsonValue;
  items?: { type: ToolParameter['type'] };
}

export interface OpenAIFunctionDef {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, ParameterSchema>;
    required: string[];
  };
}

function parametersToOpenAISchema(params: ToolParameter[]): Record<string, ParameterSchema> {
  const schema: Record<string, ParameterSchema> = {};

  for (const param of params) {
    const paramSchema: ParameterSchema = {
      type: param.type,
      description: param.description,
    };

    if (param.enum) {
      paramSchema.enum = param.enum;
    }

    if (param.default !== undefined) {
      paramSchema.default = param.default;
    }

    if (param.items) {
      paramSchema.items = param.items;
    }

    schema[param.name] = paramSchema;
  }

  return schema;
}

export function toOpenAIFunction(tool: ToolDefinition): OpenAIFunctionDef {
  return {
    name: tool.name,
    description: tool.description,
    parameters: {
      type: 'object',
      properties: parametersToOpenAISchema(tool.parameters),
      required: tool.parameters.filter(p => p.required).map(p => p.name),
    },
  };
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      log.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  toOpenAIFunctions(): OpenAIFunctionDef[] {
    return this.getAll().map(toOpenAIFunction);
  }
}

// Singleton instance
export const toolRegistry = new ToolRegistry();

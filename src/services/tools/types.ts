// Tool system types and interfaces
// Every tool takes JSON arguments and returns text; failures are thrown.

import type { JsonObject, JsonValue } from '../../utils/json-value.js';

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[];
  default?: JsonValue;
  items?: { type: ToolParameter['type'] };
}

/**
 * Read tools share the bounded read pool. Write tools are serialized per
 * target resource.
 */
export type ToolKind = 'read' | 'write';

export interface ToolContext {
  toolCallId: string;
  conversationId?: string;
  workspaceRoot: string;
  signal: AbortSignal;
}

export type ProgressListener = (chunk: string) => void;

export interface ToolDefinition {
  name: string;
  description: string;
  kind: ToolKind;
  parameters: ToolParameter[];
  execute: (args: JsonObject, context: ToolContext) => Promise<string>;
  /** Streaming variant; each chunk counts as progress for the watchdog. */
  executeWithProgress?: (args: JsonObject, context: ToolContext, onChunk: ProgressListener) => Promise<string>;
}

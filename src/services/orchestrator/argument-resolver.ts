import * as path from 'path';
import type { JsonObject } from '../../utils/json-value.js';
import { stringArg } from '../../utils/json-value.js';
import type { ToolCall } from './types.js';

/** Tools whose arguments name a single workspace file. */
export const FILE_PATH_TOOLS: ReadonlySet<string> = new Set([
  'read_file',
  'write_file',
  'create_file',
  'delete_file',
  'replace_in_file',
]);

export const EXPLICIT_PATH_KEYS = ['path', 'targetPath', 'target_path', 'file_path', 'file', 'target'];

export interface ToolArgumentResolverOptions {
  workspaceRoot: string;
  /** Fallback target for file tools called without a path, e.g. the file in focus. */
  defaultFilePath?: () => string | undefined;
}

export class ToolArgumentResolver {
  readonly workspaceRoot: string;
  private readonly defaultFilePath: () => string | undefined;

  constructor(options: ToolArgumentResolverOptions) {
    this.workspaceRoot = path.resolve(options.workspaceRoot);
    this.defaultFilePath = options.defaultFilePath ?? (() => undefined);
  }

  explicitPath(args: JsonObject): string | undefined {
    return stringArg(args, ...EXPLICIT_PATH_KEYS)?.trim();
  }

  resolveTargetFile(toolName: string, args: JsonObject): string | undefined {
    const explicit = this.explicitPath(args);
    if (explicit) return explicit;
    if (FILE_PATH_TOOLS.has(toolName)) {
      return this.defaultFilePath();
    }
    return undefined;
  }

  /** Arguments the resolver contributes on top of the model's own. */
  contextArguments(toolName: string, args: JsonObject): JsonObject {
    if (!FILE_PATH_TOOLS.has(toolName) || this.explicitPath(args)) {
      return {};
    }
    const fallback = this.defaultFilePath();
    return fallback ? { path: fallback } : {};
  }

  /** Model arguments, then correlation ids, then resolver context. */
  buildMergedArguments(call: ToolCall, toolName: string, conversationId?: string): JsonObject {
    const merged: JsonObject = { ...call.arguments, _tool_call_id: call.id };
    if (conversationId) {
      merged._conversation_id = conversationId;
    }
    return { ...merged, ...this.contextArguments(toolName, call.arguments) };
  }

  /** Key for write serialization: the normalized target file, else the tool name. */
  pathKey(toolName: string, targetFile: string | undefined): string {
    if (!targetFile) return toolName;
    return path.resolve(this.workspaceRoot, targetFile);
  }
}

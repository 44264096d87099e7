// File Read Tool
// Reads file contents from the workspace, optionally limited to a line range

import { readFile } from 'fs/promises';
import type { ToolDefinition } from './types.js';
import { numberArg, stringArg } from '../../utils/json-value.js';
import { resolveWorkspacePath } from './workspace-paths.js';

const MAX_FILE_SIZE = 100000; // 100KB max file size
const MAX_LINES = 500; // Max lines to return

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export const fileReadTool: ToolDefinition = {
  name: 'read_file',
  kind: 'read',
  description: 'Read contents of a file from the current workspace. Useful for reviewing code, configuration, or documentation files.',
  parameters: [
    {
      name: 'path',
      type: 'string',
      description: 'Path to the file to read (relative to workspace root)',
      required: true,
    },
    {
      name: 'start_line',
      type: 'number',
      description: 'First line to return, 1-based (default: 1)',
      required: false,
    },
    {
      name: 'end_line',
      type: 'number',
      description: 'Last line to return, inclusive (default: start_line + 499)',
      required: false,
    },
  ],
  execute: async (args, context) => {
    const filePath = stringArg(args, 'path', 'file_path');
    if (!filePath) {
      throw new Error('File path is required');
    }

    const fullPath = resolveWorkspacePath(filePath, context.workspaceRoot);
    if (!fullPath) {
      throw new Error(`Access denied: "${filePath}" is outside the workspace`);
    }

    let content: string;
    try {
      content = await readFile(fullPath, { encoding: 'utf-8', signal: context.signal });
    } catch (error) {
      if (isMissingFile(error)) {
        throw new Error(`File not found: "${filePath}"`);
      }
      throw error;
    }

    if (content.length > MAX_FILE_SIZE) {
      throw new Error(`File is too large (${content.length} bytes > ${MAX_FILE_SIZE} bytes)`);
    }

    const lines = content.split('\n');
    const start = Math.max(1, Math.floor(numberArg(args, 'start_line') ?? 1));
    const requestedEnd = numberArg(args, 'end_line');
    const end = Math.min(
      lines.length,
      Math.floor(requestedEnd ?? start + MAX_LINES - 1),
      start + MAX_LINES - 1,
    );

    if (start > lines.length) {
      return `${filePath} has ${lines.length} line(s); nothing at line ${start}.`;
    }

    const width = String(end).length;
    const body = lines
      .slice(start - 1, end)
      .map((line, index) => `${String(start + index).padStart(width, ' ')} | ${line}`)
      .join('\n');

    const header = `${filePath} (lines ${start}-${end} of ${lines.length})`;
    return `${header}\n${body}`;
  },
};

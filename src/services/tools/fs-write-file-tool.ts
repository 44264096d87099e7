import * as fs from 'fs/promises';
import * as path from 'path';
import type { ToolDefinition } from './types.js';
import { booleanArg, stringArg } from '../../utils/json-value.js';
import { resolveWorkspacePath } from './workspace-paths.js';

const TOOL_NAME = 'write_file';

const description = `Writes content to a file in the workspace. Creates the file if it doesn't exist, or overwrites it if it does. Parent directories are created automatically. Prefer replace_in_file for targeted edits.`;

export const fsWriteFileTool: ToolDefinition = {
  name: TOOL_NAME,
  kind: 'write',
  description,
  parameters: [
    {
      name: 'path',
      type: 'string',
      description: 'The file path relative to the workspace (e.g., "src/app.ts")',
      required: true,
    },
    {
      name: 'content',
      type: 'string',
      description: 'The full content to write to the file',
      required: true,
    },
    {
      name: 'create_only',
      type: 'boolean',
      description: 'Fail instead of overwriting an existing file (default: false)',
      required: false,
      default: false,
    },
  ],

  async execute(args, context) {
    const filePath = stringArg(args, 'path');
    if (!filePath) {
      throw new Error('Missing "path" argument');
    }

    const content = args.content;
    if (typeof content !== 'string') {
      throw new Error('Missing "content" argument (must be a string)');
    }

    const fullPath = resolveWorkspacePath(filePath, context.workspaceRoot);
    if (!fullPath) {
      throw new Error('Invalid file path. Paths outside the workspace are not allowed.');
    }

    const createOnly = booleanArg(args, 'create_only') ?? false;
    await fs.mkdir(path.dirname(fullPath), { recursive: true });

    try {
      await fs.writeFile(fullPath, content, { encoding: 'utf-8', flag: createOnly ? 'wx' : 'w', signal: context.signal });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        throw new Error(`File already exists: "${filePath}"`);
      }
      throw error;
    }

    const lineCount = content.split('\n').length;
    return `Wrote ${Buffer.byteLength(content, 'utf-8')} bytes (${lineCount} line(s)) to ${filePath}`;
  },
};

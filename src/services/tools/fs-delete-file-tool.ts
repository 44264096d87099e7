import * as fs from 'fs/promises';
import type { ToolDefinition } from './types.js';
import { stringArg } from '../../utils/json-value.js';
import { resolveWorkspacePath } from './workspace-paths.js';

export const fsDeleteFileTool: ToolDefinition = {
  name: 'delete_file',
  kind: 'write',
  description: 'Deletes a single file from the workspace. Directories are not removed.',
  parameters: [
    {
      name: 'path',
      type: 'string',
      description: 'The file path relative to the workspace',
      required: true,
    },
  ],

  async execute(args, context) {
    const filePath = stringArg(args, 'path');
    if (!filePath) {
      throw new Error('Missing "path" argument');
    }

    const fullPath = resolveWorkspacePath(filePath, context.workspaceRoot);
    if (!fullPath || fullPath === context.workspaceRoot) {
      throw new Error('Invalid file path. Paths outside the workspace are not allowed.');
    }

    const stats = await fs.stat(fullPath).catch(() => null);
    if (!stats) {
      throw new Error(`File not found: "${filePath}"`);
    }
    if (!stats.isFile()) {
      throw new Error(`Not a file: "${filePath}"`);
    }

    await fs.unlink(fullPath);
    return `Deleted ${filePath}`;
  },
};

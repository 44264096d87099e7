import * as fs from 'fs/promises';
import type { ToolDefinition } from './types.js';
import { booleanArg, stringArg } from '../../utils/json-value.js';
import { resolveWorkspacePath } from './workspace-paths.js';

const TOOL_NAME = 'replace_in_file';

const description = `Edits an existing file by replacing specific text with new content. This is safer than overwriting entire files as it preserves the surrounding context. Use this to make targeted changes to code, configuration, or any text file.`;

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export const fsEditFileTool: ToolDefinition = {
  name: TOOL_NAME,
  kind: 'write',
  description,
  parameters: [
    {
      name: 'path',
      type: 'string',
      description: 'The file path to edit (relative to workspace, e.g., "src/app.ts")',
      required: true,
    },
    {
      name: 'old_text',
      type: 'string',
      description: 'The exact text to search for in the file (must match exactly)',
      required: true,
    },
    {
      name: 'new_text',
      type: 'string',
      description: 'The new text to replace the search text with',
      required: true,
    },
    {
      name: 'replace_all',
      type: 'boolean',
      description: 'If true, replace all occurrences. If false, replace only the first occurrence (default: false)',
      required: false,
      default: false,
    },
  ],

  async execute(args, context) {
    const filePath = stringArg(args, 'path');
    if (!filePath) {
      throw new Error('Missing "path" argument');
    }

    const search = args.old_text ?? args.search;
    const replace = args.new_text ?? args.replace;
    if (typeof search !== 'string' || search.length === 0) {
      throw new Error('Missing "old_text" argument');
    }
    if (typeof replace !== 'string') {
      throw new Error('Missing "new_text" argument');
    }

    const fullPath = resolveWorkspacePath(filePath, context.workspaceRoot);
    if (!fullPath) {
      throw new Error('Invalid file path. Paths outside the workspace are not allowed.');
    }

    let originalContent: string;
    try {
      originalContent = await fs.readFile(fullPath, { encoding: 'utf-8', signal: context.signal });
    } catch {
      throw new Error(`File not found: "${filePath}". Use write_file to create new files.`);
    }

    const matchCount = countOccurrences(originalContent, search);
    if (matchCount === 0) {
      throw new Error('Search text not found in file. Make sure the search text matches exactly, including whitespace and newlines.');
    }

    const replaceAll = booleanArg(args, 'replace_all') ?? false;
    let newContent: string;
    let replaced: number;

    if (replaceAll) {
      newContent = originalContent.split(search).join(replace);
      replaced = matchCount;
    } else {
      const index = originalContent.indexOf(search);
      newContent = originalContent.slice(0, index) + replace + originalContent.slice(index + search.length);
      replaced = 1;
    }

    await fs.writeFile(fullPath, newContent, 'utf-8');

    return `Edited ${filePath}: ${replaced} occurrence(s) replaced.`;
  },
};

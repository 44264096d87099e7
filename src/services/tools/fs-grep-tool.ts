import * as fs from 'fs/promises';
import * as path from 'path';
import type { ToolDefinition } from './types.js';
import { numberArg, stringArg } from '../../utils/json-value.js';
import { resolveWorkspacePath, toWorkspaceRelative } from './workspace-paths.js';

const TOOL_NAME = 'grep';

const description = `Search for text or regex patterns within files. Returns matching lines with file paths and line numbers. Use it to find definitions, imports, or the right file before reading it.`;

const SKIPPED_DIRECTORIES = new Set(['node_modules', '__pycache__', '.git', 'dist', 'build', 'coverage']);
const MAX_DEPTH = 15;
const MAX_FILE_SIZE = 512 * 1024;

interface GrepMatch {
  file: string;
  line: number;
  text: string;
}

export function compileSearchPattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'i');
  } catch {
    // Invalid regex: search for the literal text
    return new RegExp(pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'i');
  }
}

// Check if file matches the include pattern
export function matchesInclude(filePath: string, include: string | undefined): boolean {
  if (!include) return true;

  const fileName = path.basename(filePath);
  const pattern = include
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${pattern}$`, 'i').test(fileName);
}

function looksBinary(content: Buffer): boolean {
  const sample = content.subarray(0, 512);
  return sample.includes(0);
}

export const fsGrepTool: ToolDefinition = {
  name: TOOL_NAME,
  kind: 'read',
  description,
  parameters: [
    {
      name: 'pattern',
      type: 'string',
      description: 'Search pattern (plain text or regex). For regex, use standard JavaScript regex syntax.',
      required: true,
    },
    {
      name: 'path',
      type: 'string',
      description: 'Directory or file to search in (relative to workspace, default: workspace root)',
      required: false,
    },
    {
      name: 'include',
      type: 'string',
      description: 'File name pattern to include in search (e.g., "*.ts")',
      required: false,
    },
    {
      name: 'max_results',
      type: 'number',
      description: 'Maximum number of matching lines to return (default: 100)',
      required: false,
      default: 100,
    },
  ],

  async execute(args, context) {
    const pattern = stringArg(args, 'pattern', 'query');
    if (!pattern) {
      throw new Error('Missing "pattern" argument');
    }

    const searchPath = stringArg(args, 'path') ?? '.';
    const searchRoot = resolveWorkspacePath(searchPath, context.workspaceRoot);
    if (!searchRoot) {
      throw new Error('Invalid search path. Paths outside the workspace are not allowed.');
    }

    const include = stringArg(args, 'include');
    const maxResults = Math.max(1, Math.floor(numberArg(args, 'max_results') ?? 100));
    const regex = compileSearchPattern(pattern);
    const matches: GrepMatch[] = [];

    async function searchFile(fullPath: string): Promise<void> {
      const stats = await fs.stat(fullPath);
      if (stats.size > MAX_FILE_SIZE) return;

      const buffer = await fs.readFile(fullPath);
      if (looksBinary(buffer)) return;

      const lines = buffer.toString('utf-8').split('\n');
      for (let i = 0; i < lines.length && matches.length < maxResults; i++) {
        if (regex.test(lines[i])) {
          matches.push({
            file: toWorkspaceRelative(fullPath, context.workspaceRoot),
            line: i + 1,
            text: lines[i].trim(),
          });
        }
      }
    }

    async function searchDir(dir: string, depth: number): Promise<void> {
      if (depth > MAX_DEPTH || matches.length >= maxResults) return;
      context.signal.throwIfAborted();

      const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
      for (const entry of entries) {
        if (matches.length >= maxResults) break;
        if (entry.isDirectory() && (entry.name.startsWith('.') || SKIPPED_DIRECTORIES.has(entry.name))) {
          continue;
        }

        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await searchDir(fullPath, depth + 1);
        } else if (entry.isFile() && matchesInclude(fullPath, include)) {
          await searchFile(fullPath);
        }
      }
    }

    const rootStats = await fs.stat(searchRoot).catch(() => null);
    if (!rootStats) {
      throw new Error(`Path not found: "${searchPath}"`);
    }

    if (rootStats.isFile()) {
      await searchFile(searchRoot);
    } else {
      await searchDir(searchRoot, 0);
    }

    if (matches.length === 0) {
      return `No matches for "${pattern}" in ${searchPath}`;
    }

    const lines = matches.map(m => `${m.file}:${m.line}: ${m.text}`);
    const suffix = matches.length >= maxResults ? `\n[results truncated at ${maxResults}]` : '';
    return `${matches.length} match(es) for "${pattern}" in ${searchPath}\n${lines.join('\n')}${suffix}`;
  },
};

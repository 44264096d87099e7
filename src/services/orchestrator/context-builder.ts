// Augmented context sent alongside the transcript on every inference attempt.

import * as fs from 'fs/promises';
import * as path from 'path';

export interface ContextRequest {
  userInput: string;
  explicitContext?: string;
  projectRoot: string;
}

export interface ContextBuilder {
  build(request: ContextRequest): Promise<string>;
}

export interface ProjectIndex {
  search(query: string, projectRoot: string, limit: number): Promise<string[]>;
}

const SKIPPED_DIRECTORIES = new Set(['node_modules', '.git', 'dist', 'build', 'coverage', '.agent']);
const MAX_INDEXED_FILES = 5000;
const MAX_DEPTH = 12;

export function queryTerms(query: string): string[] {
  const terms = query
    .toLowerCase()
    .split(/[^a-z0-9_\-.]+/)
    .map(term => term.replace(/^[.\-]+|[.\-]+$/g, ''))
    .filter(term => term.length >= 3);
  return Array.from(new Set(terms));
}

/** Path-name index of the workspace, built on first use. */
export class WorkspaceFileIndex implements ProjectIndex {
  private readonly cache = new Map<string, string[]>();

  async search(query: string, projectRoot: string, limit: number): Promise<string[]> {
    const terms = queryTerms(query);
    if (terms.length === 0) return [];

    const files = await this.files(projectRoot);
    return files
      .map(file => {
        const lower = file.toLowerCase();
        const score = terms.reduce((sum, term) => sum + (lower.includes(term) ? 1 : 0), 0);
        return { file, score };
      })
      .filter(entry => entry.score > 0)
      .sort((a, b) => b.score - a.score || a.file.length - b.file.length || a.file.localeCompare(b.file))
      .slice(0, limit)
      .map(entry => entry.file);
  }

  invalidate(projectRoot?: string): void {
    if (projectRoot) {
      this.cache.delete(path.resolve(projectRoot));
    } else {
      this.cache.clear();
    }
  }

  private async files(projectRoot: string): Promise<string[]> {
    const root = path.resolve(projectRoot);
    const cached = this.cache.get(root);
    if (cached) return cached;

    const collected: string[] = [];
    const walk = async (dir: string, depth: number): Promise<void> => {
      if (depth > MAX_DEPTH || collected.length >= MAX_INDEXED_FILES) return;
      const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
      for (const entry of entries) {
        if (collected.length >= MAX_INDEXED_FILES) return;
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (!SKIPPED_DIRECTORIES.has(entry.name) && !entry.name.startsWith('.')) {
            await walk(fullPath, depth + 1);
          }
        } else if (entry.isFile()) {
          collected.push(path.relative(root, fullPath));
        }
      }
    };

    await walk(root, 0);
    collected.sort();
    this.cache.set(root, collected);
    return collected;
  }
}

export interface ProjectContextBuilderOptions {
  index?: ProjectIndex;
  maxFiles?: number;
}

export class ProjectContextBuilder implements ContextBuilder {
  private readonly index: ProjectIndex;
  private readonly maxFiles: number;

  constructor(options: ProjectContextBuilderOptions = {}) {
    this.index = options.index ?? new WorkspaceFileIndex();
    this.maxFiles = options.maxFiles ?? 15;
  }

  async build(request: ContextRequest): Promise<string> {
    const sections = [`User request:\n${request.userInput.trim()}`];

    const explicit = request.explicitContext?.trim();
    if (explicit) {
      sections.push(`Explicit context:\n${explicit}`);
    }

    const files = await this.index.search(request.userInput, request.projectRoot, this.maxFiles);
    if (files.length > 0) {
      sections.push(`Relevant project files:\n${files.map(file => `- ${file}`).join('\n')}`);
    }

    return sections.join('\n\n');
  }
}

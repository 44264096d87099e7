import * as path from 'path';

/**
 * Resolves a tool-supplied path inside the workspace. Returns null for
 * absolute paths outside the root and for traversal attempts.
 */
export function resolveWorkspacePath(filePath: string, workspaceRoot: string): string | null {
  const cleaned = filePath.trim();
  if (!cleaned) return null;

  const resolvedWorkspace = path.resolve(workspaceRoot);
  const fullPath = path.isAbsolute(cleaned)
    ? path.normalize(cleaned)
    : path.resolve(resolvedWorkspace, path.normalize(cleaned));

  if (fullPath !== resolvedWorkspace && !fullPath.startsWith(resolvedWorkspace + path.sep)) {
    return null;
  }

  return fullPath;
}

export function toWorkspaceRelative(fullPath: string, workspaceRoot: string): string {
  return path.relative(path.resolve(workspaceRoot), fullPath) || '.';
}

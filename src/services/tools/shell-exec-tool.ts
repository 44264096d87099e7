import { spawn } from 'child_process';
import type { ProgressListener, ToolContext, ToolDefinition } from './types.js';
import type { JsonObject } from '../../utils/json-value.js';
import { stringArg } from '../../utils/json-value.js';
import { resolveWorkspacePath } from './workspace-paths.js';

const TOOL_NAME = 'run_command';

const description = `Execute a shell command in the workspace. Use this to run builds, tests, linters and git queries. Output streams back while the command runs; returns stdout, stderr and the exit code.`;

const MAX_OUTPUT = 100000;

const ALLOWED_COMMANDS = [
  /^npm\s+(install|run|test|ci|ls|outdated|audit)\b/,
  /^npx\s+(tsc|vitest|eslint|prettier)\b/,
  /^git\s+(status|log|diff|branch|show|add|commit|checkout|stash|restore|switch)\b/,
  /^node\s+[\w\-./]+\.m?js$/,
  /^ls(\s+-[la]+)?(\s+[\w\-./]+)?$/,
  /^cat\s+[\w\-./]+$/,
  /^echo\s+.+$/,
  /^mkdir\s+-p\s+[\w\-./]+$/,
  /^pwd$/,
  /^head\s+-n\s+\d+\s+[\w\-./]+$/,
  /^tail\s+-n\s+\d+\s+[\w\-./]+$/,
  /^wc(\s+-[lw]+)?\s+[\w\-./]+$/,
];

// Dangerous patterns that should never be allowed
const DANGEROUS_PATTERNS = [
  /[;&|`$()]/,           // Command chaining/injection
  /\.\./,                // Path traversal
  /[<>]/,                // Redirection
  /~|\$HOME|\$USER|\$PATH/, // Environment expansion
  /\\x[0-9a-fA-F]{2}/,   // Hex encoding
  /\\u[0-9a-fA-F]{4}/,   // Unicode encoding
];

export function isCommandAllowed(command: string): { allowed: boolean; reason?: string } {
  const trimmed = command.trim();

  for (const pattern of DANGEROUS_PATTERNS) {
    if (pattern.test(trimmed)) {
      return { allowed: false, reason: `Dangerous pattern detected: ${pattern.source}` };
    }
  }

  for (const pattern of ALLOWED_COMMANDS) {
    if (pattern.test(trimmed)) {
      return { allowed: true };
    }
  }

  return { allowed: false, reason: 'Command not in allowlist' };
}

function runCommand(args: JsonObject, context: ToolContext, onChunk: ProgressListener): Promise<string> {
  const command = stringArg(args, 'command');
  if (!command) {
    return Promise.reject(new Error('Missing "command" argument'));
  }

  const check = isCommandAllowed(command);
  if (!check.allowed) {
    return Promise.reject(new Error(`Command not allowed: ${check.reason ?? 'unknown reason'}`));
  }

  const cwdArg = stringArg(args, 'cwd');
  const workingDir = cwdArg ? resolveWorkspacePath(cwdArg, context.workspaceRoot) : context.workspaceRoot;
  if (!workingDir) {
    return Promise.reject(new Error(`Working directory outside workspace: "${cwdArg}"`));
  }

  return new Promise((resolve, reject) => {
    let output = '';
    let truncated = false;

    const isWindows = process.platform === 'win32';
    const shell = isWindows ? 'cmd.exe' : '/bin/bash';
    const shellArgs = isWindows ? ['/c', command] : ['-c', command];

    const child = spawn(shell, shellArgs, {
      cwd: workingDir,
      env: process.env,
      signal: context.signal,
      killSignal: 'SIGKILL',
    });

    const collect = (prefix: string) => (data: Buffer) => {
      const text = prefix + data.toString();
      onChunk(text);
      if (output.length + text.length <= MAX_OUTPUT) {
        output += text;
      } else if (!truncated) {
        output += text.slice(0, MAX_OUTPUT - output.length);
        output += '\n[OUTPUT TRUNCATED]';
        truncated = true;
      }
    };

    child.stdout?.on('data', collect(''));
    child.stderr?.on('data', collect('[stderr] '));

    child.on('error', (error) => {
      reject(error);
    });

    child.on('close', (code, signal) => {
      if (context.signal.aborted) return;
      const status = code === null ? `terminated by ${signal ?? 'signal'}` : `exit code ${code}`;
      resolve(`$ ${command}\n${output.trimEnd()}\n[${status}]`);
    });
  });
}

export const shellExecTool: ToolDefinition = {
  name: TOOL_NAME,
  kind: 'write',
  description,
  parameters: [
    {
      name: 'command',
      type: 'string',
      description: 'Shell command to execute (e.g., "npm test", "git status")',
      required: true,
    },
    {
      name: 'cwd',
      type: 'string',
      description: 'Working directory for command (relative to workspace, default: workspace root)',
      required: false,
    },
  ],

  execute(args, context) {
    return runCommand(args, context, () => undefined);
  },

  executeWithProgress(args, context, onChunk) {
    return runCommand(args, context, onChunk);
  },
};

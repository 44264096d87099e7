// Environment configuration for the orchestration API
// Provider credentials, workspace location and execution limits

import * as path from 'path';
import { clampToolTimeoutSeconds } from './services/watchdog/tool-timeout-center.js';

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseToolTimeout(value: string | undefined): number {
  if (!value) return clampToolTimeoutSeconds(undefined);
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    console.error(`Invalid TOOL_TIMEOUT_SECONDS "${value}", using default`);
  }
  return clampToolTimeoutSeconds(parsed);
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const items = value.split(',').map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export const DEFAULT_VERIFY_ALLOWED_PREFIXES = [
  'npm test',
  'npm run build',
  'npm run lint',
  'npx tsc --noEmit',
  'npx vitest run',
  'git status',
  'git diff',
  'git log',
];

const workspaceRoot = path.resolve(strEnv(process.env.WORKSPACE_ROOT) || process.cwd());

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  // Inference backend
  INFERENCE_PROVIDER: strEnv(process.env.INFERENCE_PROVIDER, 'deepseek'),
  INFERENCE_MODEL: strEnv(process.env.INFERENCE_MODEL, 'deepseek-chat'),
  DEEPSEEK_API_KEY: strEnv(process.env.DEEPSEEK_API_KEY),
  DEEPSEEK_BASE_URL: strEnv(process.env.DEEPSEEK_BASE_URL, 'https://api.deepseek.com'),
  MOONSHOT_API_KEY: strEnv(process.env.MOONSHOT_API_KEY),
  MOONSHOT_BASE_URL: strEnv(process.env.MOONSHOT_BASE_URL, 'https://api.moonshot.cn'),
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL, 'https://api.openai.com'),

  // Workspace and tools
  WORKSPACE_ROOT: workspaceRoot,
  AGENT_DATA_DIR: path.resolve(workspaceRoot, strEnv(process.env.AGENT_DATA_DIR, '.agent')),
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  SHELL_EXEC_ENABLED: process.env.SHELL_EXEC_ENABLED === 'true', // Default false for security

  // Execution limits
  TOOL_TIMEOUT_SECONDS: parseToolTimeout(process.env.TOOL_TIMEOUT_SECONDS),
  TOOL_READ_CONCURRENCY: parsePositiveInt(process.env.TOOL_READ_CONCURRENCY, 4, 'TOOL_READ_CONCURRENCY'),
  MAX_WORKER_TOOL_ITERATIONS: parsePositiveInt(process.env.MAX_WORKER_TOOL_ITERATIONS, 12, 'MAX_WORKER_TOOL_ITERATIONS'),
  MAX_REVIEW_ITERATIONS: parsePositiveInt(process.env.MAX_REVIEW_ITERATIONS, 3, 'MAX_REVIEW_ITERATIONS'),
  MAX_VERIFY_ITERATIONS: parsePositiveInt(process.env.MAX_VERIFY_ITERATIONS, 3, 'MAX_VERIFY_ITERATIONS'),
  VERIFY_ALLOWED_PREFIXES: parseList(process.env.VERIFY_ALLOWED_PREFIXES, DEFAULT_VERIFY_ALLOWED_PREFIXES),

  // Context folding
  FOLD_MAX_MESSAGES: parsePositiveInt(process.env.FOLD_MAX_MESSAGES, 120, 'FOLD_MAX_MESSAGES'),
  FOLD_MAX_CHARACTERS: parsePositiveInt(process.env.FOLD_MAX_CHARACTERS, 120000, 'FOLD_MAX_CHARACTERS'),
  FOLD_PRESERVE_RECENT: parsePositiveInt(process.env.FOLD_PRESERVE_RECENT, 20, 'FOLD_PRESERVE_RECENT'),

  // Security
  AUTH_ENFORCEMENT_ENABLED: process.env.AUTH_ENFORCEMENT_ENABLED === 'true',
  API_TOKEN: strEnv(process.env.API_TOKEN),
  RATE_LIMITING_ENABLED: process.env.RATE_LIMITING_ENABLED === 'true',
  RATE_LIMIT_WINDOW_MS: parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 60000, 'RATE_LIMIT_WINDOW_MS'),
  RATE_LIMIT_RUN_PER_WINDOW: parsePositiveInt(process.env.RATE_LIMIT_RUN_PER_WINDOW, 8, 'RATE_LIMIT_RUN_PER_WINDOW'),
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'deepseek':
      return !!env.DEEPSEEK_API_KEY;
    case 'moonshot':
      return !!env.MOONSHOT_API_KEY;
    case 'openai':
      return !!env.OPENAI_API_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(): string[] {
  const providers = ['deepseek', 'moonshot', 'openai'];
  return providers.filter(isProviderConfigured);
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  console.log('Agent Orchestration API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Configured providers: ${configured.join(', ') || 'none'}`);
  console.log(`  Inference: ${env.INFERENCE_PROVIDER} / ${env.INFERENCE_MODEL}`);
  console.log(`  Workspace: ${env.WORKSPACE_ROOT}`);
  console.log(`  Tools enabled: ${env.TOOLS_ENABLED}`);
  if (env.SHELL_EXEC_ENABLED) {
    console.log(`  ⚠️  SHELL EXECUTION ENABLED - Use with caution!`);
  }
  console.log(`  Tool timeout: ${env.TOOL_TIMEOUT_SECONDS}s, read concurrency: ${env.TOOL_READ_CONCURRENCY}`);
  console.log(
    `  Phase caps: worker=${env.MAX_WORKER_TOOL_ITERATIONS} review=${env.MAX_REVIEW_ITERATIONS} verify=${env.MAX_VERIFY_ITERATIONS}`,
  );
  console.log(`  Auth enforcement: ${env.AUTH_ENFORCEMENT_ENABLED} (API token ${env.API_TOKEN ? 'set' : 'not set'})`);
  if (env.AUTH_ENFORCEMENT_ENABLED && !env.API_TOKEN) {
    console.log(`  ⚠️  AUTH ENFORCED WITHOUT API_TOKEN - every mutating request will be rejected`);
  }
  console.log(`  Rate limiting: ${env.RATE_LIMITING_ENABLED ? `${env.RATE_LIMIT_RUN_PER_WINDOW} runs / ${env.RATE_LIMIT_WINDOW_MS}ms` : 'off'}`);
}

// Structured logging for services outside the Fastify request scope.
// Fastify keeps its own pino instance for the HTTP layer.

import pino, { type Logger, type LoggerOptions } from 'pino';
import { env } from './env.js';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
  base?: Record<string, unknown>;
}

const isTestRun = env.NODE_ENV === 'test' || process.env.VITEST === 'true';

const DEFAULT_CONFIG: LoggerConfig = {
  level: isTestRun ? 'silent' : env.LOG_LEVEL,
  pretty: !isTestRun && env.NODE_ENV !== 'production',
  base: { service: 'agent-orchestration-api' },
};

export function createLogger(config?: LoggerConfig): Logger {
  const merged = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base,
  };

  if (merged.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(options);
}

export const rootLogger = createLogger();

export function getLogger(module: string): Logger {
  return rootLogger.child({ module });
}

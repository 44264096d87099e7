import crypto from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../env.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

function headerValue(header: string | string[] | undefined): string {
  return (Array.isArray(header) ? header[0] ?? '' : header ?? '').trim();
}

function digest(value: string): Buffer {
  return crypto.createHash('sha256').update(value).digest();
}

/** Token from `x-api-token`, else from `Authorization: Bearer <token>`. */
export function extractAuthToken(request: FastifyRequest): string {
  const direct = headerValue(request.headers['x-api-token']);
  if (direct) return direct;

  const match = /^Bearer\s+(\S+)$/i.exec(headerValue(request.headers.authorization));
  return match ? match[1] : '';
}

/** Constant-time comparison; digests keep both sides the same length. */
export function tokenMatches(presented: string, expected: string): boolean {
  if (!presented || !expected) return false;
  return crypto.timingSafeEqual(digest(presented), digest(expected));
}

export function requireAuthIfEnabled(request: FastifyRequest, reply: FastifyReply): boolean {
  if (!env.AUTH_ENFORCEMENT_ENABLED) return true;

  const token = extractAuthToken(request);
  if (tokenMatches(token, env.API_TOKEN)) return true;

  const error = token ? AppError.unauthorized('Invalid API token') : AppError.unauthorized('Missing API token');
  reply.code(401).send(formatErrorResponse(error));
  return false;
}

interface RunWindow {
  used: number;
  resetAt: number;
}

// Keyed by route and client; expired windows are swept once the map grows
const runWindows = new Map<string, RunWindow>();
const SWEEP_THRESHOLD = 5000;

function sweepExpired(now: number): void {
  if (runWindows.size < SWEEP_THRESHOLD) return;
  for (const [key, window] of runWindows) {
    if (window.resetAt <= now) runWindows.delete(key);
  }
}

/** Authenticated clients are limited per token, others per socket address. */
function clientKey(request: FastifyRequest): string {
  const token = extractAuthToken(request);
  return token ? `token:${digest(token).toString('hex').slice(0, 16)}` : `ip:${request.ip}`;
}

export interface RateLimitOptions {
  routeKey: string;
  maxRequests: number;
}

export function enforceRateLimitIfEnabled(
  request: FastifyRequest,
  reply: FastifyReply,
  options: RateLimitOptions,
): boolean {
  if (!env.RATE_LIMITING_ENABLED) return true;

  const now = Date.now();
  sweepExpired(now);

  const key = `${options.routeKey}:${clientKey(request)}`;
  const window = runWindows.get(key);
  if (!window || window.resetAt <= now) {
    runWindows.set(key, { used: 1, resetAt: now + env.RATE_LIMIT_WINDOW_MS });
    return true;
  }

  if (window.used < options.maxRequests) {
    window.used += 1;
    return true;
  }

  const retryAfterSeconds = Math.max(1, Math.ceil((window.resetAt - now) / 1000));
  reply.header('Retry-After', String(retryAfterSeconds));
  reply.code(429).send({
    error: 'rate_limited',
    message: 'Too many runs. Please try again later.',
    retry_after_seconds: retryAfterSeconds,
  });
  return false;
}

export function resetRateLimits(): void {
  runWindows.clear();
}

// Text tool-call parser
// Some models describe tool calls in prose instead of returning native calls,
// either as ```json fenced blocks or inline {"tool": ..., "args": ...} objects.

import { randomUUID } from 'crypto';
import { isJsonObject, jsonValueSchema, parseJsonObject, type JsonObject } from '../../utils/json-value.js';
import { getLogger } from '../../logger.js';
import type { ToolCall } from './types.js';

const log = getLogger('tool-call-parser');

/** Reads the balanced {...} object starting at `start`, respecting strings. */
export function extractJsonObjectAt(text: string, start: number): string | null {
  if (text[start] !== '{') return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function toCallSpec(candidate: JsonObject): { name: string; args: JsonObject } | null {
  const name = candidate.tool ?? candidate.name;
  if (typeof name !== 'string' || !name.trim()) return null;

  const rawArgs = candidate.args ?? candidate.arguments ?? {};
  if (isJsonObject(rawArgs)) return { name: name.trim(), args: rawArgs };
  if (typeof rawArgs === 'string') {
    const parsed = parseJsonObject(rawArgs);
    return parsed ? { name: name.trim(), args: parsed } : null;
  }
  return null;
}

function parseCandidate(raw: string): JsonObject | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = jsonValueSchema.safeParse(value);
  return result.success && isJsonObject(result.data) ? result.data : null;
}

export function parseToolCallsFromResponse(response: string, knownTools?: readonly string[]): ToolCall[] {
  const known = knownTools ? new Set(knownTools) : undefined;
  const specs: { name: string; args: JsonObject }[] = [];

  const cleaned = response.replace(/<reasoning>[\s\S]*?<\/reasoning>/gi, '').trim();

  const accept = (raw: string) => {
    const candidate = parseCandidate(raw);
    const spec = candidate ? toCallSpec(candidate) : null;
    if (spec && (!known || known.has(spec.name))) {
      specs.push(spec);
    }
  };

  const fenced = cleaned.matchAll(/```json\s*([\s\S]*?)```/g);
  for (const match of fenced) {
    const body = match[1].trim();
    const start = body.indexOf('{');
    const raw = start === -1 ? null : extractJsonObjectAt(body, start);
    if (raw) accept(raw);
  }

  if (specs.length === 0) {
    const inline = /\{\s*"(?:tool|name)"\s*:/g;
    let match: RegExpExecArray | null;
    while ((match = inline.exec(cleaned)) !== null) {
      const raw = extractJsonObjectAt(cleaned, match.index);
      if (raw) {
        accept(raw);
        inline.lastIndex = match.index + raw.length;
      }
    }
  }

  if (specs.length > 0) {
    log.debug({ count: specs.length, tools: specs.map(s => s.name) }, 'Extracted tool calls from text');
  }

  // Ids must stay unique across responses and conversations
  return specs.map(spec => ({
    id: `text_${randomUUID()}`,
    name: spec.name,
    arguments: spec.args,
  }));
}

// Reasoning-block heuristics and the correction prompts built on them.

import { createMessage } from './messages.js';
import type { ChatMessage } from './types.js';

export const REASONING_OPEN_TAG = '<reasoning>';
export const REASONING_CLOSE_TAG = '</reasoning>';

export const REQUIRED_REASONING_SECTIONS = ['analyze', 'research', 'plan', 'reflect'] as const;

export interface SplitContent {
  content: string;
  reasoning?: string;
}

/** Pulls the reasoning block out of a model reply. */
export function splitReasoning(text: string): SplitContent {
  const start = text.indexOf(REASONING_OPEN_TAG);
  if (start === -1) {
    return { content: text.trim() };
  }

  const bodyStart = start + REASONING_OPEN_TAG.length;
  const end = text.indexOf(REASONING_CLOSE_TAG, bodyStart);
  const reasoning = (end === -1 ? text.slice(bodyStart) : text.slice(bodyStart, end)).trim();
  const rest = end === -1 ? '' : text.slice(end + REASONING_CLOSE_TAG.length);
  const content = (text.slice(0, start) + rest).trim();

  return reasoning ? { content, reasoning } : { content };
}

export function needsReasoningFormatCorrection(text: string | undefined): boolean {
  if (!text) return false;
  const { reasoning } = splitReasoning(text);
  if (!reasoning) return false;
  const lower = reasoning.toLowerCase();
  return REQUIRED_REASONING_SECTIONS.some(section => !lower.includes(`${section}:`));
}

const PLACEHOLDER_TOKENS = new Set(['...', '…', 'n/a', 'na', 'none', 'nil']);
const MIN_SECTION_LENGTH = 6;

function parseSections(reasoning: string): Map<string, string> {
  const sections = new Map<string, string>();
  let current: string | undefined;

  for (const line of reasoning.split('\n')) {
    const trimmed = line.trim();
    const match = /^(analyze|research|plan|reflect)\s*:(.*)$/i.exec(trimmed);
    if (match) {
      current = match[1].toLowerCase();
      sections.set(current, match[2].trim());
    } else if (current && trimmed) {
      sections.set(current, `${sections.get(current) ?? ''} ${trimmed}`.trim());
    }
  }

  return sections;
}

function isConcrete(section: string): boolean {
  const normalized = section.trim().toLowerCase();
  if (PLACEHOLDER_TOKENS.has(normalized)) return false;
  const meaningful = normalized.replace(/[.…\s]/g, '');
  return meaningful.length >= MIN_SECTION_LENGTH;
}

/** True when the reasoning block is missing, placeholder text, or too thin. */
export function isLowQualityReasoning(text: string | undefined): boolean {
  if (!text) return false;
  const { reasoning } = splitReasoning(text);
  if (!reasoning) return false;

  const sections = parseSections(reasoning);
  if (sections.size === 0) return true;

  let concrete = 0;
  for (const body of sections.values()) {
    if (isConcrete(body)) concrete++;
  }
  return concrete < 2;
}

export const FORCE_TOOL_TRIGGER_PHRASES = [
  'i will implement',
  "i'll implement",
  'i will update',
  "i'll update",
  'i will patch',
  "i'll patch",
  'i will fix',
  "i'll fix",
  'i am going to implement',
  "i'm going to implement",
  'next i will',
  'now i will',
];

/** The reply announces edits it did not make. */
export function shouldForceToolFollowup(text: string | undefined): boolean {
  if (!text) return false;
  const lower = text.toLowerCase().replace(/’/g, "'");
  return FORCE_TOOL_TRIGGER_PHRASES.some(phrase => lower.includes(phrase));
}

export const FORCE_TOOL_FOLLOWUP_PROMPT =
  'You indicated you will implement changes, but you returned no tool calls. In Agent mode, you MUST now proceed by calling the appropriate tools. Return tool calls now.';

export const REASONING_FORMAT_PROMPT =
  `Your reasoning block is missing required sections. Reply again with a ${REASONING_OPEN_TAG}...${REASONING_CLOSE_TAG} block containing the lines "Analyze:", "Research:", "Plan:" and "Reflect:", followed by your answer. Do not call tools.`;

export const REASONING_QUALITY_PROMPT =
  'Your reasoning was placeholder text or too thin. Rewrite it with concrete statements about this request in at least two of the Analyze, Research, Plan and Reflect sections, then give your answer. Do not call tools.';

export function withCorrection(messages: ChatMessage[], prompt: string, lastUser?: ChatMessage): ChatMessage[] {
  const corrected = [...messages, createMessage('system', prompt)];
  return lastUser ? [...corrected, lastUser] : corrected;
}

// Context folding: when a transcript grows past its thresholds, the oldest
// messages are replaced by one generated summary.

import { randomUUID } from 'crypto';
import { getLogger } from '../../logger.js';
import { createMessage } from '../orchestrator/messages.js';
import type { ChatMessage } from '../orchestrator/types.js';
import type { ConversationHistory } from './history.js';
import type { FoldStore } from './fold-store.js';

export interface FoldingThresholds {
  maxMessageCount: number;
  maxContentCharacters: number;
  preserveMostRecentMessages: number;
}

export const DEFAULT_FOLDING_THRESHOLDS: FoldingThresholds = {
  maxMessageCount: 120,
  maxContentCharacters: 120_000,
  preserveMostRecentMessages: 20,
};

const log = getLogger('context-folding');

const SNIPPET_LENGTH = 160;

export function totalCharacters(messages: readonly ChatMessage[]): number {
  return messages.reduce((sum, m) => sum + m.content.length + (m.reasoning?.length ?? 0), 0);
}

export function shouldFold(messages: readonly ChatMessage[], thresholds: FoldingThresholds = DEFAULT_FOLDING_THRESHOLDS): boolean {
  return messages.length > thresholds.maxMessageCount || totalCharacters(messages) > thresholds.maxContentCharacters;
}

/**
 * Number of leading messages to fold. The boundary moves forward past tool
 * results so none is separated from the assistant message that requested it.
 */
export function foldBoundary(messages: readonly ChatMessage[], preserve: number): number {
  let boundary = Math.max(0, messages.length - Math.max(0, preserve));
  while (boundary < messages.length && messages[boundary].role === 'tool') {
    boundary++;
  }
  return boundary;
}

function snippet(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > SNIPPET_LENGTH ? `${flat.slice(0, SNIPPET_LENGTH)}…` : flat;
}

export function summarizeMessages(messages: readonly ChatMessage[]): string {
  const first = messages[0];
  const last = messages[messages.length - 1];
  const lines = [
    'Context summary (auto-generated):',
    `Folded ${messages.length} messages (${first?.createdAt ?? '?'} → ${last?.createdAt ?? '?'}).`,
  ];

  const userTopics = messages
    .filter(m => m.role === 'user' && m.content.trim())
    .slice(0, 5)
    .map(m => snippet(m.content));
  if (userTopics.length > 0) {
    lines.push('', `User topics: ${userTopics.join(' | ')}`);
  }

  const assistantNotes = messages
    .filter(m => m.role === 'assistant' && m.content.trim())
    .slice(0, 3)
    .map(m => `- ${snippet(m.content)}`);
  if (assistantNotes.length > 0) {
    lines.push('', 'Assistant:', ...assistantNotes);
  }

  const toolActivity = messages
    .filter(m => m.role === 'tool' && m.tool)
    .slice(0, 8)
    .map(m => `- ${m.tool?.toolName} (${m.tool?.toolCallId}) [${m.tool?.status}]`);
  if (toolActivity.length > 0) {
    lines.push('', 'Tool activity:', ...toolActivity);
  }

  return lines.join('\n');
}

export interface FoldOptions {
  thresholds?: FoldingThresholds;
  store?: FoldStore;
}

export interface FoldResult {
  foldId: string;
  foldedCount: number;
  summary: ChatMessage;
}

/** Folds the history in place when it exceeds its thresholds. */
export async function foldConversation(history: ConversationHistory, options: FoldOptions = {}): Promise<FoldResult | null> {
  const thresholds = options.thresholds ?? DEFAULT_FOLDING_THRESHOLDS;
  const messages = history.messages;
  if (!shouldFold(messages, thresholds)) return null;

  const boundary = foldBoundary(messages, thresholds.preserveMostRecentMessages);
  if (boundary < 2) return null;

  const folded = messages.slice(0, boundary);
  const summaryText = summarizeMessages(folded);
  const summary = createMessage('system', summaryText);
  const foldId = randomUUID();

  if (options.store) {
    try {
      await options.store.save({
        foldId,
        conversationId: history.id,
        createdAt: summary.createdAt,
        summary: summaryText,
        messages: folded,
      });
    } catch (error) {
      log.warn({ err: error, conversationId: history.id }, 'Failed to persist folded messages');
    }
  }

  history.replaceOldestMessages(boundary, summary);
  log.info({ conversationId: history.id, foldId, foldedCount: boundary }, 'chat.context_folded');

  return { foldId, foldedCount: boundary, summary };
}

// Append-only event log for conversations.
// Writes are best effort: a failing sink is logged and never fails the turn.

import { appendFile, mkdir } from 'fs/promises';
import * as path from 'path';
import { getLogger, type Logger } from '../../logger.js';

export interface ConversationLogEvent {
  type: string;
  conversationId?: string;
  data?: Record<string, unknown>;
}

export interface ConversationLogSink {
  append(event: ConversationLogEvent): Promise<void>;
}

export const noopConversationLog: ConversationLogSink = {
  append: async () => undefined,
};

const log = getLogger('conversation-log');

export async function appendSafely(
  sink: ConversationLogSink,
  event: ConversationLogEvent,
  logger: Logger = log,
): Promise<void> {
  try {
    await sink.append(event);
  } catch (error) {
    logger.warn({ err: error, event: event.type }, 'Conversation log append failed');
  }
}

/** One JSONL file per conversation under `directory`. */
export class JsonlConversationLog implements ConversationLogSink {
  private ensured = false;

  constructor(private readonly directory: string) {}

  async append(event: ConversationLogEvent): Promise<void> {
    const line = JSON.stringify({ ts: new Date().toISOString(), ...event });
    const file = path.join(this.directory, `${event.conversationId ?? 'global'}.jsonl`);

    try {
      if (!this.ensured) {
        await mkdir(this.directory, { recursive: true });
        this.ensured = true;
      }
      await appendFile(file, `${line}\n`, 'utf-8');
    } catch (error) {
      log.warn({ err: error, file }, 'Failed to append conversation log entry');
    }
  }
}

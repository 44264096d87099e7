// Conversation History Coordinator
// The single owner of one conversation's transcript. Every mutation goes
// through here and is announced to subscribers synchronously.

import { randomUUID } from 'crypto';
import type { ChatMessage, ToolExecutionStatus } from '../orchestrator/types.js';
import { decodeEnvelope } from '../orchestrator/messages.js';

export type HistoryEvent =
  | { type: 'appended'; message: ChatMessage; index: number }
  | { type: 'updated'; message: ChatMessage; index: number }
  | { type: 'replaced'; removed: number; message: ChatMessage }
  | { type: 'cleared' };

export type HistoryListener = (event: HistoryEvent) => void;

export class ConversationHistory {
  readonly id: string;
  readonly createdAt: string;
  private items: ChatMessage[] = [];
  private readonly listeners = new Set<HistoryListener>();

  constructor(id: string = randomUUID(), initial: ChatMessage[] = []) {
    this.id = id;
    this.createdAt = new Date().toISOString();
    this.items = [...initial];
  }

  get messages(): ChatMessage[] {
    return [...this.items];
  }

  get length(): number {
    return this.items.length;
  }

  subscribe(listener: HistoryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  append(message: ChatMessage): void {
    this.items.push(message);
    this.emit({ type: 'appended', message, index: this.items.length - 1 });
  }

  /** Replaces the latest message for the same tool call, or appends. */
  upsertToolExecutionMessage(message: ChatMessage): void {
    const toolCallId = message.tool?.toolCallId;
    const index = toolCallId ? this.lastIndexOfToolCall(toolCallId) : -1;
    if (index === -1) {
      this.append(message);
      return;
    }

    const updated = { ...message, id: this.items[index].id };
    this.items[index] = updated;
    this.emit({ type: 'updated', message: updated, index });
  }

  /**
   * Rewrites the status of the latest message for a tool call. The JSON
   * envelope in its content is kept in sync. Returns false when no message
   * exists for the id.
   */
  updateMessageStatus(toolCallId: string, status: ToolExecutionStatus, content?: string): boolean {
    const index = this.lastIndexOfToolCall(toolCallId);
    if (index === -1) return false;

    const current = this.items[index];
    const tool = current.tool;
    if (!tool) return false;

    let nextContent = current.content;
    const envelope = decodeEnvelope(current.content);
    if (envelope) {
      const next = { ...envelope, status };
      if (content !== undefined) {
        next.message = content;
        if (status === 'failed') delete next.payload;
      }
      nextContent = JSON.stringify(next);
    } else if (content !== undefined) {
      nextContent = content;
    }

    const updated: ChatMessage = { ...current, content: nextContent, tool: { ...tool, status } };
    this.items[index] = updated;
    this.emit({ type: 'updated', message: updated, index });
    return true;
  }

  /** Swaps the `count` oldest messages for a single message. */
  replaceOldestMessages(count: number, message: ChatMessage): void {
    const removed = Math.max(0, Math.min(count, this.items.length));
    this.items = [message, ...this.items.slice(removed)];
    this.emit({ type: 'replaced', removed, message });
  }

  lastUserMessage(): ChatMessage | undefined {
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (this.items[i].role === 'user') return this.items[i];
    }
    return undefined;
  }

  findToolMessage(toolCallId: string): ChatMessage | undefined {
    const index = this.lastIndexOfToolCall(toolCallId);
    return index === -1 ? undefined : this.items[index];
  }

  clear(): void {
    this.items = [];
    this.emit({ type: 'cleared' });
  }

  private lastIndexOfToolCall(toolCallId: string): number {
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (this.items[i].role === 'tool' && this.items[i].tool?.toolCallId === toolCallId) {
        return i;
      }
    }
    return -1;
  }

  private emit(event: HistoryEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import type { ChatMessage } from '../orchestrator/types.js';

export interface FoldRecord {
  foldId: string;
  conversationId: string;
  createdAt: string;
  summary: string;
  messages: ChatMessage[];
}

export interface FoldStore {
  save(record: FoldRecord): Promise<void>;
}

/** Keeps folded messages on disk under `<directory>/<conversationId>/<foldId>.json`. */
export class ConversationFoldStore implements FoldStore {
  constructor(private readonly directory: string) {}

  async save(record: FoldRecord): Promise<void> {
    const dir = path.join(this.directory, record.conversationId);
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(dir, `${record.foldId}.json`), JSON.stringify(record, null, 2), 'utf-8');
  }
}

import { describe, it, expect } from 'vitest';
import { createMessage, decodeEnvelope, makeToolExecutionMessage } from '../../orchestrator/messages.js';
import { ConversationHistory, type HistoryEvent } from '../history.js';

function toolMessage(toolCallId: string, status: 'executing' | 'completed' | 'failed', content: string) {
  return makeToolExecutionMessage({ content, status, toolName: 'read_file', toolCallId, targetFile: 'a.ts' });
}

describe('ConversationHistory', () => {
  it('should announce appended messages with their index', () => {
    const history = new ConversationHistory('conv-1');
    const events: HistoryEvent[] = [];
    history.subscribe(event => events.push(event));

    const user = createMessage('user', 'hello');
    history.append(user);

    expect(events).toEqual([{ type: 'appended', message: user, index: 0 }]);
  });

  it('should hand out copies of the transcript', () => {
    const history = new ConversationHistory('conv-1', [createMessage('user', 'hello')]);

    history.messages.pop();

    expect(history.length).toBe(1);
  });

  it('should replace the message for the same tool call and keep its id', () => {
    const history = new ConversationHistory('conv-1');
    const placeholder = toolMessage('t1', 'executing', 'Executing read_file...');
    history.append(placeholder);

    history.upsertToolExecutionMessage(toolMessage('t1', 'completed', 'file body'));

    expect(history.length).toBe(1);
    const [stored] = history.messages;
    expect(stored.id).toBe(placeholder.id);
    expect(stored.tool?.status).toBe('completed');
    expect(decodeEnvelope(stored.content)?.payload).toBe('file body');
  });

  it('should append when no message exists for the tool call', () => {
    const history = new ConversationHistory('conv-1');
    history.upsertToolExecutionMessage(toolMessage('t1', 'executing', ''));
    history.upsertToolExecutionMessage(toolMessage('t2', 'executing', ''));

    expect(history.messages.map(m => m.tool?.toolCallId)).toEqual(['t1', 't2']);
  });

  it('should rewrite status and envelope together', () => {
    const history = new ConversationHistory('conv-1');
    history.append(toolMessage('t1', 'executing', 'partial output'));

    expect(history.updateMessageStatus('t1', 'failed', 'Cancelled by user')).toBe(true);

    const stored = history.findToolMessage('t1');
    expect(stored?.tool?.status).toBe('failed');
    expect(decodeEnvelope(stored?.content ?? '')).toEqual({
      status: 'failed',
      message: 'Cancelled by user',
      toolName: 'read_file',
      toolCallId: 't1',
      targetFile: 'a.ts',
    });
  });

  it('should report unknown tool calls on status updates', () => {
    const history = new ConversationHistory('conv-1');
    expect(history.updateMessageStatus('missing', 'failed')).toBe(false);
  });

  it('should swap the oldest messages for one message', () => {
    const history = new ConversationHistory('conv-1', [
      createMessage('user', 'one'),
      createMessage('assistant', 'two'),
      createMessage('user', 'three'),
    ]);
    const events: HistoryEvent[] = [];
    history.subscribe(event => events.push(event));
    const summary = createMessage('system', 'summary');

    history.replaceOldestMessages(2, summary);

    expect(history.messages.map(m => m.content)).toEqual(['summary', 'three']);
    expect(events).toEqual([{ type: 'replaced', removed: 2, message: summary }]);
  });

  it('should find the latest user message', () => {
    const history = new ConversationHistory('conv-1', [
      createMessage('user', 'first'),
      createMessage('user', 'second'),
      createMessage('assistant', 'reply'),
    ]);
    expect(history.lastUserMessage()?.content).toBe('second');
  });

  it('should stop notifying after unsubscribe', () => {
    const history = new ConversationHistory('conv-1');
    const events: HistoryEvent[] = [];
    const unsubscribe = history.subscribe(event => events.push(event));

    unsubscribe();
    history.append(createMessage('user', 'hello'));
    history.clear();

    expect(events).toEqual([]);
    expect(history.length).toBe(0);
  });
});

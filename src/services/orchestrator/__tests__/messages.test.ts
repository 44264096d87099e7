import { describe, it, expect } from 'vitest';
import { createMessage, decodeEnvelope, makeToolExecutionMessage } from '../messages.js';

describe('Tool execution messages', () => {
  const base = { toolName: 'read_file', toolCallId: 'c1' };

  it('should describe each status in the envelope', () => {
    const executing = makeToolExecutionMessage({ ...base, content: '', status: 'executing' });
    const completed = makeToolExecutionMessage({ ...base, content: 'body', status: 'completed' });
    const empty = makeToolExecutionMessage({ ...base, content: '  ', status: 'completed' });
    const failed = makeToolExecutionMessage({ ...base, content: '', status: 'failed' });

    expect(decodeEnvelope(executing.content)).toEqual({ status: 'executing', message: 'Tool execution in progress.', ...base });
    expect(decodeEnvelope(completed.content)).toEqual({
      status: 'completed',
      message: 'Tool completed successfully.',
      payload: 'body',
      ...base,
    });
    expect(decodeEnvelope(empty.content)?.message).toBe('Tool completed with no payload.');
    expect(decodeEnvelope(failed.content)?.message).toBe('Tool failed with no error details.');
  });

  it('should carry the target file and preview', () => {
    const message = makeToolExecutionMessage({
      ...base,
      content: 'done',
      status: 'completed',
      targetFile: 'src/a.ts',
      preview: 'Read file: src/a.ts',
    });

    expect(message.role).toBe('tool');
    expect(message.tool).toEqual({ toolName: 'read_file', status: 'completed', targetFile: 'src/a.ts', toolCallId: 'c1' });
    expect(decodeEnvelope(message.content)).toMatchObject({ targetFile: 'src/a.ts', preview: 'Read file: src/a.ts' });
  });

  it('should not decode arbitrary text', () => {
    expect(decodeEnvelope('plain text')).toBeNull();
    expect(decodeEnvelope('{"status":"weird"}')).toBeNull();
  });

  it('should only attach non-empty extras', () => {
    const message = createMessage('assistant', 'hi', { reasoning: '', toolCalls: [] });

    expect('reasoning' in message).toBe(false);
    expect('toolCalls' in message).toBe(false);
  });
});

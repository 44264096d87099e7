import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { InferenceError } from '../../../utils/errors.js';
import { AIInteractionGateway, MAX_ATTEMPTS, RETRY_DELAY_MS } from '../gateway.js';
import { createMessage } from '../messages.js';
import type { SendRequest } from '../gateway.js';
import { ScriptedBackend, StaticContextBuilder } from './helpers.js';

function request(overrides: Partial<SendRequest> = {}): SendRequest {
  return {
    messages: [createMessage('user', 'rename the config loader'), createMessage('assistant', 'on it')],
    explicitContext: 'src/config.ts is open',
    tools: [],
    mode: 'agent',
    projectRoot: '/workspace',
    ...overrides,
  };
}

describe('AIInteractionGateway', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return the first successful response without retrying', async () => {
    const backend = new ScriptedBackend([{ content: 'hello' }]);
    const gateway = new AIInteractionGateway({ backend, contextBuilder: new StaticContextBuilder('ctx') });

    await expect(gateway.sendWithRetry(request())).resolves.toEqual({ content: 'hello' });
    expect(backend.requests).toHaveLength(1);
    expect(backend.requests[0].context).toBe('ctx');
  });

  it('should build the context from the latest user message and explicit context', async () => {
    const backend = new ScriptedBackend([{ content: 'ok' }]);
    const context = new StaticContextBuilder();
    const gateway = new AIInteractionGateway({ backend, contextBuilder: context });

    await gateway.sendWithRetry(request());

    expect(context.requests).toEqual([
      { userInput: 'rename the config loader', explicitContext: 'src/config.ts is open', projectRoot: '/workspace' },
    ]);
  });

  it('should retry with a two second pause and rebuild the context each attempt', async () => {
    const backend = new ScriptedBackend([new Error('502 bad gateway'), new Error('timeout'), { content: 'third time' }]);
    const context = new StaticContextBuilder();
    const gateway = new AIInteractionGateway({ backend, contextBuilder: context });

    const pending = gateway.sendWithRetry(request());

    await vi.advanceTimersByTimeAsync(0);
    expect(backend.requests).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(RETRY_DELAY_MS - 1);
    expect(backend.requests).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(backend.requests).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(RETRY_DELAY_MS);
    await expect(pending).resolves.toEqual({ content: 'third time' });
    expect(backend.requests).toHaveLength(3);
    expect(context.requests).toHaveLength(3);
  });

  it('should give up after three attempts with an InferenceError', async () => {
    const backend = new ScriptedBackend([new Error('down'), new Error('down'), new Error('still down'), { content: 'late' }]);
    const gateway = new AIInteractionGateway({ backend, contextBuilder: new StaticContextBuilder() });

    const pending = gateway.sendWithRetry(request());
    const assertion = expect(pending).rejects.toThrow(InferenceError);
    await vi.advanceTimersByTimeAsync(2 * RETRY_DELAY_MS);
    await assertion;

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InferenceError);
    if (error instanceof InferenceError) {
      expect(error.attempts).toBe(MAX_ATTEMPTS);
      expect(error.message).toBe('Inference failed after 3 attempts: still down');
    }
    expect(backend.requests).toHaveLength(3);
  });

  it('should not retry once the signal is aborted', async () => {
    const controller = new AbortController();
    const backend = new ScriptedBackend([
      () => {
        controller.abort();
        throw new Error('request aborted');
      },
    ]);
    const gateway = new AIInteractionGateway({ backend, contextBuilder: new StaticContextBuilder() });

    await expect(gateway.sendWithRetry(request({ signal: controller.signal }))).rejects.toThrow('request aborted');
    expect(backend.requests).toHaveLength(1);
  });
});

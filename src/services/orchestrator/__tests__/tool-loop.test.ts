import { describe, it, expect } from 'vitest';
import type { ConversationLogEvent } from '../../conversation/conversation-log.js';
import { createMessage } from '../messages.js';
import { parseToolCallsFromResponse } from '../parser.js';
import { FORCE_TOOL_FOLLOWUP_PROMPT, REASONING_FORMAT_PROMPT } from '../reasoning.js';
import { runBoundedToolLoop, ToolLoopRunner } from '../tool-loop.js';
import type { ChatMessage } from '../types.js';
import { callsResponse, createHarness, envelopeOf, fakeTool, toolCall } from './helpers.js';

function endlessToolCalls(count: number) {
  return Array.from({ length: count }, (_, i) => callsResponse(toolCall(`c${i}`, 'alpha')));
}

function countingTool() {
  const counter = { runs: 0 };
  const tool = fakeTool('alpha', async () => {
    counter.runs++;
    return `run ${counter.runs}`;
  });
  return { tool, counter };
}

describe('runBoundedToolLoop', () => {
  it('should stop when the response has no tool calls', async () => {
    const recorded: ChatMessage[] = [];
    const outcome = await runBoundedToolLoop({
      initial: { content: 'nothing to do' },
      maxIterations: 5,
      execute: async () => [],
      record: (message) => recorded.push(message),
      resend: async () => ({ content: 'unused' }),
    });

    expect(outcome).toEqual({ response: { content: 'nothing to do' }, iterations: 0, pendingToolCalls: 0 });
    expect(recorded).toEqual([]);
  });

  it('should report the calls left pending at the cap', async () => {
    const outcome = await runBoundedToolLoop({
      initial: callsResponse(toolCall('a', 'alpha')),
      maxIterations: 2,
      execute: async () => [],
      record: () => undefined,
      resend: async () => callsResponse(toolCall('b', 'alpha'), toolCall('c', 'alpha')),
    });

    expect(outcome.iterations).toBe(2);
    expect(outcome.pendingToolCalls).toBe(2);
  });
});

describe('ToolLoopRunner', () => {
  it('should execute tools and re-send until the model answers', async () => {
    const { tool } = countingTool();
    const h = createHarness([callsResponse(toolCall('c1', 'alpha')), { content: 'All done.' }]);
    h.history.append(createMessage('user', 'do the thing'));

    const result = await h.runner.run({
      history: h.history,
      mode: 'agent',
      availableTools: [tool],
      projectRoot: '/workspace',
    });

    expect(result.iterations).toBe(1);
    expect(result.hitIterationCap).toBe(false);
    expect(result.finalMessage.content).toBe('All done.');
    expect(h.history.messages.map(m => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant']);
  });

  it('should replace the executing placeholder with the terminal message', async () => {
    const { tool } = countingTool();
    const h = createHarness([callsResponse(toolCall('c1', 'alpha')), { content: 'ok' }]);
    h.history.append(createMessage('user', 'go'));

    await h.runner.run({ history: h.history, mode: 'chat', availableTools: [tool], projectRoot: '/workspace' });

    const toolMessages = h.history.messages.filter(m => m.role === 'tool');
    expect(toolMessages).toHaveLength(1);
    expect(envelopeOf(toolMessages[0])).toMatchObject({ status: 'completed', payload: 'run 1', toolCallId: 'c1' });

    const resent = h.backend.requests[1].messages.filter(m => m.role === 'tool');
    expect(resent.map(m => m.tool?.status)).toEqual(['completed']);
  });

  it('should stop chat mode after five tool iterations', async () => {
    const { tool, counter } = countingTool();
    const h = createHarness(endlessToolCalls(20));
    h.history.append(createMessage('user', 'loop forever'));

    const result = await h.runner.run({ history: h.history, mode: 'chat', availableTools: [tool], projectRoot: '/workspace' });

    expect(counter.runs).toBe(5);
    expect(result.iterations).toBe(5);
    expect(result.hitIterationCap).toBe(true);
    expect(h.backend.requests).toHaveLength(6);
  });

  it('should stop agent mode after twelve tool iterations and log the cap', async () => {
    const { tool, counter } = countingTool();
    const h = createHarness(endlessToolCalls(20));
    const events: ConversationLogEvent[] = [];
    const runner = new ToolLoopRunner({
      gateway: h.gateway,
      executor: h.executor,
      log: { append: async (event) => { events.push(event); } },
    });
    h.history.append(createMessage('user', 'loop forever'));

    const result = await runner.run({ history: h.history, mode: 'agent', availableTools: [tool], projectRoot: '/workspace' });

    expect(counter.runs).toBe(12);
    expect(result.iterations).toBe(12);
    expect(result.hitIterationCap).toBe(true);
    expect(events).toEqual([
      {
        type: 'loop.iteration_cap',
        conversationId: 'conv-1',
        data: { iterations: 12, pendingToolCalls: 1 },
      },
    ]);
  });

  it('should force a tool follow-up when an agent reply announces unmade changes', async () => {
    const { tool, counter } = countingTool();
    const h = createHarness([
      { content: "I'll update the config loader next." },
      callsResponse(toolCall('c1', 'alpha')),
      { content: 'Updated.' },
    ]);
    h.history.append(createMessage('user', 'fix the loader'));

    const result = await h.runner.run({ history: h.history, mode: 'agent', availableTools: [tool], projectRoot: '/workspace' });

    expect(result.corrections).toEqual(['force_tool_followup']);
    expect(counter.runs).toBe(1);
    const followup = h.backend.requests[1].messages;
    expect(followup[followup.length - 2].content).toBe(FORCE_TOOL_FOLLOWUP_PROMPT);
    expect(followup[followup.length - 1].content).toBe('fix the loader');
    expect(result.finalMessage.content).toBe('Updated.');
  });

  it('should not force a follow-up in chat mode', async () => {
    const h = createHarness([{ content: "I'll update the config loader next." }]);
    h.history.append(createMessage('user', 'fix the loader'));

    const result = await h.runner.run({ history: h.history, mode: 'chat', availableTools: [], projectRoot: '/workspace' });

    expect(result.corrections).toEqual([]);
    expect(h.backend.requests).toHaveLength(1);
  });

  it('should re-ask once when the reasoning block misses sections', async () => {
    const fixed = [
      '<reasoning>',
      'Analyze: the loader reads the env file twice',
      'Research: checked every caller of loadConfig',
      'Plan: n/a',
      'Reflect: ...',
      '</reasoning>',
      'Fixed.',
    ].join('\n');
    const h = createHarness([{ content: '<reasoning>Analyze: quick look</reasoning>Answer' }, { content: fixed }]);
    h.history.append(createMessage('user', 'why is it slow?'));

    const result = await h.runner.run({ history: h.history, mode: 'chat', availableTools: [fakeTool('alpha')], projectRoot: '/workspace' });

    expect(result.corrections).toEqual(['reasoning_format']);
    expect(h.backend.requests[1].tools).toEqual([]);
    const correction = h.backend.requests[1].messages;
    expect(correction[correction.length - 1].content).toBe(REASONING_FORMAT_PROMPT);
    expect(result.finalMessage.content).toBe('Fixed.');
    expect(result.finalMessage.reasoning).toBe(
      'Analyze: the loader reads the env file twice\nResearch: checked every caller of loadConfig\nPlan: n/a\nReflect: ...',
    );
  });

  it('should re-ask once when the reasoning is placeholder text', async () => {
    const thin = '<reasoning>\nAnalyze: ...\nResearch: n/a\nPlan: none\nReflect: ok\n</reasoning>\nAnswer';
    const h = createHarness([{ content: thin }, { content: 'Plain answer' }]);
    h.history.append(createMessage('user', 'explain'));

    const result = await h.runner.run({ history: h.history, mode: 'chat', availableTools: [], projectRoot: '/workspace' });

    expect(result.corrections).toEqual(['reasoning_quality']);
    expect(result.finalMessage.content).toBe('Plain answer');
  });

  it('should keep one result per call when text-parsed calls repeat across iterations', async () => {
    const { tool, counter } = countingTool();
    const text = '```json\n{"tool": "alpha", "args": {}}\n```';
    const parsed = () => ({ content: text, toolCalls: parseToolCallsFromResponse(text, ['alpha']) });
    const h = createHarness([parsed, parsed, { content: 'Finished.' }]);
    h.history.append(createMessage('user', 'run alpha twice'));

    await h.runner.run({ history: h.history, mode: 'agent', availableTools: [tool], projectRoot: '/workspace' });

    expect(counter.runs).toBe(2);
    expect(h.history.messages.map(m => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant', 'tool', 'assistant']);
    const results = h.history.messages.filter(m => m.role === 'tool').map(envelopeOf);
    expect(results.map(r => r.payload)).toEqual(['run 1', 'run 2']);
    expect(results[0].toolCallId).not.toBe(results[1].toolCallId);
  });

  it('should fail a call cancelled while it waits for its write slot without running it', async () => {
    const h = createHarness([
      callsResponse(toolCall('c1', 'alpha'), toolCall('c2', 'alpha')),
      { content: 'ok' },
    ]);
    let runs = 0;
    const tool = fakeTool('alpha', async (_args, ctx) => {
      runs++;
      if (ctx.toolCallId === 'c1') {
        expect(h.executor.timeoutCenter.cancel('c2')).toBe(true);
      }
      return 'ran';
    }, 'write');
    h.history.append(createMessage('user', 'go'));

    await h.runner.run({ history: h.history, mode: 'agent', availableTools: [tool], projectRoot: '/workspace' });

    expect(runs).toBe(1);
    const tools = h.history.messages.filter(m => m.role === 'tool');
    expect(tools.map(m => envelopeOf(m).status)).toEqual(['completed', 'failed']);
    expect(envelopeOf(tools[1]).message).toBe('Cancelled by user');
    expect(h.executor.timeoutCenter.isCancelled('c2')).toBe(false);
    expect(h.executor.timeoutCenter.isPending('c2')).toBe(false);
  });

  it('should not let a cancellation for an unknown id fail a later call', async () => {
    const { tool, counter } = countingTool();
    const h = createHarness([callsResponse(toolCall('c1', 'alpha')), { content: 'ok' }]);
    h.history.append(createMessage('user', 'go'));

    expect(h.executor.timeoutCenter.cancel('c1')).toBe(false);
    await h.runner.run({ history: h.history, mode: 'agent', availableTools: [tool], projectRoot: '/workspace' });

    expect(counter.runs).toBe(1);
    const [result] = h.history.messages.filter(m => m.role === 'tool');
    expect(envelopeOf(result).status).toBe('completed');
  });
});

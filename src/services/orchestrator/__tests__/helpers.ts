import { ConversationHistory } from '../../conversation/history.js';
import type { ToolDefinition, ToolKind } from '../../tools/types.js';
import { ToolExecutor } from '../executor.js';
import { AIInteractionGateway } from '../gateway.js';
import { decodeEnvelope } from '../messages.js';
import { ToolLoopRunner } from '../tool-loop.js';
import type { ContextBuilder, ContextRequest } from '../context-builder.js';
import type { AIResponse, ChatMessage, InferenceBackend, InferenceRequest, ToolCall } from '../types.js';
import type { JsonObject } from '../../../utils/json-value.js';

export type ScriptStep = AIResponse | Error | ((request: InferenceRequest) => AIResponse);

/** Replays scripted replies in order, then keeps returning `fallback`. */
export class ScriptedBackend implements InferenceBackend {
  readonly requests: InferenceRequest[] = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[] = [], private readonly fallback: AIResponse = { content: 'done' }) {
    this.steps = [...steps];
  }

  async send(request: InferenceRequest): Promise<AIResponse> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const step = this.steps.shift();
    if (step === undefined) return this.fallback;
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(request);
    return step;
  }

  /** Names of the tools offered on each request. */
  toolNamesPerRequest(): string[][] {
    return this.requests.map(request => request.tools.map(tool => tool.name));
  }
}

export class StaticContextBuilder implements ContextBuilder {
  readonly requests: ContextRequest[] = [];

  constructor(private readonly text = 'context') {}

  async build(request: ContextRequest): Promise<string> {
    this.requests.push(request);
    return this.text;
  }
}

export function fakeTool(
  name: string,
  execute: ToolDefinition['execute'] = async () => `${name} ok`,
  kind: ToolKind = 'read',
): ToolDefinition {
  return {
    name,
    description: `${name} test tool`,
    kind,
    parameters: [],
    execute,
  };
}

export function toolCall(id: string, name: string, args: JsonObject = {}): ToolCall {
  return { id, name, arguments: args };
}

export function callsResponse(...calls: ToolCall[]): AIResponse {
  return { content: '', toolCalls: calls };
}

/** Envelope of a tool message, failing loudly when it does not decode. */
export function envelopeOf(message: ChatMessage) {
  const envelope = decodeEnvelope(message.content);
  if (!envelope) {
    throw new Error(`Not a tool envelope: ${message.content}`);
  }
  return envelope;
}

export interface Harness {
  backend: ScriptedBackend;
  context: StaticContextBuilder;
  gateway: AIInteractionGateway;
  executor: ToolExecutor;
  runner: ToolLoopRunner;
  history: ConversationHistory;
}

export function createHarness(steps: ScriptStep[], workspaceRoot = '/workspace'): Harness {
  const backend = new ScriptedBackend(steps);
  const context = new StaticContextBuilder();
  const gateway = new AIInteractionGateway({ backend, contextBuilder: context });
  const executor = new ToolExecutor({ workspaceRoot });
  const runner = new ToolLoopRunner({ gateway, executor });
  const history = new ConversationHistory('conv-1');
  return { backend, context, gateway, executor, runner, history };
}

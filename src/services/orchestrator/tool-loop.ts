// Single-Pass Tool Loop
// Drives one conversation turn: send, execute requested tools, re-send,
// until the model stops asking for tools or the iteration cap is reached.

import { getLogger, type Logger } from '../../logger.js';
import type { ToolDefinition } from '../tools/types.js';
import type { ConversationHistory } from '../conversation/history.js';
import { appendSafely, noopConversationLog, type ConversationLogSink } from '../conversation/conversation-log.js';
import type { AIInteractionGateway } from './gateway.js';
import type { ToolExecutor } from './executor.js';
import { createMessage } from './messages.js';
import {
  FORCE_TOOL_FOLLOWUP_PROMPT,
  isLowQualityReasoning,
  needsReasoningFormatCorrection,
  REASONING_FORMAT_PROMPT,
  REASONING_QUALITY_PROMPT,
  shouldForceToolFollowup,
  splitReasoning,
  withCorrection,
} from './reasoning.js';
import type { AIMode, AIResponse, ChatMessage, ToolCall } from './types.js';

export const MAX_TOOL_ITERATIONS: Readonly<Record<AIMode, number>> = {
  agent: 12,
  chat: 5,
};

export const CANCELLED_BY_USER = 'Cancelled by user';

export function hasToolCalls(response: AIResponse): response is AIResponse & { toolCalls: ToolCall[] } {
  return (response.toolCalls?.length ?? 0) > 0;
}

export interface BoundedLoopOptions {
  initial: AIResponse;
  maxIterations: number;
  execute: (calls: ToolCall[]) => Promise<ChatMessage[]>;
  /** Receives the assistant message of each iteration and every terminal result. */
  record: (message: ChatMessage) => void;
  resend: () => Promise<AIResponse>;
}

export interface BoundedLoopOutcome {
  response: AIResponse;
  iterations: number;
  /** Tool calls left unexecuted because the cap was reached. */
  pendingToolCalls: number;
}

export async function runBoundedToolLoop(options: BoundedLoopOptions): Promise<BoundedLoopOutcome> {
  const maxIterations = Math.max(1, options.maxIterations);
  let response = options.initial;
  let iterations = 0;

  while (hasToolCalls(response) && iterations < maxIterations) {
    iterations++;
    const { content, reasoning } = splitReasoning(response.content ?? '');
    options.record(createMessage('assistant', content, { reasoning, toolCalls: response.toolCalls }));

    const results = await options.execute(response.toolCalls);
    for (const result of results) {
      options.record(result);
    }

    response = await options.resend();
  }

  return { response, iterations, pendingToolCalls: response.toolCalls?.length ?? 0 };
}

export type CorrectionKind = 'force_tool_followup' | 'reasoning_format' | 'reasoning_quality';

export interface ToolLoopRequest {
  history: ConversationHistory;
  mode: AIMode;
  availableTools: ToolDefinition[];
  projectRoot: string;
  explicitContext?: string;
  signal?: AbortSignal;
  maxIterations?: number;
}

export interface ToolLoopResult {
  response: AIResponse;
  finalMessage: ChatMessage;
  iterations: number;
  hitIterationCap: boolean;
  corrections: CorrectionKind[];
}

export interface ToolLoopRunnerOptions {
  gateway: AIInteractionGateway;
  executor: ToolExecutor;
  log?: ConversationLogSink;
  logger?: Logger;
}

export class ToolLoopRunner {
  private readonly gateway: AIInteractionGateway;
  private readonly executor: ToolExecutor;
  private readonly log: ConversationLogSink;
  private readonly logger: Logger;

  constructor(options: ToolLoopRunnerOptions) {
    this.gateway = options.gateway;
    this.executor = options.executor;
    this.log = options.log ?? noopConversationLog;
    this.logger = options.logger ?? getLogger('tool-loop');
  }

  async run(request: ToolLoopRequest): Promise<ToolLoopResult> {
    const { history, mode, availableTools, signal } = request;
    const corrections: CorrectionKind[] = [];

    const send = (messages: ChatMessage[], tools: ToolDefinition[], stage: string) =>
      this.gateway.sendWithRetry({
        messages,
        tools,
        mode,
        projectRoot: request.projectRoot,
        explicitContext: request.explicitContext,
        signal,
        stage,
      });

    let response = await send(history.messages, availableTools, 'initial');

    if (mode === 'agent' && !hasToolCalls(response) && shouldForceToolFollowup(response.content)) {
      corrections.push('force_tool_followup');
      this.logger.info({ conversationId: history.id }, 'Reply announced changes without tool calls; forcing a follow-up');
      const messages = withCorrection(history.messages, FORCE_TOOL_FOLLOWUP_PROMPT, history.lastUserMessage());
      response = await send(messages, availableTools, 'force_tool_followup');
    }

    const maxIterations = request.maxIterations ?? MAX_TOOL_ITERATIONS[mode];
    const outcome = await runBoundedToolLoop({
      initial: response,
      maxIterations,
      execute: (calls) =>
        this.executor.executeBatch({
          toolCalls: calls,
          availableTools,
          conversationId: history.id,
          onProgress: (message) => history.upsertToolExecutionMessage(message),
          signal,
        }),
      record: (message) => {
        if (message.role === 'tool') {
          history.upsertToolExecutionMessage(message);
        } else {
          history.append(message);
        }
      },
      resend: () => send(history.messages, availableTools, 'tool_followup'),
    });
    response = outcome.response;

    const hitIterationCap = outcome.pendingToolCalls > 0;
    if (hitIterationCap) {
      this.logger.warn(
        { conversationId: history.id, iterations: outcome.iterations, pending: outcome.pendingToolCalls },
        'Tool iteration cap reached with tool calls pending',
      );
      await appendSafely(this.log, {
        type: 'loop.iteration_cap',
        conversationId: history.id,
        data: { iterations: outcome.iterations, pendingToolCalls: outcome.pendingToolCalls },
      });
    }

    if (needsReasoningFormatCorrection(response.content)) {
      corrections.push('reasoning_format');
      const corrected = await send(withCorrection(history.messages, REASONING_FORMAT_PROMPT), [], 'reasoning_format');
      if (corrected.content?.trim()) {
        response = { content: corrected.content };
      }
    }

    if (isLowQualityReasoning(response.content)) {
      corrections.push('reasoning_quality');
      const rewritten = await send(withCorrection(history.messages, REASONING_QUALITY_PROMPT), [], 'reasoning_quality');
      if (rewritten.content?.trim()) {
        response = { content: rewritten.content };
      }
    }

    const { content, reasoning } = splitReasoning(response.content ?? '');
    const finalMessage = createMessage('assistant', content, { reasoning });
    history.append(finalMessage);

    return {
      response,
      finalMessage,
      iterations: outcome.iterations,
      hitIterationCap,
      corrections,
    };
  }
}

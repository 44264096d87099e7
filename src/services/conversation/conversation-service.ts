// Conversation Service
// Owns the live conversations and runs one turn at a time per conversation.

import { getLogger, type Logger } from '../../logger.js';
import { AppError, errorMessage, InferenceError } from '../../utils/errors.js';
import type { ToolDefinition } from '../tools/types.js';
import type { ActiveToolInvocation } from '../watchdog/tool-timeout-center.js';
import type { ToolExecutor } from '../orchestrator/executor.js';
import type { ToolLoopRunner } from '../orchestrator/tool-loop.js';
import { CANCELLED_BY_USER } from '../orchestrator/tool-loop.js';
import type { AgentOrchestrator, PhaseReport } from '../orchestrator/orchestrator.js';
import { createMessage } from '../orchestrator/messages.js';
import type { AIMode, ChatMessage } from '../orchestrator/types.js';
import { appendSafely, noopConversationLog, type ConversationLogSink } from './conversation-log.js';
import { foldConversation, type FoldingThresholds } from './folding.js';
import type { FoldStore } from './fold-store.js';
import { ConversationHistory, type HistoryListener } from './history.js';

export type TurnMode = AIMode | 'orchestrated';

export interface RunTurnOptions {
  content: string;
  mode?: TurnMode;
  explicitContext?: string;
  signal?: AbortSignal;
  /** Receives every transcript change made during the turn. */
  onHistoryEvent?: HistoryListener;
}

export type TurnResult =
  | {
      status: 'completed';
      finalMessage: ChatMessage;
      iterations?: number;
      hitIterationCap?: boolean;
      phases?: PhaseReport[];
    }
  | {
      status: 'failed';
      finalMessage: ChatMessage;
      error: string;
    };

export interface ConversationSummary {
  id: string;
  createdAt: string;
  messageCount: number;
  running: boolean;
}

export interface ConversationServiceOptions {
  loop: ToolLoopRunner;
  orchestrator: AgentOrchestrator;
  executor: ToolExecutor;
  tools: () => ToolDefinition[];
  projectRoot: string;
  folding?: { thresholds?: FoldingThresholds; store?: FoldStore };
  log?: ConversationLogSink;
  logger?: Logger;
}

export class ConversationService {
  private readonly conversations = new Map<string, ConversationHistory>();
  private readonly running = new Set<string>();
  private readonly logger: Logger;
  private readonly log: ConversationLogSink;

  constructor(private readonly options: ConversationServiceOptions) {
    this.logger = options.logger ?? getLogger('conversation-service');
    this.log = options.log ?? noopConversationLog;
  }

  create(): ConversationHistory {
    const history = new ConversationHistory();
    this.conversations.set(history.id, history);
    this.logger.info({ conversationId: history.id }, 'Conversation created');
    return history;
  }

  get(id: string): ConversationHistory {
    const history = this.conversations.get(id);
    if (!history) {
      throw AppError.notFound(`Conversation ${id} not found`);
    }
    return history;
  }

  delete(id: string): void {
    if (this.running.has(id)) {
      throw AppError.conflict(`Conversation ${id} has a turn in progress`);
    }
    if (!this.conversations.delete(id)) {
      throw AppError.notFound(`Conversation ${id} not found`);
    }
  }

  list(): ConversationSummary[] {
    return Array.from(this.conversations.values()).map(history => ({
      id: history.id,
      createdAt: history.createdAt,
      messageCount: history.length,
      running: this.running.has(history.id),
    }));
  }

  isRunning(id: string): boolean {
    return this.running.has(id);
  }

  async runTurn(id: string, options: RunTurnOptions): Promise<TurnResult> {
    const history = this.get(id);
    if (this.running.has(id)) {
      throw AppError.conflict(`Conversation ${id} already has a turn in progress`);
    }

    const mode = options.mode ?? 'agent';
    this.running.add(id);
    const unsubscribe = options.onHistoryEvent ? history.subscribe(options.onHistoryEvent) : undefined;

    try {
      await foldConversation(history, this.options.folding);
      history.append(createMessage('user', options.content));
      await appendSafely(this.log, { type: 'turn.start', conversationId: id, data: { mode } });

      const result = await this.dispatch(history, mode, options);
      await appendSafely(this.log, { type: 'turn.completed', conversationId: id, data: { mode } });
      return result;
    } catch (error) {
      if (!(error instanceof InferenceError)) {
        throw error;
      }

      const message = errorMessage(error);
      this.logger.error({ conversationId: id, err: error }, 'Turn failed');
      const finalMessage = createMessage('assistant', `The assistant request failed: ${message}`);
      history.append(finalMessage);
      await appendSafely(this.log, { type: 'turn.failed', conversationId: id, data: { mode, error: message } });
      return { status: 'failed', finalMessage, error: message };
    } finally {
      unsubscribe?.();
      this.running.delete(id);
    }
  }

  /**
   * Flags the call for the watchdog and marks its executing message as
   * cancelled. A call still queued in its batch fails without running.
   * Ids that are not running or queued are ignored.
   */
  cancelToolCall(toolCallId: string): boolean {
    const accepted = this.options.executor.timeoutCenter.cancel(toolCallId);
    if (!accepted) {
      this.logger.debug({ toolCallId }, 'Ignoring cancellation for an unknown tool call');
      return false;
    }

    let updated = false;
    for (const history of this.conversations.values()) {
      const message = history.findToolMessage(toolCallId);
      if (message?.tool?.status === 'executing') {
        updated = history.updateMessageStatus(toolCallId, 'failed', CANCELLED_BY_USER) || updated;
      }
    }

    this.logger.info({ toolCallId, updated }, 'Tool call cancellation requested');
    return true;
  }

  activeToolCalls(): ActiveToolInvocation[] {
    return this.options.executor.timeoutCenter.active();
  }

  private async dispatch(history: ConversationHistory, mode: TurnMode, options: RunTurnOptions): Promise<TurnResult> {
    const common = {
      history,
      availableTools: this.options.tools(),
      projectRoot: this.options.projectRoot,
      explicitContext: options.explicitContext,
      signal: options.signal,
    };

    if (mode === 'orchestrated') {
      const result = await this.options.orchestrator.run({
        ...common,
        onEvent: (event) => this.logger.debug({ conversationId: history.id, ...event }, 'Orchestrator event'),
      });
      return { status: 'completed', finalMessage: result.finalMessage, phases: result.phases };
    }

    const result = await this.options.loop.run({ ...common, mode });
    return {
      status: 'completed',
      finalMessage: result.finalMessage,
      iterations: result.iterations,
      hitIterationCap: result.hitIterationCap,
    };
  }
}

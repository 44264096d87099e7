// Agent Orchestrator
// Runs a request through fixed roles: Architect, Planner, Worker, Reviewer,
// Verifier, Finalizer. No phase is skipped; each has its own tools and budget.

import { getLogger, type Logger } from '../../logger.js';
import type { ToolDefinition } from '../tools/types.js';
import type { ConversationHistory } from '../conversation/history.js';
import { appendSafely, noopConversationLog, type ConversationLogSink } from '../conversation/conversation-log.js';
import type { AIInteractionGateway } from './gateway.js';
import type { ToolExecutor } from './executor.js';
import { createAllowlistedCommandTool } from './allowlisted-command-tool.js';
import { createMessage } from './messages.js';
import { splitReasoning } from './reasoning.js';
import { hasToolCalls, runBoundedToolLoop } from './tool-loop.js';
import type { AIResponse, ChatMessage, ToolCall } from './types.js';

export type OrchestrationPhase = 'architect' | 'planner' | 'worker' | 'reviewer' | 'verifier' | 'finalizer';

export const ORCHESTRATION_PHASES: readonly OrchestrationPhase[] = [
  'architect',
  'planner',
  'worker',
  'reviewer',
  'verifier',
  'finalizer',
];

export const PHASE_INSTRUCTIONS: Readonly<Record<OrchestrationPhase, string>> = {
  architect:
    'Role: Architect. Provide architecture notes and a short implementation plan. Do not call tools.',
  planner:
    'Role: Planner. Create or update a concrete execution plan using the planner tool. Keep steps small and ordered.',
  worker:
    'Role: Worker. Implement the plan. Read files before editing them, make focused edits with the available tools, and stop calling tools once the plan is done.',
  reviewer:
    'Role: QA reviewer. Review the proposed patch set(s) for bugs, regressions and missed plan steps. Fix problems with tools, or reply with your findings.',
  verifier:
    'Role: Verifier. Run a small set of allowlisted commands (tests, build, git status/diff) to check the work, then report the results.',
  finalizer:
    'Role: Finalizer. Provide a concise summary: what changed, touched files, verify status, how to undo. Do not call tools.',
};

export interface AgentOrchestratorConfig {
  maxWorkerToolIterations: number;
  maxReviewIterations: number;
  maxVerifyIterations: number;
  verifyAllowedCommandPrefixes: readonly string[];
}

export const DEFAULT_ORCHESTRATOR_CONFIG: AgentOrchestratorConfig = {
  maxWorkerToolIterations: 12,
  maxReviewIterations: 3,
  maxVerifyIterations: 3,
  verifyAllowedCommandPrefixes: [
    'npm test',
    'npm run build',
    'npm run lint',
    'npx tsc --noEmit',
    'npx vitest run',
    'git status',
    'git diff',
    'git log',
  ],
};

export type OrchestratorEvent =
  | { type: 'phase.started'; phase: OrchestrationPhase }
  | { type: 'phase.completed'; phase: OrchestrationPhase; iterations: number }
  | { type: 'phase.incomplete'; phase: OrchestrationPhase; iterations: number; pendingToolCalls: number };

export interface PhaseReport {
  phase: OrchestrationPhase;
  iterations: number;
  status: 'completed' | 'incomplete';
  pendingToolCalls: number;
}

export interface OrchestrationRequest {
  history: ConversationHistory;
  availableTools: ToolDefinition[];
  projectRoot: string;
  explicitContext?: string;
  signal?: AbortSignal;
  onEvent?: (event: OrchestratorEvent) => void;
}

export interface OrchestrationResult {
  response: AIResponse;
  finalMessage: ChatMessage;
  phases: PhaseReport[];
}

export interface AgentOrchestratorOptions {
  gateway: AIInteractionGateway;
  executor: ToolExecutor;
  config?: Partial<AgentOrchestratorConfig>;
  log?: ConversationLogSink;
  logger?: Logger;
}

/** Read tools plus a run_command that only accepts allowlisted prefixes. */
export function buildVerifierTools(tools: readonly ToolDefinition[], prefixes: readonly string[]): ToolDefinition[] {
  const verifierTools = tools.filter(tool => tool.kind === 'read');
  const command = tools.find(tool => tool.name === 'run_command');
  if (command) {
    verifierTools.push(createAllowlistedCommandTool(command, prefixes));
  }
  return verifierTools;
}

/** State shared by the phases of one run. */
class OrchestrationRun {
  readonly transcript: ChatMessage[];
  readonly reports: PhaseReport[] = [];

  constructor(readonly request: OrchestrationRequest) {
    this.transcript = request.history.messages;
  }

  record(message: ChatMessage): void {
    this.transcript.push(message);
    if (message.role === 'tool') {
      this.request.history.upsertToolExecutionMessage(message);
    } else {
      this.request.history.append(message);
    }
  }

  recordReply(response: AIResponse): ChatMessage | undefined {
    const { content, reasoning } = splitReasoning(response.content ?? '');
    if (!content && !reasoning) return undefined;
    const message = createMessage('assistant', content, { reasoning });
    this.record(message);
    return message;
  }
}

export class AgentOrchestrator {
  private readonly gateway: AIInteractionGateway;
  private readonly executor: ToolExecutor;
  private readonly config: AgentOrchestratorConfig;
  private readonly log: ConversationLogSink;
  private readonly logger: Logger;

  constructor(options: AgentOrchestratorOptions) {
    this.gateway = options.gateway;
    this.executor = options.executor;
    const merged = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...options.config };
    this.config = {
      maxWorkerToolIterations: Math.max(1, merged.maxWorkerToolIterations),
      maxReviewIterations: Math.max(1, merged.maxReviewIterations),
      maxVerifyIterations: Math.max(1, merged.maxVerifyIterations),
      verifyAllowedCommandPrefixes: merged.verifyAllowedCommandPrefixes,
    };
    this.log = options.log ?? noopConversationLog;
    this.logger = options.logger ?? getLogger('agent-orchestrator');
  }

  async run(request: OrchestrationRequest): Promise<OrchestrationResult> {
    const run = new OrchestrationRun(request);
    const allTools = request.availableTools;

    // Architect: notes only
    await this.startPhase(run, 'architect');
    run.recordReply(await this.send(run, [], 'architect'));
    await this.finishPhase(run, 'architect', 0, 0);

    // Planner: one exchange with the planner tool; calls are executed, not looped
    await this.startPhase(run, 'planner');
    const plannerTools = allTools.filter(tool => tool.name === 'planner');
    const plan = await this.send(run, plannerTools, 'planner');
    let plannerIterations = 0;
    if (hasToolCalls(plan)) {
      plannerIterations = 1;
      await this.executeAndRecord(run, plan, plannerTools);
    } else {
      run.recordReply(plan);
    }
    await this.finishPhase(run, 'planner', plannerIterations, 0);

    await this.loopPhase(run, 'worker', allTools, this.config.maxWorkerToolIterations);
    await this.loopPhase(run, 'reviewer', allTools, this.config.maxReviewIterations);
    await this.loopPhase(
      run,
      'verifier',
      buildVerifierTools(allTools, this.config.verifyAllowedCommandPrefixes),
      this.config.maxVerifyIterations,
    );

    // Finalizer: the terminal answer
    await this.startPhase(run, 'finalizer');
    const response = await this.send(run, [], 'finalizer');
    const { content, reasoning } = splitReasoning(response.content ?? '');
    const finalMessage = createMessage('assistant', content, { reasoning });
    run.record(finalMessage);
    await this.finishPhase(run, 'finalizer', 0, 0);

    return { response, finalMessage, phases: run.reports };
  }

  private send(run: OrchestrationRun, tools: ToolDefinition[], phase: OrchestrationPhase): Promise<AIResponse> {
    const { request } = run;
    return this.gateway.sendWithRetry({
      messages: [...run.transcript],
      tools,
      mode: 'agent',
      projectRoot: request.projectRoot,
      explicitContext: request.explicitContext,
      signal: request.signal,
      stage: phase,
    });
  }

  private executeBatch(run: OrchestrationRun, calls: ToolCall[], tools: ToolDefinition[]): Promise<ChatMessage[]> {
    const { request } = run;
    return this.executor.executeBatch({
      toolCalls: calls,
      availableTools: tools,
      conversationId: request.history.id,
      onProgress: (message) => request.history.upsertToolExecutionMessage(message),
      signal: request.signal,
    });
  }

  private async executeAndRecord(
    run: OrchestrationRun,
    response: AIResponse & { toolCalls: ToolCall[] },
    tools: ToolDefinition[],
  ): Promise<void> {
    const { content, reasoning } = splitReasoning(response.content ?? '');
    run.record(createMessage('assistant', content, { reasoning, toolCalls: response.toolCalls }));
    const results = await this.executeBatch(run, response.toolCalls, tools);
    for (const result of results) {
      run.record(result);
    }
  }

  private async loopPhase(
    run: OrchestrationRun,
    phase: OrchestrationPhase,
    tools: ToolDefinition[],
    maxIterations: number,
  ): Promise<void> {
    await this.startPhase(run, phase);

    const outcome = await runBoundedToolLoop({
      initial: await this.send(run, tools, phase),
      maxIterations,
      execute: (calls) => this.executeBatch(run, calls, tools),
      record: (message) => run.record(message),
      resend: () => this.send(run, tools, phase),
    });

    run.recordReply({ content: outcome.response.content });
    await this.finishPhase(run, phase, outcome.iterations, outcome.pendingToolCalls);
  }

  private async startPhase(run: OrchestrationRun, phase: OrchestrationPhase): Promise<void> {
    run.transcript.push(createMessage('system', PHASE_INSTRUCTIONS[phase]));
    this.logger.info({ conversationId: run.request.history.id, phase }, 'Phase started');
    await this.emit(run, { type: 'phase.started', phase });
  }

  private async finishPhase(
    run: OrchestrationRun,
    phase: OrchestrationPhase,
    iterations: number,
    pendingToolCalls: number,
  ): Promise<void> {
    const status = pendingToolCalls > 0 ? 'incomplete' : 'completed';
    run.reports.push({ phase, iterations, status, pendingToolCalls });

    if (status === 'incomplete') {
      this.logger.warn(
        { conversationId: run.request.history.id, phase, iterations, pendingToolCalls },
        'Phase hit its iteration cap with tool calls pending; moving on',
      );
      await this.emit(run, { type: 'phase.incomplete', phase, iterations, pendingToolCalls });
    } else {
      await this.emit(run, { type: 'phase.completed', phase, iterations });
    }
  }

  private async emit(run: OrchestrationRun, event: OrchestratorEvent): Promise<void> {
    run.request.onEvent?.(event);
    const { type, ...data } = event;
    await appendSafely(this.log, { type, conversationId: run.request.history.id, data });
  }
}

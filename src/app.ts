// Composition of the orchestration engine and its HTTP surface

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import * as path from 'path';
import { env } from './env.js';
import { getLogger } from './logger.js';
import { conversationRoutes } from './routes/conversations.js';
import { ConversationService } from './services/conversation/conversation-service.js';
import { JsonlConversationLog, noopConversationLog, type ConversationLogSink } from './services/conversation/conversation-log.js';
import { ConversationFoldStore } from './services/conversation/fold-store.js';
import type { FoldingThresholds } from './services/conversation/folding.js';
import {
  AgentOrchestrator,
  AIInteractionGateway,
  ProjectContextBuilder,
  ToolExecutor,
  ToolLoopRunner,
  type AgentOrchestratorConfig,
  type ContextBuilder,
  type InferenceBackend,
} from './services/orchestrator/index.js';
import { ToolScheduler } from './services/scheduler/tool-scheduler.js';
import type { ToolRegistry } from './services/tools/registry.js';
import { ToolTimeoutCenter } from './services/watchdog/tool-timeout-center.js';
import type { Clock } from './utils/clock.js';

export interface ConversationServiceDeps {
  backend: InferenceBackend;
  registry: ToolRegistry;
  workspaceRoot: string;
  /** Conversation logs and folded messages are kept here; omit to keep nothing on disk. */
  dataDir?: string;
  contextBuilder?: ContextBuilder;
  clock?: Clock;
  toolTimeoutSeconds?: number;
  readConcurrency?: number;
  orchestrator?: Partial<AgentOrchestratorConfig>;
  folding?: FoldingThresholds;
}

export function createConversationService(deps: ConversationServiceDeps): ConversationService {
  const log: ConversationLogSink = deps.dataDir
    ? new JsonlConversationLog(path.join(deps.dataDir, 'logs'))
    : noopConversationLog;

  const executor = new ToolExecutor({
    workspaceRoot: deps.workspaceRoot,
    scheduler: new ToolScheduler({ readConcurrency: deps.readConcurrency }),
    timeoutCenter: new ToolTimeoutCenter({ clock: deps.clock }),
    timeoutSeconds: deps.toolTimeoutSeconds,
    log,
  });

  const gateway = new AIInteractionGateway({
    backend: deps.backend,
    contextBuilder: deps.contextBuilder ?? new ProjectContextBuilder(),
    clock: deps.clock,
  });

  return new ConversationService({
    loop: new ToolLoopRunner({ gateway, executor, log }),
    orchestrator: new AgentOrchestrator({ gateway, executor, config: deps.orchestrator, log }),
    executor,
    tools: () => deps.registry.getAll(),
    projectRoot: deps.workspaceRoot,
    folding: {
      thresholds: deps.folding,
      store: deps.dataDir ? new ConversationFoldStore(path.join(deps.dataDir, 'folds')) : undefined,
    },
    log,
  });
}

/** Service wired from the environment. */
export function createConversationServiceFromEnv(backend: InferenceBackend, registry: ToolRegistry): ConversationService {
  getLogger('app').debug({ workspaceRoot: env.WORKSPACE_ROOT, dataDir: env.AGENT_DATA_DIR }, 'Wiring conversation service');
  return createConversationService({
    backend,
    registry,
    workspaceRoot: env.WORKSPACE_ROOT,
    dataDir: env.AGENT_DATA_DIR,
    toolTimeoutSeconds: env.TOOL_TIMEOUT_SECONDS,
    readConcurrency: env.TOOL_READ_CONCURRENCY,
    orchestrator: {
      maxWorkerToolIterations: env.MAX_WORKER_TOOL_ITERATIONS,
      maxReviewIterations: env.MAX_REVIEW_ITERATIONS,
      maxVerifyIterations: env.MAX_VERIFY_ITERATIONS,
      verifyAllowedCommandPrefixes: env.VERIFY_ALLOWED_PREFIXES,
    },
    folding: {
      maxMessageCount: env.FOLD_MAX_MESSAGES,
      maxContentCharacters: env.FOLD_MAX_CHARACTERS,
      preserveMostRecentMessages: env.FOLD_PRESERVE_RECENT,
    },
  });
}

export async function buildServer(
  service: ConversationService,
  logger: FastifyServerOptions['logger'] = false,
): Promise<FastifyInstance> {
  const server = Fastify({ logger });

  // Local clients only
  await server.register(cors, {
    origin: [
      'http://localhost:8080',
      'http://127.0.0.1:8080',
      'http://localhost:3000',
      'http://127.0.0.1:3000',
    ],
    credentials: true,
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(conversationRoutes, { prefix: '/v1', service });

  return server;
}

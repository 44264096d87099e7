// Conversation routes
import type { FastifyInstance, FastifyPluginOptions, FastifyReply } from 'fastify';
import { z } from 'zod';
import { env } from '../env.js';
import { enforceRateLimitIfEnabled, requireAuthIfEnabled } from '../security/route-guards.js';
import { AppError, errorMessage, formatErrorResponse } from '../utils/errors.js';
import type { ConversationService, TurnResult } from '../services/conversation/conversation-service.js';
import type { HistoryEvent } from '../services/conversation/history.js';

const RunSchema = z.object({
  content: z.string().trim().min(1),
  mode: z.enum(['chat', 'agent', 'orchestrated']).optional(),
  explicit_context: z.string().optional(),
  stream: z.boolean().optional(),
});

export interface ConversationRoutesOptions extends FastifyPluginOptions {
  service: ConversationService;
}

function sendError(reply: FastifyReply, error: unknown) {
  if (error instanceof AppError) {
    return reply.code(error.statusCode).send(formatErrorResponse(error, true));
  }
  reply.log.error({ err: error }, 'Conversation request failed');
  return reply.code(500).send(formatErrorResponse(AppError.internal(errorMessage(error))));
}

function toResponseBody(result: TurnResult) {
  if (result.status === 'failed') {
    return { status: result.status, final_message: result.finalMessage, error: result.error };
  }
  return {
    status: result.status,
    final_message: result.finalMessage,
    iterations: result.iterations,
    hit_iteration_cap: result.hitIterationCap,
    phases: result.phases,
  };
}

function historyEventPayload(event: HistoryEvent) {
  switch (event.type) {
    case 'appended':
    case 'updated':
      return { change: event.type, index: event.index, message: event.message };
    case 'replaced':
      return { change: event.type, removed: event.removed, message: event.message };
    case 'cleared':
      return { change: event.type };
  }
}

export async function conversationRoutes(server: FastifyInstance, options: ConversationRoutesOptions) {
  const { service } = options;

  // GET /v1/conversations - List live conversations
  server.get('/conversations', async () => {
    return { conversations: service.list() };
  });

  // POST /v1/conversations - Start a conversation
  server.post('/conversations', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) return reply;

    const history = service.create();
    return reply.code(201).send({ conversation: { id: history.id, created_at: history.createdAt } });
  });

  // GET /v1/conversations/:id/messages - Full transcript
  server.get<{ Params: { id: string } }>('/conversations/:id/messages', async (request, reply) => {
    try {
      return { messages: service.get(request.params.id).messages };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // DELETE /v1/conversations/:id
  server.delete<{ Params: { id: string } }>('/conversations/:id', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) return reply;

    try {
      service.delete(request.params.id);
      return { ok: true };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // POST /v1/conversations/:id/run - Run one turn
  server.post<{ Params: { id: string } }>('/conversations/:id/run', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) return reply;
    if (!enforceRateLimitIfEnabled(request, reply, {
      routeKey: 'conversation-run',
      maxRequests: env.RATE_LIMIT_RUN_PER_WINDOW,
    })) {
      return reply;
    }

    const parsed = RunSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, AppError.validationError('Validation failed', parsed.error.issues));
    }
    const body = parsed.data;
    const { id } = request.params;

    try {
      service.get(id);
      if (service.isRunning(id)) {
        throw AppError.conflict(`Conversation ${id} already has a turn in progress`);
      }
    } catch (error) {
      return sendError(reply, error);
    }

    const controller = new AbortController();
    const turn = {
      content: body.content,
      mode: body.mode,
      explicitContext: body.explicit_context,
      signal: controller.signal,
    };

    // A client that goes away before the turn ends cancels it
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) controller.abort();
    });

    if (!body.stream) {
      try {
        return toResponseBody(await service.runTurn(id, turn));
      } catch (error) {
        return sendError(reply, error);
      }
    }

    // SSE: the transcript changes as they happen, then one terminal event
    reply.hijack();
    reply.raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
    });

    const sendEvent = (type: string, data: unknown) => {
      try {
        reply.raw.write(`event: ${type}\n`);
        reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
      } catch (e) {
        server.log.error({ err: e, type }, 'Failed to send SSE event');
      }
    };

    try {
      const result = await service.runTurn(id, {
        ...turn,
        onHistoryEvent: (event) => sendEvent('message', historyEventPayload(event)),
      });
      sendEvent(result.status === 'failed' ? 'turn.failed' : 'turn.completed', toResponseBody(result));
    } catch (error) {
      request.log.error({ err: error, conversationId: id }, 'Streaming turn failed');
      sendEvent('turn.failed', { status: 'failed', error: errorMessage(error) });
    } finally {
      reply.raw.end();
    }
  });

  // POST /v1/tool-calls/:toolCallId/cancel
  server.post<{ Params: { toolCallId: string } }>('/tool-calls/:toolCallId/cancel', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) return reply;
    return { cancelled: service.cancelToolCall(request.params.toolCallId) };
  });

  // GET /v1/tool-calls/active
  server.get('/tool-calls/active', async () => {
    return { active: service.activeToolCalls() };
  });
}

import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer, createConversationService } from '../../app.js';
import { env } from '../../env.js';
import { resetRateLimits } from '../../security/route-guards.js';
import { ToolRegistry } from '../../services/tools/registry.js';
import { ScriptedBackend, StaticContextBuilder } from '../../services/orchestrator/__tests__/helpers.js';

function parseSse(body: string): { event: string; data: unknown }[] {
  return body
    .split('\n\n')
    .filter(block => block.trim())
    .map(block => {
      const [eventLine, dataLine] = block.split('\n');
      return { event: eventLine.replace('event: ', ''), data: JSON.parse(dataLine.replace('data: ', '')) };
    });
}

describe.sequential('Conversation Routes', () => {
  let app: FastifyInstance;

  const originalAuth = env.AUTH_ENFORCEMENT_ENABLED;
  const originalToken = env.API_TOKEN;
  const originalRate = env.RATE_LIMITING_ENABLED;
  const originalRunLimit = env.RATE_LIMIT_RUN_PER_WINDOW;

  beforeAll(async () => {
    const service = createConversationService({
      backend: new ScriptedBackend([], { content: 'hello!' }),
      registry: new ToolRegistry(),
      workspaceRoot: '/workspace',
      contextBuilder: new StaticContextBuilder(),
    });
    app = await buildServer(service);
    await app.ready();
  });

  afterAll(async () => {
    env.AUTH_ENFORCEMENT_ENABLED = originalAuth;
    env.API_TOKEN = originalToken;
    env.RATE_LIMITING_ENABLED = originalRate;
    env.RATE_LIMIT_RUN_PER_WINDOW = originalRunLimit;
    await app.close();
  });

  afterEach(() => {
    env.AUTH_ENFORCEMENT_ENABLED = false;
    env.API_TOKEN = '';
    env.RATE_LIMITING_ENABLED = false;
    env.RATE_LIMIT_RUN_PER_WINDOW = 8;
    resetRateLimits();
  });

  async function createConversation(): Promise<string> {
    const response = await app.inject({ method: 'POST', url: '/v1/conversations' });
    expect(response.statusCode).toBe(201);
    return JSON.parse(response.body).conversation.id;
  }

  it('should answer the health check', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/health' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body).status).toBe('ok');
  });

  it('should create a conversation and list it', async () => {
    const id = await createConversation();

    const response = await app.inject({ method: 'GET', url: '/v1/conversations' });
    const ids = JSON.parse(response.body).conversations.map((c: { id: string }) => c.id);
    expect(ids).toContain(id);
  });

  it('should return 404 for the messages of an unknown conversation', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/conversations/does-not-exist/messages' });

    expect(response.statusCode).toBe(404);
    expect(JSON.parse(response.body).error).toBe('not_found');
  });

  it('should reject an invalid run body with 400', async () => {
    const id = await createConversation();

    const response = await app.inject({
      method: 'POST',
      url: `/v1/conversations/${id}/run`,
      payload: { content: '', mode: 'turbo' },
    });

    expect(response.statusCode).toBe(400);
    const body = JSON.parse(response.body);
    expect(body.error).toBe('validation_error');
    expect(body.details.map((issue: { path: string[] }) => issue.path[0]).sort()).toEqual(['content', 'mode']);
  });

  it('should run a turn and return the final message', async () => {
    const id = await createConversation();

    const response = await app.inject({
      method: 'POST',
      url: `/v1/conversations/${id}/run`,
      payload: { content: 'hi', mode: 'chat' },
    });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.status).toBe('completed');
    expect(body.final_message.content).toBe('hello!');
    expect(body.iterations).toBe(0);

    const messages = await app.inject({ method: 'GET', url: `/v1/conversations/${id}/messages` });
    expect(JSON.parse(messages.body).messages.map((m: { role: string }) => m.role)).toEqual(['user', 'assistant']);
  });

  it('should stream transcript changes as server-sent events', async () => {
    const id = await createConversation();

    const response = await app.inject({
      method: 'POST',
      url: `/v1/conversations/${id}/run`,
      payload: { content: 'hi', mode: 'chat', stream: true },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('text/event-stream');
    const events = parseSse(response.body);
    expect(events.map(e => e.event)).toEqual(['message', 'message', 'turn.completed']);
    expect(events[0].data).toMatchObject({ change: 'appended', index: 0, message: { role: 'user', content: 'hi' } });
    expect(events[2].data).toMatchObject({ status: 'completed', final_message: { content: 'hello!' } });
  });

  it('should return 404 when running an unknown conversation', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/conversations/nope/run',
      payload: { content: 'hi' },
    });

    expect(response.statusCode).toBe(404);
  });

  it('should delete a conversation', async () => {
    const id = await createConversation();

    const deleted = await app.inject({ method: 'DELETE', url: `/v1/conversations/${id}` });
    expect(deleted.statusCode).toBe(200);

    const again = await app.inject({ method: 'DELETE', url: `/v1/conversations/${id}` });
    expect(again.statusCode).toBe(404);
  });

  it('should report tool call state', async () => {
    const cancel = await app.inject({ method: 'POST', url: '/v1/tool-calls/unknown/cancel' });
    expect(JSON.parse(cancel.body)).toEqual({ cancelled: false });

    const active = await app.inject({ method: 'GET', url: '/v1/tool-calls/active' });
    expect(JSON.parse(active.body)).toEqual({ active: [] });
  });

  it('should return 401 on mutating routes when auth is enforced and no token is given', async () => {
    env.AUTH_ENFORCEMENT_ENABLED = true;
    env.API_TOKEN = 'test-token';

    const response = await app.inject({ method: 'POST', url: '/v1/conversations' });

    expect(response.statusCode).toBe(401);
    expect(JSON.parse(response.body)).toMatchObject({ error: 'unauthorized', message: 'Missing API token' });
  });

  it('should reject a token that does not match the configured one', async () => {
    env.AUTH_ENFORCEMENT_ENABLED = true;
    env.API_TOKEN = 'test-token';

    const viaHeader = await app.inject({
      method: 'POST',
      url: '/v1/conversations',
      headers: { 'x-api-token': 'wrong-token' },
    });
    const viaBearer = await app.inject({
      method: 'POST',
      url: '/v1/conversations',
      headers: { authorization: 'Bearer test-token-longer' },
    });

    expect(viaHeader.statusCode).toBe(401);
    expect(JSON.parse(viaHeader.body).message).toBe('Invalid API token');
    expect(viaBearer.statusCode).toBe(401);
  });

  it('should reject every token when no API token is configured', async () => {
    env.AUTH_ENFORCEMENT_ENABLED = true;

    const response = await app.inject({
      method: 'POST',
      url: '/v1/conversations',
      headers: { 'x-api-token': 'test-token' },
    });

    expect(response.statusCode).toBe(401);
  });

  it('should accept the configured token when auth is enforced', async () => {
    env.AUTH_ENFORCEMENT_ENABLED = true;
    env.API_TOKEN = 'test-token';

    const viaHeader = await app.inject({
      method: 'POST',
      url: '/v1/conversations',
      headers: { 'x-api-token': 'test-token' },
    });
    const viaBearer = await app.inject({
      method: 'POST',
      url: '/v1/conversations',
      headers: { authorization: 'Bearer test-token' },
    });

    expect(viaHeader.statusCode).toBe(201);
    expect(viaBearer.statusCode).toBe(201);
  });

  it('should return 429 once the run limit is used up', async () => {
    const id = await createConversation();
    env.RATE_LIMITING_ENABLED = true;
    env.RATE_LIMIT_RUN_PER_WINDOW = 1;

    const first = await app.inject({ method: 'POST', url: `/v1/conversations/${id}/run`, payload: { content: 'one' } });
    const second = await app.inject({ method: 'POST', url: `/v1/conversations/${id}/run`, payload: { content: 'two' } });

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(429);
    expect(JSON.parse(second.body).error).toBe('rate_limited');
    expect(second.headers['retry-after']).toBe('60');
  });

  it('should count runs separately for each token', async () => {
    const id = await createConversation();
    env.RATE_LIMITING_ENABLED = true;
    env.RATE_LIMIT_RUN_PER_WINDOW = 1;

    const run = (token: string) =>
      app.inject({
        method: 'POST',
        url: `/v1/conversations/${id}/run`,
        headers: { 'x-api-token': token },
        payload: { content: 'go' },
      });

    expect((await run('test-token-a')).statusCode).toBe(200);
    expect((await run('test-token-b')).statusCode).toBe(200);
    expect((await run('test-token-a')).statusCode).toBe(429);
  });
});

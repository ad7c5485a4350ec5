/**
 * HTTP Surface Tests
 *
 * Routes are exercised with `app.inject`, against a chatbot built on fake
 * services, so no port is opened and no provider is called.
 */

import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';

import { createServer } from '../app.js';
import { SessionStore } from '../session-store.js';
import { CALL_ENDED_MESSAGE, NO_SPEECH_MESSAGE, VOICE_GREETING } from '../routes/voice.js';
import type { InitResult } from '../../agent/types.js';
import { FALLBACK_MESSAGE, UNAVAILABLE_MESSAGE } from '../../agent/prompts.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { KnowledgeBaseError, UpstreamServiceError } from '../../errors/index.js';
import { FakeCompletionService, createFakeChatbot } from '../../test-utils/index.js';

const FAILED_INIT: InitResult = {
  ok: false,
  error: new KnowledgeBaseError('Knowledge base not found: data/missing.txt'),
};

describe('HTTP server', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function serve(init: InitResult, sessions?: SessionStore): Promise<FastifyInstance> {
    app = createServer(init, { config: DEFAULT_CONFIG, sessions });
    await app.ready();
    return app;
  }

  describe('GET /health', () => {
    it('reports ok when the chatbot is ready', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe('ok');
      expect(body.service).toBe('Northwind Pay Support Assistant');
      expect(typeof body.timestamp).toBe('string');
    });

    it('reports degraded with 200 when initialization failed', async () => {
      const server = await serve(FAILED_INIT);

      const res = await server.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json().status).toBe('degraded');
    });
  });

  describe('GET /', () => {
    it('returns the service name and version', async () => {
      const server = await serve(FAILED_INIT);

      const res = await server.inject({ method: 'GET', url: '/' });

      expect(res.json()).toEqual({ service: 'Northwind Pay Support Assistant', version: '0.1.0' });
    });
  });

  describe('POST /api/v1/query', () => {
    it('answers and opens a session when none is given', async () => {
      const completion = new FakeCompletionService('ANSWER');
      const server = await serve(await createFakeChatbot({ completion }));

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/query',
        payload: { query: 'How do I get a refund?', user_id: 'alice' },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.query).toBe('How do I get a refund?');
      expect(body.response).toBe('ANSWER');
      expect(typeof body.query_id).toBe('string');
      expect(typeof body.session_id).toBe('string');
      expect(typeof body.processing_time_ms).toBe('number');
      expect(completion.calls[0]?.prompt).toBe(
        'Context:\n[1] A refund is issued within 5 business days.\n\nQuestion: How do I get a refund?\n\nAnswer:'
      );

      const session = await server.inject({ method: 'GET', url: `/api/v1/session/${body.session_id}` });
      expect(session.json().user_id).toBe('alice');
      expect(session.json().conversation_history).toEqual([
        { query: 'How do I get a refund?', response: 'ANSWER', timestamp: expect.any(String) },
      ]);
    });

    it('continues an existing session with its history in the prompt', async () => {
      const completion = new FakeCompletionService('ANSWER');
      const server = await serve(await createFakeChatbot({ completion }));

      const first = await server.inject({
        method: 'POST',
        url: '/api/v1/query',
        payload: { query: 'How do I get a refund?' },
      });
      const sessionId: string = first.json().session_id;

      const second = await server.inject({
        method: 'POST',
        url: '/api/v1/query',
        payload: { query: 'And my card?', session_id: sessionId },
      });

      expect(second.statusCode).toBe(200);
      expect(second.json().session_id).toBe(sessionId);
      expect(completion.calls[1]?.prompt).toBe(
        'Conversation so far:\nCustomer: How do I get a refund?\nAgent: ANSWER\n\n' +
          'Context:\n[1] A replacement card arrives in 7 days.\n\nQuestion: And my card?\n\nAnswer:'
      );

      const session = await server.inject({ method: 'GET', url: `/api/v1/session/${sessionId}` });
      expect(session.json().conversation_history).toHaveLength(2);
    });

    it('answers with the apology when the model fails', async () => {
      const completion = new FakeCompletionService(
        new UpstreamServiceError('openai', 'api', 'Internal server error')
      );
      const server = await serve(await createFakeChatbot({ completion }));

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/query',
        payload: { query: 'How do I get a refund?' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().response).toBe(FALLBACK_MESSAGE);
    });

    it('rejects an unknown session with 400', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/query',
        payload: { query: 'refund?', session_id: 'no-such-session' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'Invalid session ID: no-such-session',
        error_code: '400',
        timestamp: expect.any(String),
      });
    });

    it('rejects an empty query with 422', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({ method: 'POST', url: '/api/v1/query', payload: { query: '' } });

      expect(res.statusCode).toBe(422);
      expect(res.json().error).toBe(
        'Invalid request body: query: String must contain at least 1 character(s)'
      );
      expect(res.json().error_code).toBe('422');
    });

    it('rejects a query over 1000 characters with 422', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/query',
        payload: { query: 'a'.repeat(1001) },
      });

      expect(res.statusCode).toBe(422);
    });

    it('rejects a missing body with 422', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({ method: 'POST', url: '/api/v1/query' });

      expect(res.statusCode).toBe(422);
      expect(res.json().error).toBe('Invalid request body: Required');
    });

    it('rejects malformed JSON with 400', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/query',
        headers: { 'content-type': 'application/json' },
        payload: '{"query":',
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error_code).toBe('400');
    });

    it('answers 503 when the chatbot is unavailable', async () => {
      const server = await serve(FAILED_INIT);

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/query',
        payload: { query: 'How do I get a refund?' },
      });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({
        error: UNAVAILABLE_MESSAGE,
        error_code: '503',
        timestamp: expect.any(String),
      });
    });

    it('validates the body before checking availability', async () => {
      const server = await serve(FAILED_INIT);

      const res = await server.inject({ method: 'POST', url: '/api/v1/query', payload: { query: '' } });

      expect(res.statusCode).toBe(422);
    });
  });

  describe('sessions', () => {
    it('creates a session for the user_id in the query string', async () => {
      const server = await serve(await createFakeChatbot());

      const created = await server.inject({ method: 'POST', url: '/api/v1/session?user_id=alice' });
      const { session_id: sessionId, created_at: createdAt } = created.json();

      const res = await server.inject({ method: 'GET', url: `/api/v1/session/${sessionId}` });
      expect(res.json()).toEqual({
        session_id: sessionId,
        user_id: 'alice',
        created_at: createdAt,
        conversation_history: [],
      });
    });

    it('takes user_id from the JSON body', async () => {
      const server = await serve(await createFakeChatbot());

      const created = await server.inject({
        method: 'POST',
        url: '/api/v1/session',
        payload: { user_id: 'bob' },
      });

      const res = await server.inject({
        method: 'GET',
        url: `/api/v1/session/${created.json().session_id}`,
      });
      expect(res.json().user_id).toBe('bob');
    });

    it('creates anonymous sessions while the chatbot is unavailable', async () => {
      const server = await serve(FAILED_INIT);

      const created = await server.inject({ method: 'POST', url: '/api/v1/session' });

      expect(created.statusCode).toBe(200);
      const res = await server.inject({
        method: 'GET',
        url: `/api/v1/session/${created.json().session_id}`,
      });
      expect(res.json().user_id).toBeNull();
    });

    it('answers 404 for an unknown session', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({ method: 'GET', url: '/api/v1/session/missing' });

      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('Session not found: missing');
      expect(res.json().error_code).toBe('404');
    });

    it('forgets sessions idle past the TTL', async () => {
      let clock = 0;
      const sessions = new SessionStore({
        maxSessions: 10,
        ttlMs: 1000,
        memoryWindow: 5,
        now: () => clock,
      });
      const server = await serve(await createFakeChatbot(), sessions);

      const created = await server.inject({ method: 'POST', url: '/api/v1/session' });
      const { session_id: sessionId, created_at: createdAt } = created.json();
      expect(createdAt).toBe('1970-01-01T00:00:00.000Z');

      clock = 1001;
      const res = await server.inject({ method: 'GET', url: `/api/v1/session/${sessionId}` });
      expect(res.statusCode).toBe(404);
    });
  });

  describe('POST /api/v1/voice/webhook', () => {
    it('greets on call_started', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/voice/webhook',
        payload: { status: 'call_started', call_id: 'call-1' },
      });

      expect(res.json()).toEqual({ response: VOICE_GREETING, action: 'reply' });
      expect(VOICE_GREETING).toBe(
        'Hello! Thank you for calling Northwind Pay support. How can I help you today?'
      );
    });

    it('accepts the event name in `type`', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/voice/webhook',
        payload: { type: 'call_started' },
      });

      expect(res.json().action).toBe('reply');
    });

    it('answers a transcript with the chatbot', async () => {
      const completion = new FakeCompletionService('Five business days.');
      const server = await serve(await createFakeChatbot({ completion }));

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/voice/webhook',
        payload: { status: 'conversation_update', transcript: '  How do I get a refund?  ' },
      });

      expect(res.json()).toEqual({ response: 'Five business days.', action: 'reply' });
      expect(completion.calls[0]?.prompt).toContain('Question: How do I get a refund?');
    });

    it('reports no speech for an update without a transcript', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/voice/webhook',
        payload: { status: 'conversation_update', transcript: '   ' },
      });

      expect(res.json()).toEqual({ response: NO_SPEECH_MESSAGE });
    });

    it('ends the call on any other event', async () => {
      const server = await serve(await createFakeChatbot());

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/voice/webhook',
        payload: { status: 'call_ended' },
      });

      expect(res.json()).toEqual({ response: CALL_ENDED_MESSAGE, action: 'end_call' });
    });

    it('answers 503 when a transcript needs the unavailable chatbot', async () => {
      const server = await serve(FAILED_INIT);

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/voice/webhook',
        payload: { status: 'conversation_update', transcript: 'refund?' },
      });

      expect(res.statusCode).toBe(503);
      expect(res.json().error).toBe(UNAVAILABLE_MESSAGE);
    });

    it('still greets while the chatbot is unavailable', async () => {
      const server = await serve(FAILED_INIT);

      const res = await server.inject({
        method: 'POST',
        url: '/api/v1/voice/webhook',
        payload: { status: 'call_started' },
      });

      expect(res.statusCode).toBe(200);
    });
  });

  it('answers unknown routes with the error body', async () => {
    const server = await serve(FAILED_INIT);

    const res = await server.inject({ method: 'GET', url: '/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      error: 'Route not found: GET /nope',
      error_code: '404',
      timestamp: expect.any(String),
    });
  });
});

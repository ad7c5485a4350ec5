/**
 * Query and session routes
 */

import { randomUUID } from 'node:crypto';
import type { FastifyInstance, FastifyReply } from 'fastify';

import { UNAVAILABLE_MESSAGE } from '../../agent/prompts.js';
import type { ServerContext } from '../context.js';
import { HttpError } from '../errors.js';
import {
  QueryRequestSchema,
  SessionQuerySchema,
  SessionRequestSchema,
  formatIssues,
} from '../schemas.js';
import type { Session } from '../session-store.js';

export interface QueryResponse {
  query_id: string;
  session_id: string;
  query: string;
  response: string;
  timestamp: string;
  processing_time_ms: number;
}

export interface SessionHistoryResponse {
  session_id: string;
  user_id: string | null;
  created_at: string;
  conversation_history: Array<{ query: string; response: string; timestamp: string }>;
}

/**
 * Signal that aborts when the client goes away before the reply is sent.
 */
export function abortOnDisconnect(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function registerQueryRoutes(app: FastifyInstance, context: ServerContext): void {
  const { sessions } = context;

  app.post('/api/v1/query', async (request, reply): Promise<QueryResponse> => {
    const parsed = QueryRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw new HttpError(422, `Invalid request body: ${formatIssues(parsed.error)}`);
    }

    const { init } = context;
    if (!init.ok) {
      throw new HttpError(503, UNAVAILABLE_MESSAGE);
    }
    const { chatbot } = init;

    const body = parsed.data;
    let session: Session;
    if (body.session_id !== undefined) {
      const existing = sessions.get(body.session_id);
      if (!existing) {
        throw new HttpError(400, `Invalid session ID: ${body.session_id}`);
      }
      session = existing;
    } else {
      session = sessions.create(body.user_id ?? null);
    }

    const queryId = randomUUID();
    const signal = abortOnDisconnect(reply);
    const started = performance.now();

    const response = await sessions.withLock(session.id, () =>
      chatbot.getResponse(body.query, { memory: session.memory, signal })
    );

    const processingTimeMs = performance.now() - started;
    context.logger.debug(
      { queryId, sessionId: session.id, processingTimeMs },
      'Query answered'
    );

    return {
      query_id: queryId,
      session_id: session.id,
      query: body.query,
      response,
      timestamp: new Date().toISOString(),
      processing_time_ms: processingTimeMs,
    };
  });

  app.post('/api/v1/session', async (request) => {
    const query = SessionQuerySchema.safeParse(request.query);
    const body = SessionRequestSchema.safeParse(request.body);
    if (!query.success) {
      throw new HttpError(422, `Invalid query string: ${formatIssues(query.error)}`);
    }
    if (!body.success) {
      throw new HttpError(422, `Invalid request body: ${formatIssues(body.error)}`);
    }

    const session = sessions.create(query.data.user_id ?? body.data?.user_id ?? null);
    return { session_id: session.id, created_at: session.createdAt };
  });

  app.get<{ Params: { id: string } }>(
    '/api/v1/session/:id',
    async (request): Promise<SessionHistoryResponse> => {
      const { id } = request.params;
      const session = sessions.get(id);
      if (!session) {
        throw new HttpError(404, `Session not found: ${id}`);
      }

      return {
        session_id: session.id,
        user_id: session.userId,
        created_at: session.createdAt,
        conversation_history: session.memory.turns.map(({ query, response, timestamp }) => ({
          query,
          response,
          timestamp,
        })),
      };
    }
  );
}

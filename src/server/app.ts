/**
 * HTTP Server
 *
 * Fastify app around an already-initialized chatbot. The init result is
 * injected, so tests build servers around fakes or failed starts.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { Logger as PinoLogger } from 'pino';

import type { InitResult } from '../agent/types.js';
import type { Config } from '../config/schema.js';
import { createComponentLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import type { ServerContext } from './context.js';
import { errorBody, mapError } from './errors.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerQueryRoutes } from './routes/query.js';
import { registerVoiceRoutes } from './routes/voice.js';
import { SessionStore } from './session-store.js';

export interface CreateServerOptions {
  config: Config;
  /** Defaults to a store sized by config.session */
  sessions?: SessionStore;
  logger?: PinoLogger;
}

export function createServer(init: InitResult, options: CreateServerOptions): FastifyInstance {
  const { config } = options;
  const log = options.logger ?? createComponentLogger('server');

  const context: ServerContext = {
    init,
    sessions:
      options.sessions ??
      new SessionStore({
        maxSessions: config.session.max_sessions,
        ttlMs: config.session.ttl_ms,
        memoryWindow: config.memory.window,
        memoryMaxTurns: config.memory.max_turns,
      }),
    serviceName: config.server.service_name,
    version: VERSION,
    logger: log,
  };

  const app = Fastify({
    // Fastify's logger stays off; routes log through pino directly
    logger: false,
    disableRequestLogging: true,
    bodyLimit: 1024 * 1024,
    connectionTimeout: 30000,
    requestTimeout: 120000,
  });

  registerHealthRoutes(app, context);
  registerQueryRoutes(app, context);
  registerVoiceRoutes(app, context);

  app.setNotFoundHandler(async (request, reply) => {
    await reply.status(404).send(errorBody(404, `Route not found: ${request.method} ${request.url}`));
  });

  app.setErrorHandler(async (error, request, reply) => {
    const mapped = mapError(error);
    if (mapped.statusCode >= 500) {
      log.error({ err: error, method: request.method, url: request.url }, 'Request failed');
    } else {
      log.debug({ statusCode: mapped.statusCode, url: request.url }, mapped.message);
    }
    await reply.status(mapped.statusCode).send(errorBody(mapped.statusCode, mapped.message));
  });

  // Expired sessions are dropped lazily on access; sweep the rest periodically
  const sweep = setInterval(() => {
    const removed = context.sessions.prune();
    if (removed > 0) log.debug({ removed }, 'Pruned expired sessions');
  }, 60_000);
  sweep.unref();
  app.addHook('onClose', async () => {
    clearInterval(sweep);
  });

  return app;
}

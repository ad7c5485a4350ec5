/**
 * Server bootstrap: build the chatbot, start listening, shut down cleanly.
 */

import type { FastifyInstance } from 'fastify';

import { initChatbot } from '../agent/chatbot.js';
import type { InitResult } from '../agent/types.js';
import type { Config } from '../config/schema.js';
import { createComponentLogger, toLogger } from '../utils/logger.js';
import { createServer } from './app.js';

const serverLogger = createComponentLogger('server');

export interface RunServerOptions {
  /** Overrides config.server.host */
  host?: string;
  /** Overrides config.server.port */
  port?: number;
  /** Install SIGTERM/SIGINT handlers (default true) */
  handleSignals?: boolean;
}

export interface RunningServer {
  app: FastifyInstance;
  init: InitResult;
  /** Bound address, e.g. http://127.0.0.1:8000 */
  address: string;
  close: () => Promise<void>;
}

/**
 * Start serving. A failed chatbot start does not stop the server: it comes
 * up degraded and answers 503 on query routes.
 */
export async function runServer(config: Config, options: RunServerOptions = {}): Promise<RunningServer> {
  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;

  const init = await initChatbot(config, { logger: toLogger(createComponentLogger('chatbot')) });
  if (init.ok) {
    serverLogger.info(init.info, 'Chatbot ready');
  } else {
    serverLogger.error({ err: init.error }, 'Chatbot unavailable; serving in degraded mode');
  }

  const app = createServer(init, { config, logger: serverLogger });

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= (async () => {
      await app.close();
      if (init.ok) init.chatbot.close();
    })();
    return closing;
  };

  if (options.handleSignals ?? true) {
    const shutdown = async (signal: string): Promise<void> => {
      serverLogger.info({ signal }, 'Shutting down...');
      try {
        await close();
        serverLogger.info('Shutdown complete');
      } catch (error) {
        serverLogger.error({ err: error }, 'Shutdown failed');
        process.exitCode = 1;
      }
    };
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
    process.once('SIGINT', () => void shutdown('SIGINT'));
  }

  const address = await app.listen({ host, port });
  serverLogger.info({ host, port }, 'Listening');

  return { app, init, address, close };
}

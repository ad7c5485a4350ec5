import type { FastifyInstance } from 'fastify';

import type { ServerContext } from '../context.js';

export interface HealthResponse {
  status: 'ok' | 'degraded';
  service: string;
  timestamp: string;
}

export function registerHealthRoutes(app: FastifyInstance, context: ServerContext): void {
  // Always 200: a failed start is reported, not hidden behind an error
  app.get('/health', async (): Promise<HealthResponse> => ({
    status: context.init.ok ? 'ok' : 'degraded',
    service: context.serviceName,
    timestamp: new Date().toISOString(),
  }));

  app.get('/', async () => ({
    service: context.serviceName,
    version: context.version,
  }));
}

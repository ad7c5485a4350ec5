import type { Logger as PinoLogger } from 'pino';

import type { InitResult } from '../agent/types.js';
import type { SessionStore } from './session-store.js';

/**
 * What every route needs. The init result is read per request, so a failed
 * start answers 503 instead of taking the process down.
 */
export interface ServerContext {
  init: InitResult;
  sessions: SessionStore;
  serviceName: string;
  version: string;
  logger: PinoLogger;
}

/**
 * Server Module
 *
 * HTTP API over the support chatbot.
 */

export { createServer, type CreateServerOptions } from './app.js';
export { runServer, type RunServerOptions, type RunningServer } from './run.js';
export { SessionStore, type Session, type SessionStoreOptions } from './session-store.js';
export { HttpError, errorBody, mapError, type ErrorBody, type MappedError } from './errors.js';
export type { ServerContext } from './context.js';
export type { QueryResponse, SessionHistoryResponse } from './routes/query.js';
export type { HealthResponse } from './routes/health.js';
export {
  VOICE_GREETING,
  NO_SPEECH_MESSAGE,
  CALL_ENDED_MESSAGE,
  type VoiceAction,
  type VoiceWebhookResponse,
} from './routes/voice.js';

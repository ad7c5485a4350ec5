/**
 * Helpdesk RAG - Library Entry Point
 *
 * The `helpdesk` CLI (`serve`, `ask`, `chat`, `index`, `config`) covers most
 * uses. This module exports the pieces underneath it for embedding the
 * assistant in another service.
 *
 * @example Answer a question
 * ```typescript
 * import { initChatbot, loadConfig } from 'helpdesk-rag';
 *
 * const init = await initChatbot(loadConfig());
 * if (init.ok) {
 *   console.log(await init.chatbot.getResponse('How do I reset my password?'));
 * }
 * ```
 *
 * @example Serve the HTTP API
 * ```typescript
 * import { loadConfig, runServer } from 'helpdesk-rag';
 *
 * const { address } = await runServer(loadConfig(), { port: 8000 });
 * ```
 *
 * @packageDocumentation
 */

export * from './agent/index.js';
export * from './search/index.js';
export * from './indexer/index.js';
export * from './database/index.js';
export * from './providers/index.js';
export * from './server/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
export { VERSION } from './version.js';

/**
 * Agent Module
 *
 * The support chatbot and the retrieval strategies it chooses between:
 * plain vector search, HyDE, and RAG-Fusion (query expansion + RRF).
 *
 * @example
 * ```typescript
 * import { initChatbot, ConversationMemory } from './agent/index.js';
 * import { loadConfig } from './config/index.js';
 *
 * const init = await initChatbot(loadConfig());
 * if (init.ok) {
 *   const memory = new ConversationMemory(5);
 *   console.log(await init.chatbot.getResponse('How do I reset my password?', { memory }));
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Chatbot
// ============================================================================

export { SupportChatbot, initChatbot, type SupportChatbotOptions } from './chatbot.js';

export { ConversationMemory, type ConversationTurn } from './memory.js';

// ============================================================================
// Retrieval strategies
// ============================================================================

export { QueryExpander, parseQueryList, type QueryExpanderOptions } from './query-expander.js';

export {
  HypotheticalAnswerGenerator,
  HydeRetriever,
  type HypotheticalAnswerOptions,
} from './hyde.js';

export { retrieveFused, type FusedRetrievalOptions } from './rag-fusion.js';

// ============================================================================
// Prompts and fixed replies
// ============================================================================

export {
  PRODUCT_NAME,
  EMPTY_QUERY_MESSAGE,
  FALLBACK_MESSAGE,
  UNAVAILABLE_MESSAGE,
  SUPPORT_SYSTEM_PROMPT,
  buildAnswerPrompt,
  buildHydePrompt,
  buildQueryExpansionPrompt,
  formatContext,
  type AnswerPromptInput,
} from './prompts.js';

// ============================================================================
// Types
// ============================================================================

export {
  settingsFromConfig,
  strategyOf,
  type ChatbotSettings,
  type RetrievalStrategy,
  type AnswerOptions,
  type ChatbotAnswer,
  type InitOverrides,
  type ChatbotInfo,
  type InitResult,
} from './types.js';

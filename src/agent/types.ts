/**
 * Agent Types
 *
 * Types for the support chatbot and its initialization.
 */

import type { Config } from '../config/schema.js';
import type { CLIError } from '../errors/index.js';
import type { CompletionService, EmbeddingService } from '../providers/types.js';
import type { Chunk, IndexBuildProgress, VectorStore } from '../search/types.js';
import type { Logger } from '../utils/logger.js';
import type { ConversationMemory } from './memory.js';
import type { SupportChatbot } from './chatbot.js';

// ============================================================================
// SETTINGS
// ============================================================================

/**
 * Retrieval and synthesis settings, resolved from config.
 */
export interface ChatbotSettings {
  /** Chunks given to the model (search.top_k) */
  topK: number;
  /** Embed a hypothetical answer instead of the question (rag.hyde) */
  hyde: boolean;
  /** Expand into several queries and fuse (rag.rag_fusion) */
  ragFusion: boolean;
  kQueries: number;
  perQueryK: number;
  rrfK: number;
  /** LLM reranking before truncation (search.rerank) */
  rerank: boolean;
  rerankCandidates: number;
}

/**
 * Which retrieval path a chatbot runs.
 */
export type RetrievalStrategy = 'rag-fusion+hyde' | 'rag-fusion' | 'hyde' | 'vector';

export function settingsFromConfig(config: Config): ChatbotSettings {
  return {
    topK: config.search.top_k,
    hyde: config.rag.hyde,
    ragFusion: config.rag.rag_fusion,
    kQueries: config.rag.k_queries,
    perQueryK: config.rag.per_query_k,
    rrfK: config.rag.rrf_k,
    rerank: config.search.rerank,
    rerankCandidates: config.search.rerank_candidates,
  };
}

export function strategyOf(settings: Pick<ChatbotSettings, 'hyde' | 'ragFusion'>): RetrievalStrategy {
  if (settings.ragFusion) return settings.hyde ? 'rag-fusion+hyde' : 'rag-fusion';
  return settings.hyde ? 'hyde' : 'vector';
}

// ============================================================================
// ANSWERS
// ============================================================================

export interface AnswerOptions {
  /** Conversation to read history from and append the turn to */
  memory?: ConversationMemory;
  /** Cancels the request; the call then rejects instead of apologizing */
  signal?: AbortSignal;
}

export interface ChatbotAnswer {
  response: string;
  /** Chunks the answer was synthesized from (empty on fallback) */
  sources: Chunk[];
  /** True when the fixed apology or empty-question reply was returned */
  fallback: boolean;
}

// ============================================================================
// INITIALIZATION
// ============================================================================

/**
 * Collaborators that replace the ones built from config (tests, CLI flags).
 */
export interface InitOverrides {
  completion?: CompletionService;
  embedder?: EmbeddingService;
  store?: VectorStore;
  logger?: Logger;
  /** Rebuild a persisted index even when it is current */
  forceReindex?: boolean;
  onProgress?: (progress: IndexBuildProgress) => void;
}

export interface ChatbotInfo {
  /** `<provider>/<model>` */
  llm: string;
  embedding: string;
  strategy: RetrievalStrategy;
  rerank: boolean;
  knowledgeBase: string;
  chunkCount: number;
  reusedIndex: boolean;
}

/**
 * Outcome of building the chatbot. Failure is a value, not an exception:
 * the server stays up and reports itself degraded.
 */
export type InitResult =
  | { ok: true; chatbot: SupportChatbot; info: ChatbotInfo }
  | { ok: false; error: CLIError };

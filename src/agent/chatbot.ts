/**
 * Support Chatbot
 *
 * ARCHITECTURE:
 * ```
 * question
 *     │
 *     ├── rag_fusion ─► QueryExpander ─► N × base search ─► RRF
 *     │                                  (HyDE when hyde is on)
 *     ├── hyde only ──► HypotheticalAnswerGenerator ─► vector search
 *     └── neither ────► vector search
 *     │
 *     ├── [optional] LLMReranker
 *     ▼
 * top_k chunks + conversation history ─► completion ─► answer
 * ```
 *
 * The chatbot holds no per-user state; callers pass a ConversationMemory.
 */

import type { Config } from '../config/schema.js';
import { assertStartupConfig } from '../config/startup-validation.js';
import { CLIError } from '../errors/index.js';
import { loadKnowledgeBase } from '../indexer/knowledge-base.js';
import { buildIndex } from '../indexer/pipeline.js';
import { createCompletionService, createEmbeddingService } from '../providers/llm.js';
import { isCancellation } from '../providers/errors.js';
import type { CompletionService } from '../providers/types.js';
import type { DocumentStore } from '../search/retriever.js';
import { LLMReranker } from '../search/reranker.js';
import { createVectorStore } from '../search/store.js';
import type { Chunk, VectorStore } from '../search/types.js';
import type { Logger } from '../utils/logger.js';
import { HydeRetriever, HypotheticalAnswerGenerator } from './hyde.js';
import {
  EMPTY_QUERY_MESSAGE,
  FALLBACK_MESSAGE,
  SUPPORT_SYSTEM_PROMPT,
  buildAnswerPrompt,
} from './prompts.js';
import { QueryExpander } from './query-expander.js';
import { retrieveFused } from './rag-fusion.js';
import {
  settingsFromConfig,
  strategyOf,
  type AnswerOptions,
  type ChatbotAnswer,
  type ChatbotSettings,
  type InitOverrides,
  type InitResult,
  type RetrievalStrategy,
} from './types.js';

export interface SupportChatbotOptions {
  completion: CompletionService;
  documentStore: DocumentStore;
  settings: ChatbotSettings;
  logger?: Logger;
}

export class SupportChatbot {
  private readonly completion: CompletionService;
  private readonly documentStore: DocumentStore;
  private readonly settings: ChatbotSettings;
  private readonly logger?: Logger;

  private readonly expander: QueryExpander;
  private readonly hyde: HydeRetriever;
  private readonly reranker: LLMReranker;

  constructor(options: SupportChatbotOptions) {
    this.completion = options.completion;
    this.documentStore = options.documentStore;
    this.settings = options.settings;
    this.logger = options.logger;

    this.expander = new QueryExpander(this.completion, { logger: this.logger });
    this.hyde = new HydeRetriever(
      new HypotheticalAnswerGenerator(this.completion, { logger: this.logger }),
      this.documentStore
    );
    this.reranker = new LLMReranker(this.completion, {
      candidateCount: this.settings.rerankCandidates,
      logger: this.logger,
    });
  }

  get strategy(): RetrievalStrategy {
    return strategyOf(this.settings);
  }

  /**
   * Retrieve the context for a question: at most top_k chunks, best first.
   */
  async retrieve(question: string, signal?: AbortSignal): Promise<Chunk[]> {
    const { topK, rerank, rerankCandidates, ragFusion, hyde } = this.settings;
    // The reranker needs a wider pool than the final context
    const depth = rerank ? Math.max(topK, rerankCandidates) : topK;

    let chunks: Chunk[];
    if (ragFusion) {
      const baseSearch = hyde ? this.hyde.asBaseSearch() : this.documentStore.asBaseSearch();
      chunks = await retrieveFused(question, baseSearch, this.settings.kQueries, {
        expander: this.expander,
        perQueryK: this.settings.perQueryK,
        rrfK: this.settings.rrfK,
        signal,
        logger: this.logger,
      });
    } else if (hyde) {
      chunks = await this.hyde.search(question, depth, signal);
    } else {
      chunks = await this.documentStore.search(question, depth, signal);
    }

    if (rerank) {
      chunks = await this.reranker.rerank(question, chunks, topK, signal);
    }
    return chunks.slice(0, topK);
  }

  /**
   * Answer a question with its sources.
   *
   * Never rejects for upstream failures: they produce the fixed apology.
   * A cancelled request rejects with the cancellation.
   */
  async answer(query: string, options: AnswerOptions = {}): Promise<ChatbotAnswer> {
    const { memory, signal } = options;
    const question = query.trim();
    if (!question) {
      return { response: EMPTY_QUERY_MESSAGE, sources: [], fallback: true };
    }

    try {
      const sources = await this.retrieve(question, signal);
      const prompt = buildAnswerPrompt({
        question,
        context: sources,
        history: memory?.render() ?? '',
      });
      const response = (
        await this.completion.complete(prompt, { system: SUPPORT_SYSTEM_PROMPT, signal })
      ).trim();

      memory?.add({ query: question, response, timestamp: new Date().toISOString() });
      return { response, sources, fallback: false };
    } catch (error) {
      if (signal?.aborted || isCancellation(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.error?.(`Error during answer generation: ${reason}`);
      return { response: FALLBACK_MESSAGE, sources: [], fallback: true };
    }
  }

  /**
   * Answer a question.
   *
   * @example
   * ```typescript
   * const memory = new ConversationMemory(5);
   * await chatbot.getResponse('What are the fees for domestic transfers?', { memory });
   * await chatbot.getResponse('And for international ones?', { memory });
   * ```
   */
  async getResponse(query: string, options: AnswerOptions = {}): Promise<string> {
    return (await this.answer(query, options)).response;
  }

  async count(): Promise<number> {
    return this.documentStore.count();
  }

  close(): void {
    this.documentStore.close();
  }
}

function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CLIError(message);
}

/**
 * Build a chatbot from config: check keys, create services, load and index
 * the knowledge base.
 *
 * Never throws; failures come back as `{ ok: false, error }`.
 *
 * @example
 * ```typescript
 * const init = await initChatbot(loadConfig());
 * if (!init.ok) {
 *   console.error(init.error.message);
 * } else {
 *   console.log(await init.chatbot.getResponse('How do I reset my password?'));
 * }
 * ```
 */
export async function initChatbot(config: Config, overrides: InitOverrides = {}): Promise<InitResult> {
  const { logger } = overrides;
  let store: VectorStore | undefined;

  try {
    assertStartupConfig(config, {
      skipLLM: overrides.completion !== undefined,
      skipEmbedding: overrides.embedder !== undefined,
    });
    const completion = overrides.completion ?? createCompletionService(config);
    const embedder = overrides.embedder ?? createEmbeddingService(config);

    const knowledgeBase = loadKnowledgeBase(config.knowledge_base);
    logger?.debug?.(`Loaded ${knowledgeBase.chunks.length} chunks from ${knowledgeBase.path}`);

    store = overrides.store ?? createVectorStore(config, logger);
    const index = await buildIndex({
      knowledgeBase,
      embedder,
      store,
      batchSize: config.embedding.batch_size,
      force: overrides.forceReindex,
      onProgress: overrides.onProgress,
      logger,
    });

    const settings = settingsFromConfig(config);
    const chatbot = new SupportChatbot({
      completion,
      documentStore: index.documentStore,
      settings,
      logger,
    });

    return {
      ok: true,
      chatbot,
      info: {
        llm: `${completion.provider}/${completion.model}`,
        embedding: `${embedder.provider}/${embedder.model}`,
        strategy: chatbot.strategy,
        rerank: settings.rerank,
        knowledgeBase: knowledgeBase.path,
        chunkCount: index.chunkCount,
        reusedIndex: index.reused,
      },
    };
  } catch (error) {
    store?.close?.();
    const cliError = toCLIError(error);
    logger?.error?.(`Chatbot initialization failed: ${cliError.message}`);
    return { ok: false, error: cliError };
  }
}

/**
 * Support Chatbot Tests
 *
 * Fake services make every completion and embedding deterministic; the
 * completion fake answers by prompt type.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { SupportChatbot, initChatbot } from '../chatbot.js';
import { ConversationMemory } from '../memory.js';
import { EMPTY_QUERY_MESSAGE, FALLBACK_MESSAGE, SUPPORT_SYSTEM_PROMPT } from '../prompts.js';
import type { ChatbotSettings } from '../types.js';
import { DocumentStore } from '../../search/retriever.js';
import { InMemoryVectorStore } from '../../search/store.js';
import { ConfigSchema, type Config } from '../../config/schema.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { _clearEnvCache } from '../../config/env.js';
import {
  APIKeyError,
  KnowledgeBaseError,
  UpstreamServiceError,
} from '../../errors/index.js';
import { FakeCompletionService, FakeEmbeddingService } from '../../test-utils/index.js';

const VOCABULARY = ['refund', 'card', 'transfer', 'fee', 'password'];

const ARTICLES = [
  'A refund is issued within 5 business days.',
  'A replacement card arrives in 7 days.',
  'Domestic transfer fee is 0.5 percent.',
  'Reset your password from the login screen.',
];

const SETTINGS: ChatbotSettings = {
  topK: 1,
  hyde: false,
  ragFusion: false,
  kQueries: 2,
  perQueryK: 2,
  rrfK: 60,
  rerank: false,
  rerankCandidates: 3,
};

/**
 * Replies by prompt type: expansion, HyDE, rerank, otherwise the answer.
 */
function scriptedCompletion(answer = 'ANSWER'): FakeCompletionService {
  return new FakeCompletionService((prompt) => {
    if (prompt.includes('search query generator')) return 'refund policy\ncard fee';
    if (prompt.includes('hypothetical answer to the following question')) {
      return 'Your new card ships soon.';
    }
    if (prompt.includes('Rank the passages')) return '2, 1';
    return answer;
  });
}

async function createChatbot(
  completion: FakeCompletionService,
  settings: Partial<ChatbotSettings> = {},
  embedder = new FakeEmbeddingService(VOCABULARY)
) {
  const documentStore = new DocumentStore(embedder, new InMemoryVectorStore());
  await documentStore.add(
    ARTICLES.map((content, index) => ({ content, metadata: { source: 'faq.txt', index } }))
  );
  const logger = { warn: vi.fn(), error: vi.fn() };
  const chatbot = new SupportChatbot({
    completion,
    documentStore,
    settings: { ...SETTINGS, ...settings },
    logger,
  });
  return { chatbot, embedder, logger };
}

describe('SupportChatbot', () => {
  describe('getResponse', () => {
    it('asks for a question when the query is blank', async () => {
      const completion = scriptedCompletion();
      const { chatbot } = await createChatbot(completion);

      expect(await chatbot.getResponse('   ')).toBe(EMPTY_QUERY_MESSAGE);
      expect(completion.calls).toHaveLength(0);
    });

    it('answers from the retrieved context with the support system prompt', async () => {
      const completion = scriptedCompletion();
      const { chatbot } = await createChatbot(completion);

      const response = await chatbot.getResponse('  How do I get a refund?  ');

      expect(response).toBe('ANSWER');
      expect(completion.calls).toHaveLength(1);
      expect(completion.calls[0]?.prompt).toBe(
        'Context:\n[1] A refund is issued within 5 business days.\n\nQuestion: How do I get a refund?\n\nAnswer:'
      );
      expect(completion.calls[0]?.options.system).toBe(SUPPORT_SYSTEM_PROMPT);
    });

    it('trims the model answer', async () => {
      const { chatbot } = await createChatbot(scriptedCompletion('  Five days.\n'));
      expect(await chatbot.getResponse('refund?')).toBe('Five days.');
    });

    it('includes history and records the turn in memory', async () => {
      const completion = scriptedCompletion();
      const { chatbot } = await createChatbot(completion);
      const memory = new ConversationMemory(5);

      await chatbot.getResponse('How do I get a refund?', { memory });
      await chatbot.getResponse('And my card?', { memory });

      expect(memory.turns.map((t) => [t.query, t.response])).toEqual([
        ['How do I get a refund?', 'ANSWER'],
        ['And my card?', 'ANSWER'],
      ]);
      expect(completion.calls[1]?.prompt.startsWith(
        'Conversation so far:\nCustomer: How do I get a refund?\nAgent: ANSWER\n\nContext:\n'
      )).toBe(true);
    });

    it('returns the fixed apology when synthesis fails, without touching memory', async () => {
      const completion = new FakeCompletionService(
        new UpstreamServiceError('openai', 'api', 'Internal server error')
      );
      const { chatbot, logger } = await createChatbot(completion);
      const memory = new ConversationMemory(5);

      expect(await chatbot.getResponse('refund?', { memory })).toBe(FALLBACK_MESSAGE);
      expect(memory.length).toBe(0);
      expect(logger.error).toHaveBeenCalledWith(
        'Error during answer generation: openai: Internal server error'
      );
    });

    it('returns the fixed apology when retrieval fails', async () => {
      const { chatbot, embedder } = await createChatbot(scriptedCompletion());
      embedder.error = new UpstreamServiceError('openai', 'network', 'ECONNREFUSED');

      expect(await chatbot.getResponse('refund?')).toBe(FALLBACK_MESSAGE);
    });

    it('rejects when the request is cancelled', async () => {
      const { chatbot } = await createChatbot(scriptedCompletion());
      const controller = new AbortController();
      controller.abort();

      await expect(chatbot.getResponse('refund?', { signal: controller.signal })).rejects.toThrow();
    });
  });

  describe('retrieval strategies', () => {
    it('uses plain vector search by default', async () => {
      const { chatbot } = await createChatbot(scriptedCompletion());

      const answer = await chatbot.answer('password help');

      expect(chatbot.strategy).toBe('vector');
      expect(answer.sources.map((c) => c.content)).toEqual([ARTICLES[3]]);
      expect(answer.fallback).toBe(false);
    });

    it('fuses the expanded queries with rag_fusion', async () => {
      const completion = scriptedCompletion();
      const { chatbot } = await createChatbot(completion, { ragFusion: true, topK: 2 });

      const answer = await chatbot.answer('What does it cost?');

      // refund policy → [refund, card]; card fee → [card, transfer]
      expect(chatbot.strategy).toBe('rag-fusion');
      expect(answer.sources.map((c) => c.content)).toEqual([ARTICLES[1], ARTICLES[0]]);
      expect(answer.sources[0]?.metadata.score).toBeCloseTo(1 / 61 + 1 / 60, 12);
      expect(completion.calls).toHaveLength(2);
    });

    it('searches by hypothetical answer with hyde', async () => {
      const { chatbot, embedder } = await createChatbot(scriptedCompletion(), { hyde: true });
      embedder.calls.length = 0;

      const answer = await chatbot.answer('Where is my replacement?');

      expect(chatbot.strategy).toBe('hyde');
      expect(embedder.calls).toEqual([['Your new card ships soon.']]);
      expect(answer.sources.map((c) => c.content)).toEqual([ARTICLES[1]]);
    });

    it('runs HyDE under every fused sub-query when both are on', async () => {
      const completion = scriptedCompletion();
      const { chatbot } = await createChatbot(completion, { hyde: true, ragFusion: true });

      await chatbot.answer('What does it cost?');

      expect(chatbot.strategy).toBe('rag-fusion+hyde');
      // expansion + one HyDE per sub-query + answer
      expect(completion.calls).toHaveLength(4);
    });

    it('reranks a wider candidate pool down to top_k', async () => {
      const completion = scriptedCompletion();
      const { chatbot } = await createChatbot(completion, { rerank: true });

      const answer = await chatbot.answer('refund');

      // candidates [refund, card, transfer]; the model ranks 2 first
      expect(answer.sources).toEqual([
        { content: ARTICLES[1], metadata: { source: 'faq.txt', index: 1, similarity: 0, rerankPosition: 0 } },
      ]);
      expect(completion.calls[0]?.prompt).toContain('[3] Domestic transfer fee is 0.5 percent.');
    });
  });
});

describe('initChatbot', () => {
  let dir: string;

  function config(knowledgeBasePath: string): Config {
    return ConfigSchema.parse({
      ...DEFAULT_CONFIG,
      knowledge_base: { ...DEFAULT_CONFIG.knowledge_base, path: knowledgeBasePath },
    });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'helpdesk-init-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('builds a ready chatbot from config', async () => {
    const path = join(dir, 'faq.txt');
    writeFileSync(path, ARTICLES.join('\n\n'));

    const init = await initChatbot(config(path), {
      completion: scriptedCompletion(),
      embedder: new FakeEmbeddingService(VOCABULARY),
    });

    expect(init.ok).toBe(true);
    if (!init.ok) return;
    expect(init.info).toEqual({
      llm: 'openai/fake-llm',
      embedding: 'openai/fake-embedding',
      strategy: 'vector',
      rerank: false,
      knowledgeBase: path,
      chunkCount: 1,
      reusedIndex: false,
    });
    expect(await init.chatbot.getResponse('refund?')).toBe('ANSWER');
  });

  it('fails with KnowledgeBaseError when the file is missing', async () => {
    const init = await initChatbot(config(join(dir, 'missing.txt')), {
      completion: scriptedCompletion(),
      embedder: new FakeEmbeddingService(VOCABULARY),
    });

    expect(init.ok).toBe(false);
    if (init.ok) return;
    expect(init.error).toBeInstanceOf(KnowledgeBaseError);
  });

  it('fails with APIKeyError when the provider key is missing', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    _clearEnvCache();

    const init = await initChatbot(config(join(dir, 'faq.txt')));

    expect(init.ok).toBe(false);
    if (init.ok) return;
    expect(init.error).toBeInstanceOf(APIKeyError);
    expect(init.error.message).toBe('OPENAI_API_KEY environment variable is not set');
  });
});

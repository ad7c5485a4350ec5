/**
 * A ready chatbot over fake services, for tests of the surfaces around it.
 */

import { SupportChatbot } from '../agent/chatbot.js';
import type { ChatbotSettings, InitResult } from '../agent/types.js';
import { DocumentStore } from '../search/retriever.js';
import { InMemoryVectorStore } from '../search/store.js';
import { FakeCompletionService, FakeEmbeddingService } from './fakes.js';

export type ReadyInit = Extract<InitResult, { ok: true }>;

export const TEST_VOCABULARY = ['refund', 'card', 'password'];

export const TEST_ARTICLES = [
  'A refund is issued within 5 business days.',
  'A replacement card arrives in 7 days.',
  'Reset your password from the login screen.',
];

export const TEST_SETTINGS: ChatbotSettings = {
  topK: 1,
  hyde: false,
  ragFusion: false,
  kQueries: 2,
  perQueryK: 2,
  rrfK: 60,
  rerank: false,
  rerankCandidates: 3,
};

export interface FakeChatbotOptions {
  completion?: FakeCompletionService;
  embedder?: FakeEmbeddingService;
  settings?: Partial<ChatbotSettings>;
}

export async function createFakeChatbot(options: FakeChatbotOptions = {}): Promise<ReadyInit> {
  const completion = options.completion ?? new FakeCompletionService('ANSWER');
  const embedder = options.embedder ?? new FakeEmbeddingService(TEST_VOCABULARY);
  const documentStore = new DocumentStore(embedder, new InMemoryVectorStore());
  await documentStore.add(
    TEST_ARTICLES.map((content, index) => ({ content, metadata: { source: 'faq.txt', index } }))
  );

  const settings = { ...TEST_SETTINGS, ...options.settings };
  const chatbot = new SupportChatbot({ completion, documentStore, settings });
  return {
    ok: true,
    chatbot,
    info: {
      llm: `${completion.provider}/${completion.model}`,
      embedding: `${embedder.provider}/${embedder.model}`,
      strategy: chatbot.strategy,
      rerank: settings.rerank,
      knowledgeBase: 'faq.txt',
      chunkCount: TEST_ARTICLES.length,
      reusedIndex: false,
    },
  };
}

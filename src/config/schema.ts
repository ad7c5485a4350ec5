/**
 * Configuration Schema
 *
 * Defines the shape of ~/.helpdesk/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * LLM provider selector. Chosen once at load time; the provider factory
 * switches over it exhaustively.
 */
export const LLMProviderTypeSchema = z.enum(['openai', 'gemini', 'anthropic']);
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

/**
 * Embedding provider selector (Anthropic has no embedding API).
 */
export const EmbeddingProviderTypeSchema = z.enum(['openai', 'gemini']);
export type EmbeddingProviderType = z.infer<typeof EmbeddingProviderTypeSchema>;

export const VectorStoreBackendSchema = z.enum(['memory', 'sqlite']);
export type VectorStoreBackend = z.infer<typeof VectorStoreBackendSchema>;

/**
 * Completion model settings
 */
export const LLMConfigSchema = z.object({
  provider: LLMProviderTypeSchema.describe('LLM provider (openai, gemini or anthropic)'),
  model: z.string().min(1).describe('Chat/completion model identifier'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
  max_tokens: z.number().int().min(16).max(8192).describe('Maximum tokens per completion'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for a single completion call (1000-600000)'),
});

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderTypeSchema.describe('Embedding provider (openai or gemini)'),
  model: z.string().min(1).describe('Embedding model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .describe('Number of texts to embed per request'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for a single embedding request'),
});

/**
 * Vector store backend and persistence location
 */
export const VectorStoreConfigSchema = z.object({
  backend: VectorStoreBackendSchema.describe('memory (rebuilt each start) or sqlite (persisted)'),
  persist_dir: z.string().min(1).describe('Directory for the sqlite index (~ expands to home)'),
});

/**
 * Knowledge base source and chunking
 */
export const KnowledgeBaseConfigSchema = z
  .object({
    path: z.string().min(1).describe('UTF-8 text file with the support knowledge base'),
    chunk_size: z.number().int().min(64).max(8192).describe('Target chunk size in characters'),
    chunk_overlap: z.number().int().min(0).max(4096).describe('Characters shared by neighbouring chunks'),
    separator: z.string().describe('Preferred split point (paragraph break by default)'),
  })
  .refine((kb) => kb.chunk_overlap < kb.chunk_size, {
    message: 'chunk_overlap must be smaller than chunk_size',
    path: ['chunk_overlap'],
  });

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(50).describe('Chunks passed to the answer prompt'),
  rerank: z.boolean().describe('Rerank retrieved chunks with the LLM before answering'),
  rerank_candidates: z
    .number()
    .int()
    .min(1)
    .max(100)
    .describe('How many retrieved chunks the reranker looks at'),
});

/**
 * Retrieval strategies: HyDE and RAG-Fusion
 */
export const RAGConfigSchema = z.object({
  hyde: z.boolean().describe('Search with a hypothetical answer instead of the literal question'),
  rag_fusion: z.boolean().describe('Expand the question into several queries and fuse with RRF'),
  k_queries: z.number().int().min(1).max(10).describe('Number of query variants for RAG-Fusion'),
  per_query_k: z.number().int().min(1).max(50).describe('Retrieval depth per query variant'),
  rrf_k: z.number().positive().max(1000).describe('Reciprocal Rank Fusion constant'),
});

export const MemoryConfigSchema = z.object({
  window: z.number().int().min(0).max(50).describe('Conversation turns included in prompts'),
  max_turns: z
    .number()
    .int()
    .min(1)
    .max(10000)
    .describe('Conversation turns kept per session before the oldest are dropped'),
});

export const SessionConfigSchema = z.object({
  max_sessions: z.number().int().min(1).max(1_000_000).describe('Sessions kept before LRU eviction'),
  ttl_ms: z.number().int().min(1000).describe('Idle time before a session expires'),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  service_name: z.string().min(1).describe('Name reported by /health and /'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  vector_store: VectorStoreConfigSchema,
  knowledge_base: KnowledgeBaseConfigSchema,
  search: SearchConfigSchema,
  rag: RAGConfigSchema,
  memory: MemoryConfigSchema,
  session: SessionConfigSchema,
  server: ServerConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults.
 * Every field becomes optional, allowing sparse config files.
 */
export const PartialConfigSchema = z.object({
  llm: LLMConfigSchema.partial().optional(),
  embedding: EmbeddingConfigSchema.partial().optional(),
  vector_store: VectorStoreConfigSchema.partial().optional(),
  knowledge_base: z
    .object({
      path: z.string().min(1),
      chunk_size: z.number().int().min(64).max(8192),
      chunk_overlap: z.number().int().min(0).max(4096),
      separator: z.string(),
    })
    .partial()
    .optional(),
  search: SearchConfigSchema.partial().optional(),
  rag: RAGConfigSchema.partial().optional(),
  memory: MemoryConfigSchema.partial().optional(),
  session: SessionConfigSchema.partial().optional(),
  server: ServerConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, or when it omits fields.
 * The loader merges the file ON TOP of these, then environment overrides.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  llm: {
    provider: 'openai',
    model: 'gpt-4.1-mini',
    temperature: 0.2, // factual support answers
    max_tokens: 1024,
    timeout_ms: 30000,
  },

  // text-embedding-ada-002 produces 1536-dimensional vectors
  embedding: {
    provider: 'openai',
    model: 'text-embedding-ada-002',
    batch_size: 64,
    timeout_ms: 30000,
  },

  vector_store: {
    backend: 'memory',
    persist_dir: '~/.helpdesk/index',
  },

  knowledge_base: {
    path: 'data/knowledge-base.txt',
    chunk_size: 512,
    chunk_overlap: 50,
    separator: '\n\n',
  },

  search: {
    top_k: 3,
    rerank: false,
    rerank_candidates: 10,
  },

  rag: {
    hyde: false,
    rag_fusion: false,
    k_queries: 4,
    per_query_k: 3,
    rrf_k: 60,
  },

  memory: {
    window: 5,
    max_turns: 100,
  },

  session: {
    max_sessions: 1000,
    ttl_ms: 60 * 60 * 1000,
  },

  server: {
    host: '0.0.0.0',
    port: 8000,
    service_name: 'Northwind Pay Support Assistant',
  },

  logging: {
    level: 'info',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.helpdesk/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Helpdesk Assistant Configuration
# Location: ~/.helpdesk/config.toml (or $HELPDESK_CONFIG)
# Environment variables (HELPDESK_*) override values in this file.

# Completion model: provider is one of "openai", "gemini", "anthropic"
# Keys come from OPENAI_API_KEY / GEMINI_API_KEY / ANTHROPIC_API_KEY
[llm]
provider = "${DEFAULT_CONFIG.llm.provider}"
model = "${DEFAULT_CONFIG.llm.model}"
temperature = ${DEFAULT_CONFIG.llm.temperature}
max_tokens = ${DEFAULT_CONFIG.llm.max_tokens}
timeout_ms = ${DEFAULT_CONFIG.llm.timeout_ms}

# Embeddings: provider is "openai" or "gemini"
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# backend = "memory" rebuilds the index at every start,
# "sqlite" persists it under persist_dir
[vector_store]
backend = "${DEFAULT_CONFIG.vector_store.backend}"
persist_dir = "${DEFAULT_CONFIG.vector_store.persist_dir}"

[knowledge_base]
path = "${DEFAULT_CONFIG.knowledge_base.path}"
chunk_size = ${DEFAULT_CONFIG.knowledge_base.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.knowledge_base.chunk_overlap}
separator = "\\n\\n"

[search]
top_k = ${DEFAULT_CONFIG.search.top_k}
rerank = ${DEFAULT_CONFIG.search.rerank}
rerank_candidates = ${DEFAULT_CONFIG.search.rerank_candidates}

# HyDE: search with a hypothetical answer
# RAG-Fusion: search with k_queries variants and fuse with Reciprocal Rank Fusion
[rag]
hyde = ${DEFAULT_CONFIG.rag.hyde}
rag_fusion = ${DEFAULT_CONFIG.rag.rag_fusion}
k_queries = ${DEFAULT_CONFIG.rag.k_queries}
per_query_k = ${DEFAULT_CONFIG.rag.per_query_k}
rrf_k = ${DEFAULT_CONFIG.rag.rrf_k}

[memory]
window = ${DEFAULT_CONFIG.memory.window}
max_turns = ${DEFAULT_CONFIG.memory.max_turns}

[session]
max_sessions = ${DEFAULT_CONFIG.session.max_sessions}
ttl_ms = ${DEFAULT_CONFIG.session.ttl_ms}

[server]
host = "${DEFAULT_CONFIG.server.host}"
port = ${DEFAULT_CONFIG.server.port}
service_name = "${DEFAULT_CONFIG.server.service_name}"

[logging]
level = "${DEFAULT_CONFIG.logging.level}"
`;

/**
 * Index Command
 *
 * Builds the persisted (sqlite) vector index for the knowledge base, so
 * `serve`, `ask` and `chat` start without re-embedding it.
 *
 * Usage:
 *   helpdesk index            Build, or report that the index is current
 *   helpdesk index --force    Rebuild even when current
 *   helpdesk index --json     Output progress as NDJSON
 *
 * The pipeline:
 * 1. Loading   - Read and chunk the knowledge base
 * 2. Embedding - Compute vector embeddings for each chunk
 * 3. Storing   - Save chunks and vectors to SQLite
 */

import { Command } from 'commander';

import { loadConfig } from '../../config/loader.js';
import { getIndexDbPath } from '../../config/paths.js';
import { CLIError } from '../../errors/index.js';
import { loadKnowledgeBase } from '../../indexer/knowledge-base.js';
import { buildIndex } from '../../indexer/pipeline.js';
import { createEmbeddingService } from '../../providers/llm.js';
import { createVectorStore } from '../../search/store.js';
import type { CommandContext } from '../types.js';
import { ProgressReporter } from '../utils/progress.js';

interface IndexCommandOptions {
  force?: boolean;
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .description('Build the persisted vector index for the knowledge base')
    .option('--force', 'Rebuild even if the index is up to date', false)
    .action(async (cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      if (config.vector_store.backend !== 'sqlite') {
        throw new CLIError(
          'vector_store.backend is "memory": there is no persisted index to build',
          'Run: helpdesk config set vector_store.backend sqlite'
        );
      }

      const knowledgeBase = loadKnowledgeBase(config.knowledge_base);
      ctx.debug(`Knowledge base: ${knowledgeBase.path} (${knowledgeBase.chunks.length} chunks)`);
      ctx.debug(`Embedding: ${config.embedding.provider}/${config.embedding.model}`);

      const embedder = createEmbeddingService(config);
      const store = createVectorStore(config, ctx);
      const reporter = new ProgressReporter({
        json: ctx.options.json,
        isInteractive: process.stdout.isTTY === true,
      });

      try {
        const result = await buildIndex({
          knowledgeBase,
          embedder,
          store,
          batchSize: config.embedding.batch_size,
          force: cmdOptions.force,
          onProgress: (progress) => reporter.update(progress),
          logger: ctx,
        });

        reporter.finish({
          knowledgeBase: knowledgeBase.path,
          indexPath: getIndexDbPath(config.vector_store.persist_dir),
          chunkCount: result.chunkCount,
          reused: result.reused,
          durationMs: result.durationMs,
        });
      } catch (error) {
        reporter.abort();
        throw error;
      } finally {
        store.close?.();
      }
    });
}

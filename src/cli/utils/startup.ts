/**
 * Chatbot startup for interactive commands: an ora spinner while the
 * knowledge base is embedded, and flags layered over the loaded config.
 */

import ora from 'ora';

import { initChatbot } from '../../agent/chatbot.js';
import type { InitResult } from '../../agent/types.js';
import type { Config } from '../../config/schema.js';
import type { IndexBuildProgress } from '../../search/types.js';
import type { CommandContext } from '../types.js';

export type ReadyChatbot = Extract<InitResult, { ok: true }>;

/**
 * Retrieval flags shared by `ask` and `chat`. Unset flags keep the config value.
 */
export interface StrategyFlags {
  fusion?: boolean;
  hyde?: boolean;
  rerank?: boolean;
  topK?: number;
}

export function applyStrategyFlags(config: Config, flags: StrategyFlags): Config {
  return {
    ...config,
    rag: {
      ...config.rag,
      rag_fusion: flags.fusion ?? config.rag.rag_fusion,
      hyde: flags.hyde ?? config.rag.hyde,
    },
    search: {
      ...config.search,
      rerank: flags.rerank ?? config.search.rerank,
      top_k: flags.topK ?? config.search.top_k,
    },
  };
}

export function describeProgress(progress: IndexBuildProgress): string {
  const label = progress.phase === 'embedding' ? 'Embedding' : 'Storing';
  return `${label} knowledge base ${progress.done}/${progress.total}`;
}

/**
 * Build the chatbot or throw the initialization error.
 */
export async function startChatbot(
  config: Config,
  ctx: CommandContext,
  options: { forceReindex?: boolean } = {}
): Promise<ReadyChatbot> {
  const spinner =
    !ctx.options.json && process.stderr.isTTY
      ? ora({ text: 'Loading knowledge base...' }).start()
      : null;

  const init = await initChatbot(config, {
    // Errors are reported once, by the global handler
    logger: { warn: ctx.warn, debug: ctx.debug },
    forceReindex: options.forceReindex,
    onProgress: (progress) => {
      if (spinner) spinner.text = describeProgress(progress);
    },
  });

  if (!init.ok) {
    spinner?.fail('Could not start the assistant');
    throw init.error;
  }

  const { info } = init;
  spinner?.succeed(
    `Ready: ${info.chunkCount} chunks, ${info.strategy} retrieval${info.reusedIndex ? ' (cached index)' : ''}`
  );
  ctx.debug(`LLM: ${info.llm}, embeddings: ${info.embedding}, rerank: ${info.rerank}`);
  return init;
}

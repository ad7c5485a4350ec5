/**
 * Ask Command
 *
 * One-shot question against the knowledge base.
 *
 *   helpdesk ask "How do I reset my password?"
 *   helpdesk ask "What are the transfer fees?" --fusion --rerank
 *   helpdesk ask "Where is my card?" --hyde --json
 *
 * Strategy flags override the config for this call only.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ChatbotAnswer } from '../../agent/types.js';
import { loadConfig } from '../../config/loader.js';
import { isCancellation } from '../../providers/errors.js';
import type { Chunk } from '../../search/types.js';
import type { CommandContext } from '../types.js';
import { applyStrategyFlags, startChatbot } from '../utils/startup.js';
import { AskArgsSchema, AskOptionsSchema, parseInput } from '../validation.js';

// ============================================================================
// Types
// ============================================================================

interface AskCommandOptions {
  topK?: string;
  fusion?: boolean;
  hyde?: boolean;
  rerank?: boolean;
}

export interface SourceJSON {
  source: string;
  index: number | null;
  /** Fusion score, or cosine similarity for single-query retrieval */
  score: number | null;
  content: string;
}

export interface AskOutputJSON {
  question: string;
  answer: string;
  fallback: boolean;
  sources: SourceJSON[];
  metadata: {
    strategy: string;
    rerank: boolean;
    llm: string;
    embedding: string;
    totalMs: number;
  };
}

// ============================================================================
// Formatting
// ============================================================================

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

export function toSourceJSON(chunk: Chunk): SourceJSON {
  const { source, index, score, similarity } = chunk.metadata;
  return {
    source: typeof source === 'string' ? source : 'unknown',
    index: numberOrNull(index),
    score: numberOrNull(score) ?? numberOrNull(similarity),
    content: chunk.content,
  };
}

const PREVIEW_LENGTH = 80;

/**
 * `[1] faq.txt#4  Domestic transfers cost 0.5 percent...`
 */
export function formatSources(chunks: readonly Chunk[]): string[] {
  return chunks.map((chunk, i) => {
    const { source, index } = toSourceJSON(chunk);
    const location = index === null ? source : `${source}#${index}`;
    const flat = chunk.content.replace(/\s+/g, ' ').trim();
    const preview = flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH)}...` : flat;
    return `[${i + 1}] ${location}  ${preview}`;
  });
}

function printAnswer(ctx: CommandContext, answer: ChatbotAnswer): void {
  ctx.log(answer.response);
  if (answer.sources.length > 0) {
    ctx.log('');
    ctx.log(chalk.bold('Sources:'));
    for (const line of formatSources(answer.sources)) {
      ctx.log(chalk.dim(`  ${line}`));
    }
  }
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question for the support assistant')
    .description('Ask one question and print the answer')
    .option('-k, --top-k <number>', 'Number of articles given to the model')
    .option('--fusion', 'Expand the question into several queries and fuse the results')
    .option('--hyde', 'Search with a hypothetical answer instead of the question')
    .option('--rerank', 'Rerank retrieved articles with the LLM')
    .action(async (rawQuestion: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();
      const startTime = performance.now();

      const { question } = parseInput(AskArgsSchema, { question: rawQuestion });
      const flags = parseInput(AskOptionsSchema, cmdOptions);
      ctx.debug(`Question: "${question}"`);

      const config = applyStrategyFlags(loadConfig(), flags);
      const { chatbot, info } = await startChatbot(config, ctx);

      // Ctrl+C cancels the in-flight request instead of killing the process
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);

      let answer: ChatbotAnswer;
      try {
        answer = await chatbot.answer(question, { signal: controller.signal });
      } catch (error) {
        if (!isCancellation(error) && !controller.signal.aborted) throw error;
        ctx.log(chalk.yellow('Cancelled.'));
        process.exitCode = 130;
        return;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        chatbot.close();
      }

      if (ctx.options.json) {
        const output: AskOutputJSON = {
          question,
          answer: answer.response,
          fallback: answer.fallback,
          sources: answer.sources.map(toSourceJSON),
          metadata: {
            strategy: info.strategy,
            rerank: info.rerank,
            llm: info.llm,
            embedding: info.embedding,
            totalMs: Math.round(performance.now() - startTime),
          },
        };
        console.log(JSON.stringify(output, null, 2));
      } else {
        printAnswer(ctx, answer);
      }

      if (answer.fallback) {
        process.exitCode = 1;
      }
    });
}

/**
 * Prompts and Fixed Replies
 *
 * Every text the assistant sends to the completion model, and every reply
 * it gives without one.
 */

import type { Chunk } from '../search/types.js';

export const PRODUCT_NAME = 'Northwind Pay';

// ============================================================================
// FIXED REPLIES
// ============================================================================

/** Reply to a blank question */
export const EMPTY_QUERY_MESSAGE = 'Please provide a question.';

/** Reply when retrieval or synthesis fails */
export const FALLBACK_MESSAGE =
  'Sorry, an unexpected error occurred while processing your request. Please try again later.';

/** Error text when the chatbot failed to initialize */
export const UNAVAILABLE_MESSAGE = 'Chatbot service is unavailable.';

// ============================================================================
// PROMPTS
// ============================================================================

export const SUPPORT_SYSTEM_PROMPT = `You are an expert customer support agent for ${PRODUCT_NAME}. Answer the user's question based ONLY on the provided context. If the context does not contain the answer, politely state that you do not have the information.`;

/**
 * Ask for `k` search queries, one per line.
 */
export function buildQueryExpansionPrompt(question: string, k: number): string {
  return `You are a search query generator. Generate ${k} diverse search queries that best capture the intent of the following question.

Question: ${question}

Write each query on its own line, with no numbering or extra text.

Generated queries:`;
}

/**
 * Ask for a hypothetical answer to embed in place of the question.
 */
export function buildHydePrompt(question: string): string {
  return `You are an expert customer support agent. Write a detailed but hypothetical answer to the following question. Do not use external knowledge, only your own sense of what an ideal answer would look like.

Question: ${question}

Hypothetical answer:`;
}

/**
 * Number retrieved chunks for the answer prompt.
 */
export function formatContext(chunks: readonly Chunk[]): string {
  if (chunks.length === 0) {
    return '(no relevant articles found)';
  }
  return chunks.map((chunk, i) => `[${i + 1}] ${chunk.content}`).join('\n\n');
}

export interface AnswerPromptInput {
  question: string;
  context: readonly Chunk[];
  /** Rendered conversation history; empty for a first question */
  history?: string;
}

export function buildAnswerPrompt({ question, context, history = '' }: AnswerPromptInput): string {
  const sections: string[] = [];
  if (history) {
    sections.push(`Conversation so far:\n${history}`);
  }
  sections.push(`Context:\n${formatContext(context)}`);
  sections.push(`Question: ${question}`);
  return `${sections.join('\n\n')}\n\nAnswer:`;
}

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';

vi.mock('../../../agent/chatbot.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../agent/chatbot.js')>()),
  initChatbot: vi.fn(),
}));
vi.mock('../../../config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../config/loader.js')>()),
  loadConfig: vi.fn(),
}));

import { initChatbot } from '../../../agent/chatbot.js';
import { FALLBACK_MESSAGE } from '../../../agent/prompts.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { loadConfig } from '../../../config/loader.js';
import { CLIError, ValidationError } from '../../../errors/index.js';
import {
  FakeCompletionService,
  TEST_ARTICLES,
  createFakeChatbot,
  createRecordingContext,
} from '../../../test-utils/index.js';
import type { GlobalOptions } from '../../types.js';
import { createAskCommand, formatSources, toSourceJSON, type AskOutputJSON } from '../ask.js';

async function runAsk(args: string[], options: Partial<GlobalOptions> = {}) {
  const recording = createRecordingContext(options);
  const program = new Command().exitOverride().addCommand(createAskCommand(() => recording.ctx));
  await program.parseAsync(['ask', ...args], { from: 'user' });
  return recording;
}

describe('formatSources', () => {
  it('numbers sources and shows where they came from', () => {
    const lines = formatSources([
      { content: 'Refunds\n  take   5 days.', metadata: { source: 'faq.txt', index: 4 } },
      { content: 'No index here.', metadata: { source: 'notes.txt' } },
    ]);
    expect(lines).toEqual(['[1] faq.txt#4  Refunds take 5 days.', '[2] notes.txt  No index here.']);
  });

  it('truncates long content to a preview', () => {
    const [line] = formatSources([{ content: 'a'.repeat(100), metadata: { source: 'faq.txt' } }]);
    expect(line).toBe(`[1] faq.txt  ${'a'.repeat(80)}...`);
  });
});

describe('toSourceJSON', () => {
  it('prefers the fusion score over similarity', () => {
    expect(
      toSourceJSON({ content: 'x', metadata: { source: 'faq.txt', index: 1, score: 0.03, similarity: 0.9 } })
    ).toEqual({ source: 'faq.txt', index: 1, score: 0.03, content: 'x' });
  });

  it('fills in missing metadata', () => {
    expect(toSourceJSON({ content: 'x', metadata: {} })).toEqual({
      source: 'unknown',
      index: null,
      score: null,
      content: 'x',
    });
  });
});

describe('ask command', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.mocked(loadConfig).mockReturnValue(DEFAULT_CONFIG);
    vi.mocked(initChatbot).mockReset();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('prints the answer and its sources', async () => {
    vi.mocked(initChatbot).mockResolvedValue(await createFakeChatbot());

    const { logs } = await runAsk(['How do I get a refund?']);

    expect(logs).toEqual([
      'ANSWER',
      '',
      'Sources:',
      `  [1] faq.txt#0  ${TEST_ARTICLES[0]}`,
    ]);
  });

  it('prints a JSON document with --json', async () => {
    vi.mocked(initChatbot).mockResolvedValue(await createFakeChatbot());

    const { logs } = await runAsk(['How do I get a refund?'], { json: true });

    expect(logs).toEqual([]);
    const output = JSON.parse(String(logSpy.mock.calls[0]?.[0])) as AskOutputJSON;
    expect(output.question).toBe('How do I get a refund?');
    expect(output.answer).toBe('ANSWER');
    expect(output.fallback).toBe(false);
    expect(output.sources).toEqual([
      { source: 'faq.txt', index: 0, score: 1, content: TEST_ARTICLES[0] },
    ]);
    expect(output.metadata).toMatchObject({
      strategy: 'vector',
      rerank: false,
      llm: 'openai/fake-llm',
      embedding: 'openai/fake-embedding',
    });
  });

  it('applies strategy flags to the config', async () => {
    vi.mocked(initChatbot).mockResolvedValue(await createFakeChatbot());

    await runAsk(['Where is my card?', '--fusion', '--hyde', '--top-k', '7']);

    const config = vi.mocked(initChatbot).mock.calls[0]?.[0];
    expect(config?.rag.rag_fusion).toBe(true);
    expect(config?.rag.hyde).toBe(true);
    expect(config?.search.top_k).toBe(7);
    expect(config?.search.rerank).toBe(false);
  });

  it('exits with 1 when the answer is the fallback apology', async () => {
    const completion = new FakeCompletionService(new Error('model overloaded'));
    vi.mocked(initChatbot).mockResolvedValue(await createFakeChatbot({ completion }));

    const { logs } = await runAsk(['How do I get a refund?']);

    expect(logs).toEqual([FALLBACK_MESSAGE]);
    expect(process.exitCode).toBe(1);
  });

  it('rejects a blank question before starting the chatbot', async () => {
    const run = runAsk(['   ']);

    await expect(run).rejects.toBeInstanceOf(ValidationError);
    await expect(run).rejects.toThrow('Question cannot be empty');
    expect(initChatbot).not.toHaveBeenCalled();
  });

  it('rejects an out-of-range --top-k', async () => {
    await expect(runAsk(['Fees?', '--top-k', '0'])).rejects.toThrow('top-k must be between 1 and 50');
  });

  it('surfaces initialization failures', async () => {
    const error = new CLIError('Knowledge base not found');
    vi.mocked(initChatbot).mockResolvedValue({ ok: false, error });

    await expect(runAsk(['Fees?'])).rejects.toBe(error);
  });
});

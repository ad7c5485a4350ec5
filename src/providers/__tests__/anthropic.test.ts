import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RateLimitError } from '@anthropic-ai/sdk';
import { AnthropicCompletionService } from '../anthropic.js';
import { UpstreamServiceError } from '../../errors/index.js';

const mocks = vi.hoisted(() => ({
  messagesCreate: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@anthropic-ai/sdk')>();
  return {
    ...actual,
    default: vi.fn().mockImplementation(function () {
      return { messages: { create: mocks.messagesCreate } };
    }),
  };
});

function service(): AnthropicCompletionService {
  return new AnthropicCompletionService({
    apiKey: 'test-secret',
    model: 'claude-3-5-haiku-latest',
    temperature: 0.2,
    maxTokens: 1024,
    timeoutMs: 1000,
  });
}

describe('AnthropicCompletionService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sends the system prompt separately and returns the text block', async () => {
    mocks.messagesCreate.mockResolvedValue({
      content: [{ type: 'text', text: 'You can reset it in Settings.' }],
    });

    const answer = await service().complete('How do I reset my PIN?', { system: 'Support agent' });

    expect(answer).toBe('You can reset it in Settings.');
    expect(mocks.messagesCreate).toHaveBeenCalledWith(
      {
        model: 'claude-3-5-haiku-latest',
        max_tokens: 1024,
        temperature: 0.2,
        system: 'Support agent',
        messages: [{ role: 'user', content: 'How do I reset my PIN?' }],
      },
      { signal: expect.any(AbortSignal) }
    );
  });

  it('reports a response without text as malformed', async () => {
    mocks.messagesCreate.mockResolvedValue({ content: [] });

    await expect(service().complete('Hello')).rejects.toMatchObject({
      kind: 'malformed',
      message: 'anthropic: no text content returned',
    });
  });

  it('maps rate limits to quota', async () => {
    mocks.messagesCreate.mockRejectedValue(
      new RateLimitError(429, undefined, 'Rate limited', {})
    );

    const rejection = service().complete('Hello');

    await expect(rejection).rejects.toBeInstanceOf(UpstreamServiceError);
    await expect(rejection).rejects.toMatchObject({ kind: 'quota', provider: 'anthropic' });
  });
});

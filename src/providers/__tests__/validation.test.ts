/**
 * API Key Validation Tests
 *
 * Verifies key format validation and error messages.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  validateProviderKey,
  getProviderKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
  GeminiKeySchema,
} from '../validation.js';
import { _clearEnvCache } from '../../config/env.js';
import { APIKeyError } from '../../errors/index.js';

beforeEach(() => {
  _clearEnvCache();
  vi.stubEnv('OPENAI_API_KEY', '');
  vi.stubEnv('GEMINI_API_KEY', '');
  vi.stubEnv('ANTHROPIC_API_KEY', '');
});

afterEach(() => {
  _clearEnvCache();
  vi.unstubAllEnvs();
});

describe('Key format schemas', () => {
  it('accepts each provider prefix', () => {
    expect(AnthropicKeySchema.safeParse('sk-ant-api03-test').success).toBe(true);
    expect(OpenAIKeySchema.safeParse('sk-proj-test').success).toBe(true);
    expect(GeminiKeySchema.safeParse('AIzaTestSecret').success).toBe(true);
  });

  it('rejects the wrong prefix', () => {
    expect(AnthropicKeySchema.safeParse('sk-test').success).toBe(false);
    expect(OpenAIKeySchema.safeParse('test-secret').success).toBe(false);
    expect(GeminiKeySchema.safeParse('sk-test').success).toBe(false);
  });
});

describe('validateProviderKey', () => {
  it('accepts a well-formed key', () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-secret');

    expect(validateProviderKey('openai')).toEqual({ valid: true });
  });

  it('reports a missing key with setup instructions', () => {
    const result = validateProviderKey('anthropic');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('ANTHROPIC_API_KEY environment variable is not set');
      expect(result.setupInstructions).toContain('console.anthropic.com');
    }
  });

  it('reports a malformed key', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'wrong-prefix-key');

    const result = validateProviderKey('anthropic');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Invalid Anthropic API key format (should start with "sk-ant-")');
    }
  });
});

describe('getProviderKey', () => {
  it('returns a valid key', () => {
    vi.stubEnv('GEMINI_API_KEY', 'AIzaTestSecret');

    expect(getProviderKey('gemini')).toBe('AIzaTestSecret');
  });

  it('throws APIKeyError without exposing the value', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');

    expect(() => getProviderKey('openai')).toThrow(APIKeyError);
    expect(() => getProviderKey('openai')).toThrow(
      'Invalid OpenAI API key format (should start with "sk-")'
    );
  });
});

/**
 * Tests for safe JSON parsing utility
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { safeJsonParse } from '../json.js';

const RecordSchema = z.record(z.unknown());

describe('safeJsonParse', () => {
  describe('valid JSON', () => {
    it('parses a JSON object', () => {
      const result = safeJsonParse('{"source":"kb.txt","index":2}', RecordSchema, {});
      expect(result).toEqual({ source: 'kb.txt', index: 2 });
    });

    it('parses an array with an array schema', () => {
      const result = safeJsonParse('[1,2,3]', z.array(z.number()), []);
      expect(result).toEqual([1, 2, 3]);
    });
  });

  describe('null/undefined input', () => {
    it('returns fallback for null input', () => {
      expect(safeJsonParse(null, RecordSchema, { empty: true })).toEqual({ empty: true });
    });

    it('returns fallback for undefined input', () => {
      expect(safeJsonParse(undefined, RecordSchema, { empty: true })).toEqual({ empty: true });
    });
  });

  describe('invalid input', () => {
    it('returns fallback for malformed JSON and reports it', () => {
      const onError = vi.fn();
      const result = safeJsonParse('{not json', RecordSchema, {}, onError);

      expect(result).toEqual({});
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[1]).toBe('{not json');
    });

    it('returns fallback when the value does not match the schema', () => {
      const onError = vi.fn();
      const result = safeJsonParse('[1,2]', RecordSchema, { fallback: 1 }, onError);

      expect(result).toEqual({ fallback: 1 });
      expect(onError).toHaveBeenCalledTimes(1);
    });

    it('does not require an error callback', () => {
      expect(safeJsonParse('"text"', RecordSchema, {})).toEqual({});
    });
  });
});

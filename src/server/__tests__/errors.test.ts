import { describe, it, expect } from 'vitest';

import { HttpError, errorBody, mapError } from '../errors.js';
import { CLIError, UpstreamServiceError, ValidationError } from '../../errors/index.js';

describe('mapError', () => {
  it('keeps the status and message of an HttpError', () => {
    expect(mapError(new HttpError(404, 'Session not found: abc'))).toEqual({
      statusCode: 404,
      message: 'Session not found: abc',
    });
  });

  it('maps validation failures to 422', () => {
    expect(mapError(new ValidationError('query is required'))).toEqual({
      statusCode: 422,
      message: 'query is required',
    });
  });

  it('maps cancellations to 499', () => {
    const error = new UpstreamServiceError('openai', 'cancelled', 'Request was aborted.');
    expect(mapError(error).statusCode).toBe(499);
  });

  it('passes through client errors carrying a statusCode', () => {
    const error = Object.assign(new Error('Body is too large'), { statusCode: 413 });
    expect(mapError(error)).toEqual({ statusCode: 413, message: 'Body is too large' });
  });

  it('hides the message of anything else behind a 500', () => {
    expect(mapError(new CLIError('database is locked'))).toEqual({
      statusCode: 500,
      message: 'Internal Server Error',
    });
    expect(mapError('not an error').statusCode).toBe(500);
  });
});

describe('errorBody', () => {
  it('carries the status as a string', () => {
    const body = errorBody(503, 'Chatbot service is unavailable.');
    expect(body.error).toBe('Chatbot service is unavailable.');
    expect(body.error_code).toBe('503');
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });
});

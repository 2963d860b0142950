import { describe, expect, test } from 'vitest';

import {
  AppError,
  NetworkError,
  ValidationError,
} from '../../../src/errors/app-error.js';
import {
  createNetworkError,
  mapTransportError,
  networkErrorResponse,
} from '../../../src/services/fetcher/errors.js';

describe('app-error', () => {
  describe('AppError', () => {
    test('creates error with default values', () => {
      const error = new AppError('Test error');

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('INTERNAL_ERROR');
      expect(error.isOperational).toBe(true);
      expect(error.name).toBe('AppError');
    });

    test('creates error with custom values', () => {
      const error = new AppError('Unknown load', 500, 'UNKNOWN_LOAD', false);

      expect(error.code).toBe('UNKNOWN_LOAD');
      expect(error.isOperational).toBe(false);
    });
  });

  describe('ValidationError', () => {
    test('carries details and a 400 status', () => {
      const details = { field: 'url' };
      const error = new ValidationError('Invalid request init', details);

      expect(error).toBeInstanceOf(AppError);
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual(details);
    });
  });

  describe('NetworkError', () => {
    test('records kind and url', () => {
      const error = new NetworkError(
        'cors-check',
        'CORS check failed',
        'https://example.com/'
      );

      expect(error).toBeInstanceOf(AppError);
      expect(error.name).toBe('NetworkError');
      expect(error.kind).toBe('cors-check');
      expect(error.url).toBe('https://example.com/');
      expect(error.statusCode).toBe(502);
      expect(error.code).toBe('NETWORK_ERROR');
      expect(error.details).toEqual({});
    });
  });
});

describe('network error factory', () => {
  test('formats a too-many-redirects error with its limit', () => {
    const error = createNetworkError(
      { kind: 'too-many-redirects', limit: 20 },
      'http://localhost/20'
    );

    expect(error.kind).toBe('too-many-redirects');
    expect(error.message).toBe('Too many redirects');
    expect(error.details).toEqual({ limit: 20 });
  });

  test('wraps the error in an error response', () => {
    const response = networkErrorResponse(
      { kind: 'scheme', scheme: 'ftp' },
      new URL('ftp://example.com/file')
    );

    expect(response.isNetworkError()).toBe(true);
    expect(response.status).toBeUndefined();
    expect(response.terminationReason?.message).toBe('Unsupported scheme: ftp');
  });

  test('maps a timeout to the timeout kind', () => {
    const timeout = new DOMException('signal timed out', 'TimeoutError');
    const error = mapTransportError(timeout, 'https://example.com/', 1500);

    expect(error.kind).toBe('timeout');
    expect(error.message).toBe('Request timeout after 1500ms');
  });

  test('maps an abort to the aborted kind', () => {
    const abort = new DOMException('aborted', 'AbortError');

    expect(mapTransportError(abort, 'https://example.com/', 1000).kind).toBe(
      'aborted'
    );
  });

  test('keeps the code of a connection failure', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED'), {
      code: 'ECONNREFUSED',
    });
    const error = mapTransportError(refused, 'http://127.0.0.1:1/', 1000);

    expect(error.kind).toBe('transport');
    expect(error.message).toBe('Network error: Could not reach http://127.0.0.1:1/');
    expect(error.details).toEqual({
      message: 'connect ECONNREFUSED',
      code: 'ECONNREFUSED',
    });
  });
});

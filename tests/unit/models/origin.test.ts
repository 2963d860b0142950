import { describe, expect, test } from 'vitest';

import {
  createOpaqueOrigin,
  isSameOrigin,
  isSameOriginUrl,
  originKey,
  originOf,
  serializeOrigin,
} from '../../../src/models/origin.js';

describe('origin', () => {
  test('derives a tuple origin with the default port', () => {
    expect(originOf(new URL('https://example.com/a?b'))).toEqual({
      kind: 'tuple',
      scheme: 'https',
      host: 'example.com',
      port: 443,
    });
  });

  test('treats explicit default ports as the same origin', () => {
    expect(
      isSameOrigin(
        originOf(new URL('http://example.com:80/')),
        originOf(new URL('http://example.com/other'))
      )
    ).toBe(true);
    expect(
      isSameOrigin(
        originOf(new URL('http://example.com:8080/')),
        originOf(new URL('http://example.com/'))
      )
    ).toBe(false);
  });

  test('gives data and file urls a fresh opaque origin each time', () => {
    const first = originOf(new URL('data:text/plain,hi'));
    const second = originOf(new URL('data:text/plain,hi'));

    expect(first.kind).toBe('opaque');
    expect(isSameOrigin(first, second)).toBe(false);
    expect(isSameOrigin(first, first)).toBe(true);
    expect(originOf(new URL('file:///tmp/a.txt')).kind).toBe('opaque');
  });

  test('an opaque origin is never same-origin with a url', () => {
    expect(
      isSameOriginUrl(createOpaqueOrigin(), new URL('http://example.com/'))
    ).toBe(false);
  });

  test('serializes tuple and opaque origins', () => {
    expect(serializeOrigin(originOf(new URL('http://localhost:8000/x')))).toBe(
      'http://localhost:8000'
    );
    expect(serializeOrigin(originOf(new URL('https://example.com:443/')))).toBe(
      'https://example.com'
    );
    expect(serializeOrigin(createOpaqueOrigin())).toBe('null');
  });

  test('keys opaque origins by identity', () => {
    const opaque = createOpaqueOrigin();

    expect(originKey(opaque)).toBe(`opaque:${opaque.id}`);
    expect(originKey(originOf(new URL('http://example.com/')))).toBe(
      'http://example.com'
    );
  });
});

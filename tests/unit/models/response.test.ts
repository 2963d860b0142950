import { describe, expect, test } from 'vitest';

import { NetworkError } from '../../../src/errors/app-error.js';
import { HeaderList } from '../../../src/models/headers.js';
import { BodyCell, Response } from '../../../src/models/response.js';

const encoder = new TextEncoder();

function networkResponse(headers: HeaderList): Response {
  return new Response({
    status: [200, 'OK'],
    headers,
    body: BodyCell.done(encoder.encode('hello')),
    urlList: [new URL('https://example.com/data')],
  });
}

describe('BodyCell', () => {
  test('moves from empty through receiving to done', () => {
    const cell = new BodyCell();
    expect(cell.state.kind).toBe('empty');

    cell.append(encoder.encode('ab'));
    cell.append(encoder.encode('c'));
    expect(cell.state.kind).toBe('receiving');
    expect(cell.text()).toBe('abc');

    cell.finish();
    expect(cell.isDone()).toBe(true);
    expect(cell.text()).toBe('abc');
    expect(() => cell.append(encoder.encode('d'))).toThrow(
      'Cannot append to a completed body'
    );
  });
});

describe('Response filtering', () => {
  test('basic filter drops Set-Cookie and keeps the rest', () => {
    const response = networkResponse(
      HeaderList.from([
        ['Content-Type', 'text/plain'],
        ['Set-Cookie', 'id=1'],
        ['X-Custom', 'yes'],
      ])
    );

    const filtered = response.toFiltered('basic');

    expect(filtered.responseType).toBe('basic');
    expect(filtered.internalResponse).toBe(response);
    expect([...filtered.headers]).toEqual([
      ['Content-Type', 'text/plain'],
      ['X-Custom', 'yes'],
    ]);
    expect(filtered.body).toBe(response.body);
    expect(filtered.url?.href).toBe('https://example.com/data');
  });

  test('cors filter keeps safelisted and exposed headers only', () => {
    const response = networkResponse(
      HeaderList.from([
        ['Content-Type', 'text/plain'],
        ['Pragma', 'no-cache'],
        ['Location', '/elsewhere'],
        ['X-Exposed', 'a'],
        ['Set-Cookie', 'id=1'],
        ['Access-Control-Expose-Headers', 'x-exposed, set-cookie'],
      ])
    );

    const filtered = response.toFiltered('cors');

    expect(filtered.headers.names()).toEqual([
      'Content-Type',
      'Pragma',
      'X-Exposed',
    ]);
  });

  test('opaque filter hides status, headers, url and body', () => {
    const response = networkResponse(HeaderList.from({ 'X-A': '1' }));

    const filtered = response.toFiltered('opaque');

    expect(filtered.status).toBeUndefined();
    expect(filtered.headers.size).toBe(0);
    expect(filtered.urlList).toEqual([]);
    expect(filtered.body.bytes().byteLength).toBe(0);
    expect(filtered.actualResponse().body.text()).toBe('hello');
    expect(filtered.isDone()).toBe(true);
  });

  test('a network error is never wrapped', () => {
    const error = Response.networkError(
      new NetworkError('transport', 'Network error')
    );

    expect(error.toFiltered('basic')).toBe(error);
    expect(error.isDone()).toBe(true);
    expect(error.body.state.kind).toBe('empty');
  });

  test('is not done while the internal body is still receiving', () => {
    const internal = new Response({ urlList: [new URL('https://a.test/')] });
    internal.body.append(encoder.encode('partial'));
    const filtered = internal.toFiltered('opaque');

    expect(filtered.isDone()).toBe(false);
    internal.body.finish();
    expect(filtered.isDone()).toBe(true);
  });
});

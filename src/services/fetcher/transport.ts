import { STATUS_CODES } from 'node:http';
import { pipeline, type Readable, type Transform } from 'node:stream';
import { createBrotliDecompress, createGunzip, createInflate } from 'node:zlib';

import { type Dispatcher, request as undiciRequest } from 'undici';

import { HeaderList } from '../../models/headers.js';

import { logDebug } from '../logger.js';

import { httpAgent } from './agents.js';

export interface TransportRequest {
  method: string;
  url: URL;
  headers: HeaderList;
  body?: Uint8Array;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  headers: HeaderList;
  body: AsyncIterable<Uint8Array>;
}

/**
 * Byte transport for one hop. Never follows redirects; any failure is thrown
 * and downgraded to a network error by the caller.
 */
export interface Transport {
  request(request: TransportRequest): Promise<TransportResponse>;
}

type ContentEncoding = 'gzip' | 'x-gzip' | 'deflate' | 'br';

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

function isSupportedContentEncoding(
  encoding: string
): encoding is ContentEncoding {
  return (
    encoding === 'gzip' ||
    encoding === 'x-gzip' ||
    encoding === 'deflate' ||
    encoding === 'br'
  );
}

function parseContentEncodings(value: string | undefined): ContentEncoding[] {
  if (!value) return [];
  return value
    .split(',')
    .map((token) => token.trim().toLowerCase())
    .filter(isSupportedContentEncoding);
}

function createDecompressor(encoding: ContentEncoding): Transform {
  switch (encoding) {
    case 'gzip':
    case 'x-gzip':
      return createGunzip();
    case 'deflate':
      return createInflate();
    case 'br':
      return createBrotliDecompress();
  }
}

function decodeBody(
  body: Readable,
  encodings: readonly ContentEncoding[],
  url: URL
): Readable {
  if (encodings.length === 0) return body;

  // Codings are listed in the order they were applied.
  const decoders = [...encodings].reverse().map(createDecompressor);
  const last = decoders[decoders.length - 1];
  if (!last) return body;

  pipeline([body, ...decoders], (error) => {
    if (error) {
      logDebug('Response body decoding failed', {
        url: url.href,
        error: error.message,
      });
    }
  });
  return last;
}

function toHeaderList(headers: Dispatcher.ResponseData['headers']): HeaderList {
  const list = new HeaderList();
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) list.append(name, item);
    } else {
      list.append(name, value);
    }
  }
  return list;
}

function flattenHeaders(headers: HeaderList): string[] {
  const flat: string[] = [];
  for (const [name, value] of headers) flat.push(name, value);
  return flat;
}

export interface HttpTransportOptions {
  dispatcher?: Dispatcher;
}

/** HTTP(S) transport on undici with transparent content decoding. */
export class HttpTransport implements Transport {
  private readonly dispatcher: Dispatcher;

  constructor(options: HttpTransportOptions = {}) {
    this.dispatcher = options.dispatcher ?? httpAgent;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const response = await undiciRequest(request.url, {
      dispatcher: this.dispatcher,
      method: request.method,
      headers: flattenHeaders(request.headers),
      body: request.body,
      signal: request.signal,
    });

    const headers = toHeaderList(response.headers);
    const skipDecoding =
      request.method === 'HEAD' || NULL_BODY_STATUSES.has(response.statusCode);
    const encodings = skipDecoding
      ? []
      : parseContentEncodings(headers.get('content-encoding'));

    return {
      status: response.statusCode,
      statusText: STATUS_CODES[response.statusCode] ?? '',
      headers,
      body: decodeBody(response.body, encodings, request.url),
    };
  }
}

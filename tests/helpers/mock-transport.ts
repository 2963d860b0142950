import { STATUS_CODES } from 'node:http';

import { HeaderList, type HeadersInit } from '../../src/models/headers.js';
import type {
  Transport,
  TransportRequest,
  TransportResponse,
} from '../../src/services/fetcher/transport.js';

export interface MockReply {
  status?: number;
  headers?: HeadersInit;
  body?: string | readonly string[];
  /** Thrown by the body stream after the chunks above. */
  bodyError?: Error;
}

export type MockHandler = (
  request: TransportRequest
) => MockReply | Promise<MockReply>;

async function* replyStream(
  chunks: readonly string[],
  failure: Error | undefined
): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const chunk of chunks) {
    await Promise.resolve();
    yield encoder.encode(chunk);
  }
  if (failure) throw failure;
}

function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(resolve, reject).finally(() => {
      signal.removeEventListener('abort', onAbort);
    });
  });
}

/** Never settles; for exercising timeouts and aborts. */
export function pending(): Promise<MockReply> {
  return new Promise<MockReply>(() => undefined);
}

/** In-process transport that answers from a handler and records every request. */
export class MockTransport implements Transport {
  readonly requests: TransportRequest[] = [];

  constructor(private readonly handler: MockHandler) {}

  async request(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const reply = await abortable(
      Promise.resolve(this.handler(request)),
      request.signal
    );
    const status = reply.status ?? 200;
    const chunks =
      reply.body === undefined
        ? []
        : typeof reply.body === 'string'
          ? [reply.body]
          : reply.body;

    return {
      status,
      statusText: STATUS_CODES[status] ?? '',
      headers: HeaderList.from(reply.headers),
      body: replyStream(chunks, reply.bodyError),
    };
  }

  methodsFor(pathname: string): string[] {
    return this.requests
      .filter((request) => request.url.pathname === pathname)
      .map((request) => request.method);
  }
}

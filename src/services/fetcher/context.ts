import { config } from '../../config/index.js';
import type { HeaderPair } from '../../models/headers.js';
import type { Response } from '../../models/response.js';

import type { CorsCache } from './cors-cache.js';
import type { DevtoolsChannel } from './telemetry.js';
import { HttpTransport, type Transport } from './transport.js';

export interface FetchContext {
  userAgent: string;
  transport: Transport;
  /** Upper bound for one hop, from issuing the request to the end of its body. */
  timeout: number;
  devtools?: DevtoolsChannel;
  signal?: AbortSignal;
}

export function createFetchContext(
  overrides: Partial<FetchContext> = {}
): FetchContext {
  return {
    userAgent: overrides.userAgent ?? config.fetcher.userAgent,
    transport: overrides.transport ?? new HttpTransport(),
    timeout: overrides.timeout ?? config.fetcher.timeout,
    ...(overrides.devtools ? { devtools: overrides.devtools } : {}),
    ...(overrides.signal ? { signal: overrides.signal } : {}),
  };
}

/** A network response whose body stream has not been consumed yet. */
export interface PendingBody {
  response: Response;
  stream: AsyncIterable<Uint8Array>;
}

export interface IssuedRequest {
  url: URL;
  method: string;
  headers: HeaderPair[];
  hasBody: boolean;
  pipelineId: string | undefined;
  startedAt: Date;
  waitTime: number;
}

/** Mutable bookkeeping for one top-level fetch, shared by all of its hops. */
export interface FetchState {
  readonly context: FetchContext;
  readonly cache: CorsCache;
  pendingBody: PendingBody | undefined;
  lastIssued: IssuedRequest | undefined;
  lastNetworkResponse: Response | undefined;
}

export function createFetchState(
  context: FetchContext,
  cache: CorsCache
): FetchState {
  return {
    context,
    cache,
    pendingBody: undefined,
    lastIssued: undefined,
    lastNetworkResponse: undefined,
  };
}

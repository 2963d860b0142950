import type { Destination, Request } from '../models/request.js';
import { Response, type ResponseType } from '../models/response.js';

import { discardPendingBody, pumpBody } from './fetcher/body.js';
import {
  createFetchState,
  type FetchContext,
  type FetchState,
} from './fetcher/context.js';
import { CorsCache } from './fetcher/cors-cache.js';
import { mapTransportError } from './fetcher/errors.js';
import { mainFetch } from './fetcher/main-fetch.js';
import { DEFAULT_ACCEPT_LANGUAGE } from './fetcher/network.js';
import {
  type FetchTaskTarget,
  GuardedFetchTarget,
  NoopFetchTarget,
  ResponseCollector,
} from './fetcher/target.js';
import { emitDevtoolsRecords } from './fetcher/telemetry.js';
import { logError } from './logger.js';

export { destroyAgents } from './fetcher/agents.js';

const STREAMED_TYPES: ReadonlySet<ResponseType> = new Set([
  'basic',
  'cors',
  'default',
]);

function defaultAccept(destination: Destination): string {
  switch (destination) {
    case 'document':
    case 'iframe':
      return 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
    case 'image':
      return 'image/png,image/svg+xml,image/*;q=0.8,*/*;q=0.5';
    case 'style':
      return 'text/css,*/*;q=0.1';
    default:
      return '*/*';
  }
}

function applyDefaultHeaders(request: Request): void {
  const { headers } = request;
  if (!headers.has('accept')) {
    headers.set('Accept', defaultAccept(request.destination));
  }
  if (!headers.has('accept-language')) {
    headers.set('Accept-Language', DEFAULT_ACCEPT_LANGUAGE);
  }
}

async function deliver(
  request: Request,
  response: Response,
  state: FetchState,
  target: FetchTaskTarget
): Promise<void> {
  if (request.body !== undefined) target.processRequestBody?.(request);
  target.processRequestEof?.(request);
  target.processResponse?.(response);

  if (response.isNetworkError()) {
    await discardPendingBody(state);
    target.processResponseEof?.(response);
    return;
  }

  const pending = state.pendingBody;
  if (pending) {
    const onChunk = STREAMED_TYPES.has(response.responseType)
      ? (chunk: Uint8Array) => target.processResponseChunk?.(chunk)
      : undefined;
    await pumpBody(pending, onChunk);
    state.pendingBody = undefined;
  }

  const actual = response.actualResponse();
  actual.body.finish();
  response.aborted = actual.aborted;
  target.processResponseEof?.(response);
}

async function failFetch(
  message: string,
  error: unknown,
  request: Request,
  state: FetchState
): Promise<Response> {
  logError(message, error instanceof Error ? error : { error: String(error) });
  await discardPendingBody(state);
  return Response.networkError(
    mapTransportError(error, request.url.href, state.context.timeout)
  );
}

/**
 * Fetches `request` against a caller-owned preflight cache and streams
 * progress to `target`. Resolves once the response body is complete.
 * Failures come back as network error responses rather than rejections,
 * and a throwing target callback does not interrupt the delivery.
 */
export async function fetchWithCorsCache(
  request: Request,
  cache: CorsCache,
  context: FetchContext,
  target: FetchTaskTarget = new NoopFetchTarget()
): Promise<Response> {
  const guarded = GuardedFetchTarget.wrap(target);
  const state = createFetchState(context, cache);

  let response: Response;
  try {
    applyDefaultHeaders(request);
    response = await mainFetch(request, state);
  } catch (error) {
    response = await failFetch(
      'Fetch failed unexpectedly',
      error,
      request,
      state
    );
  }

  try {
    await deliver(request, response, state, guarded);
  } catch (error) {
    response = await failFetch(
      'Response delivery failed',
      error,
      request,
      state
    );
  }
  guarded.processResponseEof(response);

  emitDevtoolsRecords(state);
  return response;
}

export function fetch(
  request: Request,
  context: FetchContext,
  target?: FetchTaskTarget
): Promise<Response> {
  return fetchWithCorsCache(request, new CorsCache(), context, target);
}

/** Schedules the fetch on the event loop; progress reaches the caller only through `target`. */
export function fetchAsync(
  request: Request,
  target: FetchTaskTarget,
  context: FetchContext,
  cache: CorsCache = new CorsCache()
): void {
  const guarded = GuardedFetchTarget.wrap(target);
  setImmediate(() => {
    void fetchWithCorsCache(request, cache, context, guarded).catch(
      (error: unknown) => {
        logError(
          'Asynchronous fetch failed',
          error instanceof Error ? error : { error: String(error) }
        );
        guarded.processResponseEof(
          Response.networkError(
            mapTransportError(error, request.url.href, context.timeout)
          )
        );
      }
    );
  });
}

/** `fetchAsync` with a collecting target; settles when the body is complete. */
export function fetchSync(
  request: Request,
  context: FetchContext,
  cache?: CorsCache
): Promise<Response> {
  const collector = new ResponseCollector();
  fetchAsync(request, collector, context, cache);
  return collector.response;
}

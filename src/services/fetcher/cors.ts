import {
  isSimpleHeader,
  isSimpleMethod,
  parseHeaderNameList,
} from '../../models/headers.js';
import { serializeOrigin } from '../../models/origin.js';
import { normalizeMethod, Request } from '../../models/request.js';
import type { Response } from '../../models/response.js';

import { discardPendingBody } from './body.js';
import type { FetchState } from './context.js';
import { networkErrorResponse } from './errors.js';
import { httpNetworkOrCacheFetch } from './network.js';

/** Whether the response authorizes the request's origin to read it. */
export function corsCheck(request: Request, response: Response): boolean {
  const allowOrigin = response.headers.get('access-control-allow-origin');
  if (allowOrigin === undefined) return false;

  const value = allowOrigin.trim();
  if (request.credentialsMode !== 'include' && value === '*') return true;

  if (request.origin.kind === 'opaque') return false;
  if (value !== serializeOrigin(request.origin)) return false;

  if (request.credentialsMode !== 'include') return true;

  return response.headers.has('access-control-allow-credentials');
}

export function nonSimpleHeaderNames(request: Request): string[] {
  const names = new Set<string>();
  for (const [name, value] of request.headers) {
    if (!isSimpleHeader(name, value)) names.add(name.toLowerCase());
  }
  return [...names].sort();
}

function parseMaxAge(value: string | undefined): number {
  if (!value) return 0;
  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isNaN(parsed) || parsed < 0 ? 0 : parsed;
}

function isSuccessStatus(response: Response): boolean {
  const code = response.status?.[0];
  return code !== undefined && code >= 200 && code < 300;
}

function buildPreflightRequest(request: Request): Request {
  const preflight = new Request(request.currentUrl(), {
    origin: request.origin,
    pipelineId: request.pipelineId,
    method: 'OPTIONS',
    referrer: request.referrer,
    referrerPolicy: request.referrerPolicy,
    destination: request.destination,
  });
  preflight.headers.set('Access-Control-Request-Method', request.method);
  preflight.headers.set(
    'Access-Control-Request-Headers',
    nonSimpleHeaderNames(request).join(', ')
  );
  return preflight;
}

/**
 * Sends the OPTIONS preflight for a non-simple CORS request and records the
 * granted methods and headers in the cache. Anything short of full
 * authorization is a network error.
 */
export async function corsPreflightFetch(
  request: Request,
  state: FetchState
): Promise<Response> {
  const url = request.currentUrl();
  const preflight = buildPreflightRequest(request);
  const response = await httpNetworkOrCacheFetch(preflight, state, {
    corsFlag: false,
    credentials: false,
  });
  await discardPendingBody(state);

  if (response.isNetworkError()) return response;

  if (!corsCheck(request, response) || !isSuccessStatus(response)) {
    return networkErrorResponse(
      { kind: 'preflight', reason: 'origin not allowed' },
      url
    );
  }

  let methods = parseHeaderNameList(
    response.headers.get('access-control-allow-methods')
  ).map(normalizeMethod);
  const headerNames = parseHeaderNameList(
    response.headers.get('access-control-allow-headers')
  );

  if (methods.length === 0 && request.useCorsPreflight) {
    methods = [request.method];
  }

  if (!methods.includes(request.method) && !isSimpleMethod(request.method)) {
    return networkErrorResponse(
      { kind: 'preflight', reason: `method ${request.method} not allowed` },
      url
    );
  }

  const allowedHeaders = new Set(headerNames.map((name) => name.toLowerCase()));
  const rejected = nonSimpleHeaderNames(request).find(
    (name) => !allowedHeaders.has(name)
  );
  if (rejected !== undefined) {
    return networkErrorResponse(
      { kind: 'preflight', reason: `header ${rejected} not allowed` },
      url
    );
  }

  const maxAge = parseMaxAge(response.headers.get('access-control-max-age'));
  state.cache.insert(request, maxAge, methods, headerNames);

  return response;
}

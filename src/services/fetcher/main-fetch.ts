import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { config } from '../../config/index.js';
import { HeaderList, isSimpleMethod } from '../../models/headers.js';
import {
  createOpaqueOrigin,
  isSameOrigin,
  isSameOriginUrl,
  originOf,
} from '../../models/origin.js';
import type { Request } from '../../models/request.js';
import { BodyCell, Response } from '../../models/response.js';
import { decodeDataUrl } from '../../utils/data-url.js';
import { guessContentType } from '../../utils/mime.js';

import { logDebug } from '../logger.js';

import { discardPendingBody } from './body.js';
import type { FetchState } from './context.js';
import { corsCheck, corsPreflightFetch, nonSimpleHeaderNames } from './cors.js';
import { networkErrorResponse } from './errors.js';
import { httpNetworkOrCacheFetch } from './network.js';
import {
  hasCredentials,
  isHttpScheme,
  isRedirectStatus,
  methodAfterRedirect,
  resolveRedirectTarget,
} from './redirects.js';
import {
  DEFAULT_REFERRER_POLICY,
  determineRequestReferrer,
  toReferrer,
} from './referrer.js';

const LOCAL_SCHEMES = new Set(['about:', 'blob:', 'data:', 'filesystem:']);
const BASIC_SCHEMES = new Set(['about:', 'data:', 'file:']);
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

function needsPreflight(request: Request): boolean {
  if (request.useCorsPreflight) return true;
  if (!request.unsafeRequest) return false;
  return (
    !isSimpleMethod(request.method) || nonSimpleHeaderNames(request).length > 0
  );
}

function singleHeaderResponse(contentType: string, body: Uint8Array): Response {
  return new Response({
    status: [200, 'OK'],
    headers: HeaderList.from([['Content-Type', contentType]]),
    body: BodyCell.done(body),
  });
}

async function fileFetch(url: URL): Promise<Response> {
  try {
    const path = fileURLToPath(url);
    const contents = await readFile(path);
    return singleHeaderResponse(
      guessContentType(path),
      new Uint8Array(contents)
    );
  } catch (error) {
    return networkErrorResponse(
      {
        kind: 'file',
        message: error instanceof Error ? error.message : 'Unreadable file',
      },
      url
    );
  }
}

/** Scheme dispatch for requests that need no CORS handling. */
async function basicFetch(
  request: Request,
  state: FetchState
): Promise<Response> {
  const url = request.currentUrl();

  switch (url.protocol) {
    case 'about:':
      if (url.pathname !== 'blank') {
        return networkErrorResponse({ kind: 'scheme', scheme: 'about' }, url);
      }
      return singleHeaderResponse(
        'text/html;charset=utf-8',
        new Uint8Array(0)
      );
    case 'http:':
    case 'https:':
      return httpFetch(request, state, false, false);
    case 'data:': {
      if (request.method !== 'GET') {
        return networkErrorResponse({ kind: 'scheme', scheme: 'data' }, url);
      }
      const decoded = decodeDataUrl(url);
      if (!decoded) {
        return networkErrorResponse(
          { kind: 'decode', message: 'Malformed data: URL' },
          url
        );
      }
      return singleHeaderResponse(decoded.mediaType, decoded.body);
    }
    case 'file:':
      if (request.method !== 'GET') {
        return networkErrorResponse({ kind: 'scheme', scheme: 'file' }, url);
      }
      return fileFetch(url);
    default:
      return networkErrorResponse(
        { kind: 'scheme', scheme: url.protocol.slice(0, -1) },
        url
      );
  }
}

function preflightRequired(request: Request, state: FetchState): boolean {
  const methodMismatch =
    !state.cache.matchMethod(request, request.method) &&
    (!isSimpleMethod(request.method) || request.useCorsPreflight);
  const headerMismatch = nonSimpleHeaderNames(request).some(
    (name) => !state.cache.matchHeader(request, name)
  );
  return methodMismatch || headerMismatch;
}

async function httpFetch(
  request: Request,
  state: FetchState,
  corsFlag: boolean,
  corsPreflightFlag: boolean
): Promise<Response> {
  const url = request.currentUrl();

  if (corsPreflightFlag && preflightRequired(request, state)) {
    const preflight = await corsPreflightFetch(request, state);
    if (preflight.isNetworkError()) return preflight;
  }

  const credentials =
    request.credentialsMode === 'include' ||
    (request.credentialsMode === 'same-origin' &&
      request.responseTainting === 'basic');

  const response = await httpNetworkOrCacheFetch(request, state, {
    corsFlag,
    credentials,
  });
  if (response.isNetworkError()) return response;

  if (corsFlag && !corsCheck(request, response)) {
    await discardPendingBody(state);
    return networkErrorResponse({ kind: 'cors-check' }, url);
  }

  if (!isRedirectStatus(response.status?.[0])) return response;
  if (!response.headers.has('location')) return response;

  switch (request.redirectMode) {
    case 'error':
      await discardPendingBody(state);
      return networkErrorResponse({ kind: 'redirect-mode' }, url);
    case 'manual':
      return response.toFiltered('opaqueredirect');
    case 'follow':
      return httpRedirectFetch(request, state, response, corsFlag);
  }
}

async function httpRedirectFetch(
  request: Request,
  state: FetchState,
  response: Response,
  corsFlag: boolean
): Promise<Response> {
  const current = request.currentUrl();
  await discardPendingBody(state);

  const target = resolveRedirectTarget(
    response.headers.getAll('location')[0] ?? '',
    current
  );
  if (!target.ok) {
    return networkErrorResponse(
      { kind: 'bad-redirect', reason: target.reason },
      current
    );
  }

  const limit = config.fetcher.maxRedirects;
  if (request.redirectCount >= limit) {
    return networkErrorResponse({ kind: 'too-many-redirects', limit }, current);
  }
  request.redirectCount += 1;

  const next = target.url;
  const crossOrigin = !isSameOrigin(originOf(current), originOf(next));
  if (
    hasCredentials(next) &&
    ((request.mode === 'cors' && crossOrigin) || corsFlag)
  ) {
    return networkErrorResponse(
      { kind: 'bad-redirect', reason: 'target carries credentials' },
      current
    );
  }

  if (corsFlag && crossOrigin) request.origin = createOpaqueOrigin();

  const status = response.status?.[0] ?? 0;
  const method = methodAfterRedirect(status, request.method);
  if (method) {
    request.method = method;
    request.body = undefined;
  }

  logDebug('Following redirect', {
    status,
    from: current.href,
    to: next.href,
    count: request.redirectCount,
  });

  request.urlList.push(next);
  return mainFetch(request, state, corsFlag, true);
}

function schemeFetch(
  request: Request,
  state: FetchState,
  corsFlag: boolean
): Promise<Response> {
  const url = request.currentUrl();
  const sameOrigin = isSameOriginUrl(request.origin, url);

  if (
    (sameOrigin && !corsFlag) ||
    BASIC_SCHEMES.has(url.protocol) ||
    request.mode === 'navigate'
  ) {
    return basicFetch(request, state);
  }

  if (request.mode === 'same-origin') {
    return Promise.resolve(networkErrorResponse({ kind: 'same-origin' }, url));
  }

  if (request.mode === 'no-cors') {
    request.responseTainting = 'opaque';
    return basicFetch(request, state);
  }

  if (!isHttpScheme(url)) {
    return Promise.resolve(
      networkErrorResponse(
        { kind: 'scheme', scheme: url.protocol.slice(0, -1) },
        url
      )
    );
  }

  request.responseTainting = 'cors';
  if (needsPreflight(request)) {
    request.redirectMode = 'error';
    return httpFetch(request, state, true, true).then((response) => {
      if (response.isNetworkError()) state.cache.clear(request);
      return response;
    });
  }

  return httpFetch(request, state, true, false);
}

/**
 * Runs one fetch hop and, at the top level, applies response tainting.
 * Redirect hops re-enter with `recursive` set and get the raw response back.
 * Never throws for network-level failures; those come back as error
 * responses.
 */
export async function mainFetch(
  request: Request,
  state: FetchState,
  corsFlag = false,
  recursive = false
): Promise<Response> {
  const url = request.currentUrl();

  if (request.localUrlsOnly && !LOCAL_SCHEMES.has(url.protocol)) {
    return networkErrorResponse({ kind: 'local-urls-only' }, url);
  }

  const policy = request.referrerPolicy ?? DEFAULT_REFERRER_POLICY;
  request.referrerPolicy = policy;
  if (request.referrer !== 'no-referrer') {
    request.referrer = toReferrer(determineRequestReferrer(request, policy));
  }

  const response = await schemeFetch(request, state, corsFlag);
  if (recursive || response.isNetworkError()) return response;

  const internal = response.actualResponse();
  if (internal.urlList.length === 0) internal.urlList = [...request.urlList];

  const result = response.internalResponse
    ? response
    : response.toFiltered(request.responseTainting);

  const status = internal.status?.[0];
  if (
    request.method === 'HEAD' ||
    request.method === 'CONNECT' ||
    (status !== undefined && NULL_BODY_STATUSES.has(status))
  ) {
    await discardPendingBody(state);
    internal.body.finish();
  }

  return result;
}

import { serializeOrigin } from '../../models/origin.js';
import type { Request } from '../../models/request.js';
import { Response } from '../../models/response.js';

import type { FetchState } from './context.js';
import { mapTransportError } from './errors.js';
import { FetchTelemetry } from './telemetry.js';

const telemetry = new FetchTelemetry();

export const DEFAULT_ACCEPT_LANGUAGE = 'en-US';
export const DEFAULT_ACCEPT_ENCODING = 'gzip, deflate, br';

export interface NetworkFetchFlags {
  corsFlag: boolean;
  credentials: boolean;
}

function stripCredentials(url: URL): URL {
  const wireUrl = new URL(url.href);
  wireUrl.username = '';
  wireUrl.password = '';
  wireUrl.hash = '';
  return wireUrl;
}

function basicAuthorization(url: URL): string {
  const user = decodeURIComponent(url.username);
  const password = decodeURIComponent(url.password);
  return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}

/**
 * Builds the request that actually goes on the wire. Works on a clone so the
 * caller's header list is left as the caller wrote it.
 */
function buildHttpRequest(
  request: Request,
  state: FetchState,
  flags: NetworkFetchFlags
): Request {
  const httpRequest = request.clone();
  const { headers } = httpRequest;
  const url = httpRequest.currentUrl();

  if (
    flags.corsFlag ||
    (httpRequest.method !== 'GET' && httpRequest.method !== 'HEAD')
  ) {
    headers.set('Origin', serializeOrigin(httpRequest.origin));
  }

  if (httpRequest.referrer instanceof URL) {
    headers.set('Referer', httpRequest.referrer.href);
  }

  if (!headers.has('user-agent')) {
    headers.set('User-Agent', state.context.userAgent);
  }
  if (!headers.has('accept')) headers.set('Accept', '*/*');
  if (!headers.has('accept-language')) {
    headers.set('Accept-Language', DEFAULT_ACCEPT_LANGUAGE);
  }
  if (!headers.has('accept-encoding')) {
    headers.set('Accept-Encoding', DEFAULT_ACCEPT_ENCODING);
  }
  headers.set('Host', url.host);

  if (
    flags.credentials &&
    (url.username || url.password) &&
    !headers.has('authorization')
  ) {
    headers.set('Authorization', basicAuthorization(url));
  }

  return httpRequest;
}

function recordIssued(
  state: FetchState,
  httpRequest: Request,
  startedAt: Date,
  waitTime: number
): void {
  state.lastIssued = {
    url: httpRequest.currentUrl(),
    method: httpRequest.method,
    headers: [...httpRequest.headers],
    hasBody: httpRequest.body !== undefined,
    pipelineId: httpRequest.pipelineId,
    startedAt,
    waitTime,
  };
}

function hopSignal(state: FetchState): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(state.context.timeout);
  const external = state.context.signal;
  return external ? AbortSignal.any([external, timeoutSignal]) : timeoutSignal;
}

/**
 * One request/response exchange with the transport. The returned response is
 * unfiltered; its body stream is parked on the fetch state for whoever
 * consumes or discards it next.
 */
export async function httpNetworkOrCacheFetch(
  request: Request,
  state: FetchState,
  flags: NetworkFetchFlags
): Promise<Response> {
  const httpRequest = buildHttpRequest(request, state, flags);
  const url = httpRequest.currentUrl();
  const telemetryContext = telemetry.start(
    url,
    httpRequest.method,
    httpRequest.pipelineId
  );
  const startedAt = new Date();

  try {
    const result = await state.context.transport.request({
      method: httpRequest.method,
      url: stripCredentials(url),
      headers: httpRequest.headers,
      body: httpRequest.body,
      signal: hopSignal(state),
    });

    const response = new Response({
      status: [result.status, result.statusText],
      headers: result.headers,
    });
    state.pendingBody = { response, stream: result.body };
    state.lastNetworkResponse = response;
    recordIssued(
      state,
      httpRequest,
      startedAt,
      telemetry.elapsed(telemetryContext)
    );

    telemetry.recordResponse(telemetryContext, response);
    return response;
  } catch (error) {
    const networkError = mapTransportError(
      error,
      url.href,
      state.context.timeout
    );
    recordIssued(
      state,
      httpRequest,
      startedAt,
      telemetry.elapsed(telemetryContext)
    );
    state.lastNetworkResponse = undefined;
    telemetry.recordError(telemetryContext, networkError);
    return Response.networkError(networkError);
  }
}

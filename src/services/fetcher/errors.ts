import { NetworkError } from '../../errors/app-error.js';
import { Response } from '../../models/response.js';

export type NetworkErrorInput =
  | { kind: 'transport'; message: string; code?: string }
  | { kind: 'timeout'; timeout: number }
  | { kind: 'aborted' }
  | { kind: 'cors-check' }
  | { kind: 'preflight'; reason: string }
  | { kind: 'redirect-mode' }
  | { kind: 'too-many-redirects'; limit: number }
  | { kind: 'bad-redirect'; reason: string }
  | { kind: 'local-urls-only' }
  | { kind: 'scheme'; scheme: string }
  | { kind: 'same-origin' }
  | { kind: 'decode'; message: string }
  | { kind: 'file'; message: string };

export function createNetworkError(
  input: NetworkErrorInput,
  url: string
): NetworkError {
  switch (input.kind) {
    case 'transport':
      return new NetworkError(
        'transport',
        `Network error: Could not reach ${url}`,
        url,
        { message: input.message, ...(input.code ? { code: input.code } : {}) }
      );
    case 'timeout':
      return new NetworkError(
        'timeout',
        `Request timeout after ${input.timeout}ms`,
        url,
        { timeout: input.timeout }
      );
    case 'aborted':
      return new NetworkError('aborted', 'Request was aborted', url);
    case 'cors-check':
      return new NetworkError('cors-check', 'CORS check failed', url);
    case 'preflight':
      return new NetworkError(
        'preflight',
        `CORS preflight failed: ${input.reason}`,
        url
      );
    case 'redirect-mode':
      return new NetworkError(
        'redirect-mode',
        'Redirect encountered with redirect mode "error"',
        url
      );
    case 'too-many-redirects':
      return new NetworkError('too-many-redirects', 'Too many redirects', url, {
        limit: input.limit,
      });
    case 'bad-redirect':
      return new NetworkError(
        'bad-redirect',
        `Invalid redirect: ${input.reason}`,
        url
      );
    case 'local-urls-only':
      return new NetworkError(
        'local-urls-only',
        'Non-local URL requested with local URLs only',
        url
      );
    case 'scheme':
      return new NetworkError(
        'scheme',
        `Unsupported scheme: ${input.scheme}`,
        url
      );
    case 'same-origin':
      return new NetworkError(
        'same-origin',
        'Cross-origin request in same-origin mode',
        url
      );
    case 'decode':
      return new NetworkError('decode', input.message, url);
    case 'file':
      return new NetworkError('file', input.message, url);
  }
}

export function networkErrorResponse(
  input: NetworkErrorInput,
  url: URL
): Response {
  return Response.networkError(createNetworkError(input, url.href));
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

/** Downgrades anything a transport throws to a network error. */
export function mapTransportError(
  error: unknown,
  url: string,
  timeoutMs: number
): NetworkError {
  if (error instanceof NetworkError) return error;

  if (isAbortError(error)) {
    return isTimeoutError(error)
      ? createNetworkError({ kind: 'timeout', timeout: timeoutMs }, url)
      : createNetworkError({ kind: 'aborted' }, url);
  }

  if (!(error instanceof Error)) {
    return createNetworkError(
      { kind: 'transport', message: 'Unexpected error' },
      url
    );
  }

  const code = errorCode(error);
  if (code === 'UND_ERR_ABORTED') {
    return createNetworkError({ kind: 'aborted' }, url);
  }
  if (code) {
    return createNetworkError(
      { kind: 'transport', message: error.message, code },
      url
    );
  }

  return createNetworkError({ kind: 'transport', message: error.message }, url);
}

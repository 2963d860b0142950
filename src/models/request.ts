import { HeaderList, type HeadersInit } from './headers.js';
import { createOpaqueOrigin, type Origin } from './origin.js';

export type RequestMode = 'no-cors' | 'same-origin' | 'cors' | 'navigate';

export type RedirectMode = 'follow' | 'error' | 'manual';

export type CredentialsMode = 'omit' | 'same-origin' | 'include';

export type ResponseTainting = 'basic' | 'cors' | 'opaque';

export type Referrer = 'no-referrer' | 'client' | URL;

export type ReferrerPolicy =
  | 'no-referrer'
  | 'no-referrer-when-downgrade'
  | 'origin'
  | 'origin-when-cross-origin'
  | 'same-origin'
  | 'strict-origin'
  | 'strict-origin-when-cross-origin'
  | 'unsafe-url';

export type Destination =
  | ''
  | 'document'
  | 'iframe'
  | 'image'
  | 'media'
  | 'script'
  | 'style';

export interface RequestOptions {
  origin?: Origin;
  pipelineId?: string;
  method?: string;
  headers?: HeadersInit;
  body?: Uint8Array;
  mode?: RequestMode;
  redirectMode?: RedirectMode;
  credentialsMode?: CredentialsMode;
  referrer?: Referrer;
  referrerPolicy?: ReferrerPolicy;
  useCorsPreflight?: boolean;
  localUrlsOnly?: boolean;
  unsafeRequest?: boolean;
  destination?: Destination;
}

/** Fields a CORS cache lookup is scoped by, copied out of a live request. */
export interface CorsCacheKeySnapshot {
  readonly origin: Origin;
  readonly url: string;
  readonly credentials: boolean;
}

const NORMALIZED_METHODS = new Set([
  'DELETE',
  'GET',
  'HEAD',
  'OPTIONS',
  'POST',
  'PUT',
]);

export function normalizeMethod(method: string): string {
  const upper = method.toUpperCase();
  return NORMALIZED_METHODS.has(upper) ? upper : method;
}

/**
 * One fetch's intent. Method, body, referrer, redirect mode, origin, tainting
 * and the url list are rewritten in place while the fetch moves through
 * redirect hops.
 */
export class Request {
  urlList: URL[];
  origin: Origin;
  method: string;
  headers: HeaderList;
  body: Uint8Array | undefined;
  mode: RequestMode;
  redirectMode: RedirectMode;
  credentialsMode: CredentialsMode;
  referrer: Referrer;
  referrerPolicy: ReferrerPolicy | undefined;
  useCorsPreflight: boolean;
  localUrlsOnly: boolean;
  unsafeRequest: boolean;
  destination: Destination;
  responseTainting: ResponseTainting = 'basic';
  redirectCount = 0;
  readonly pipelineId: string | undefined;

  constructor(url: URL, options: RequestOptions = {}) {
    this.urlList = [new URL(url.href)];
    this.origin = options.origin ?? createOpaqueOrigin();
    this.pipelineId = options.pipelineId;
    this.method = normalizeMethod(options.method ?? 'GET');
    this.headers = HeaderList.from(options.headers);
    this.body = options.body;
    this.mode = options.mode ?? 'no-cors';
    this.redirectMode = options.redirectMode ?? 'follow';
    this.credentialsMode = options.credentialsMode ?? 'omit';
    this.referrer = options.referrer ?? 'client';
    this.referrerPolicy = options.referrerPolicy;
    this.useCorsPreflight = options.useCorsPreflight ?? false;
    this.localUrlsOnly = options.localUrlsOnly ?? false;
    this.unsafeRequest = options.unsafeRequest ?? false;
    this.destination = options.destination ?? '';
  }

  get url(): URL {
    return this.currentUrl();
  }

  currentUrl(): URL {
    const current = this.urlList[this.urlList.length - 1];
    if (!current) throw new Error('Request url list is empty');
    return current;
  }

  snapshotCacheKey(): CorsCacheKeySnapshot {
    return {
      origin: this.origin,
      url: this.currentUrl().href,
      credentials: this.credentialsMode === 'include',
    };
  }

  clone(): Request {
    const copy = new Request(this.currentUrl(), {
      origin: this.origin,
      pipelineId: this.pipelineId,
      method: this.method,
      headers: this.headers,
      body: this.body,
      mode: this.mode,
      redirectMode: this.redirectMode,
      credentialsMode: this.credentialsMode,
      referrer: this.referrer,
      referrerPolicy: this.referrerPolicy,
      useCorsPreflight: this.useCorsPreflight,
      localUrlsOnly: this.localUrlsOnly,
      unsafeRequest: this.unsafeRequest,
      destination: this.destination,
    });
    copy.urlList = this.urlList.map((url) => new URL(url.href));
    copy.responseTainting = this.responseTainting;
    copy.redirectCount = this.redirectCount;
    return copy;
  }
}

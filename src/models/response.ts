import type { NetworkError } from '../errors/app-error.js';

import {
  CORS_SAFELISTED_RESPONSE_HEADERS,
  HeaderList,
  isForbiddenResponseHeader,
  parseHeaderNameList,
} from './headers.js';

export type ResponseType =
  | 'basic'
  | 'cors'
  | 'default'
  | 'opaque'
  | 'opaqueredirect'
  | 'error';

export type FilteredResponseType = Exclude<ResponseType, 'default' | 'error'>;

export type CacheState = 'none' | 'local' | 'validated' | 'partial';

export type ResponseStatus = readonly [code: number, reason: string];

export type ResponseBody =
  | { readonly kind: 'empty' }
  | { readonly kind: 'receiving'; readonly bytes: Uint8Array }
  | { readonly kind: 'done'; readonly bytes: Uint8Array };

const EMPTY_BYTES = new Uint8Array(0);

function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const merged = new Uint8Array(a.byteLength + b.byteLength);
  merged.set(a, 0);
  merged.set(b, a.byteLength);
  return merged;
}

/**
 * Body storage. Written only by the fetch that owns it; filtered responses
 * hold a reference to their internal response's cell rather than a copy.
 */
export class BodyCell {
  private current: ResponseBody = { kind: 'empty' };

  static done(bytes: Uint8Array = EMPTY_BYTES): BodyCell {
    const cell = new BodyCell();
    cell.current = { kind: 'done', bytes };
    return cell;
  }

  get state(): ResponseBody {
    return this.current;
  }

  append(chunk: Uint8Array): void {
    if (this.current.kind === 'done') {
      throw new Error('Cannot append to a completed body');
    }
    const existing =
      this.current.kind === 'receiving' ? this.current.bytes : EMPTY_BYTES;
    this.current = { kind: 'receiving', bytes: concatBytes(existing, chunk) };
  }

  finish(): void {
    if (this.current.kind === 'done') return;
    const bytes =
      this.current.kind === 'receiving' ? this.current.bytes : EMPTY_BYTES;
    this.current = { kind: 'done', bytes };
  }

  isDone(): boolean {
    return this.current.kind === 'done';
  }

  bytes(): Uint8Array {
    return this.current.kind === 'empty' ? EMPTY_BYTES : this.current.bytes;
  }

  text(): string {
    return new TextDecoder().decode(this.bytes());
  }
}

export interface ResponseInit {
  status?: ResponseStatus;
  headers?: HeaderList;
  body?: BodyCell;
  urlList?: URL[];
  cacheState?: CacheState;
}

const BODYLESS_TYPES: ReadonlySet<ResponseType> = new Set([
  'opaque',
  'opaqueredirect',
  'error',
]);

export class Response {
  responseType: ResponseType = 'default';
  status: ResponseStatus | undefined;
  headers: HeaderList;
  body: BodyCell;
  urlList: URL[];
  cacheState: CacheState;
  internalResponse: Response | undefined;
  terminationReason: NetworkError | undefined;
  aborted = false;

  constructor(init: ResponseInit = {}) {
    this.status = init.status ?? [200, 'OK'];
    this.headers = init.headers ?? new HeaderList();
    this.body = init.body ?? new BodyCell();
    this.urlList = init.urlList ?? [];
    this.cacheState = init.cacheState ?? 'none';
  }

  static networkError(reason: NetworkError): Response {
    const response = new Response();
    response.responseType = 'error';
    response.status = undefined;
    response.terminationReason = reason;
    return response;
  }

  get url(): URL | undefined {
    return this.urlList[this.urlList.length - 1];
  }

  isNetworkError(): boolean {
    return this.responseType === 'error';
  }

  isDone(): boolean {
    const ownDone = BODYLESS_TYPES.has(this.responseType) || this.body.isDone();
    const internalDone = this.internalResponse
      ? this.internalResponse.body.isDone()
      : true;
    return ownDone && internalDone;
  }

  actualResponse(): Response {
    return this.internalResponse ?? this;
  }

  toFiltered(type: FilteredResponseType): Response {
    if (this.responseType === 'error') return this;

    const internal = this.actualResponse();
    const filtered = new Response({
      status: internal.status,
      headers: internal.headers,
      body: internal.body,
      urlList: [...internal.urlList],
      cacheState: internal.cacheState,
    });
    filtered.responseType = type;
    filtered.internalResponse = internal;
    filtered.aborted = internal.aborted;

    switch (type) {
      case 'basic':
        filtered.headers = internal.headers.filter(
          (name) => !isForbiddenResponseHeader(name)
        );
        break;
      case 'cors': {
        const exposed = new Set(
          parseHeaderNameList(
            internal.headers.get('access-control-expose-headers')
          ).map((name) => name.toLowerCase())
        );
        filtered.headers = internal.headers.filter((name) => {
          const key = name.toLowerCase();
          if (isForbiddenResponseHeader(key)) return false;
          return CORS_SAFELISTED_RESPONSE_HEADERS.has(key) || exposed.has(key);
        });
        break;
      }
      case 'opaque':
      case 'opaqueredirect':
        filtered.urlList = [];
        filtered.status = undefined;
        filtered.headers = new HeaderList();
        filtered.body = new BodyCell();
        filtered.cacheState = 'none';
        break;
    }

    return filtered;
  }
}

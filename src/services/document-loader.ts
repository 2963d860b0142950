import { AppError } from '../errors/app-error.js';
import type { Destination, Request } from '../models/request.js';
import type { Response } from '../models/response.js';

import { fetchAsync } from './fetcher.js';
import type { FetchContext } from './fetcher/context.js';
import { CorsCache } from './fetcher/cors-cache.js';
import { type FetchTaskTarget, NoopFetchTarget } from './fetcher/target.js';
import { logDebug } from './logger.js';

export type LoadKind =
  | 'image'
  | 'script'
  | 'subframe'
  | 'stylesheet'
  | 'pageSource'
  | 'media';

export interface LoadType {
  readonly kind: LoadKind;
  readonly url: URL;
}

export function loadDestination(load: LoadType): Destination {
  switch (load.kind) {
    case 'image':
      return 'image';
    case 'script':
      return 'script';
    case 'subframe':
      return 'iframe';
    case 'stylesheet':
      return 'style';
    case 'pageSource':
      return 'document';
    case 'media':
      return 'media';
  }
}

function isSameLoad(a: LoadType, b: LoadType): boolean {
  return a.kind === b.kind && a.url.href === b.url.href;
}

function describeLoad(load: LoadType): string {
  return `${load.kind} ${load.url.href}`;
}

class LoadTrackingTarget implements FetchTaskTarget {
  constructor(
    private readonly loader: DocumentLoader,
    private readonly load: LoadType,
    private readonly inner: FetchTaskTarget
  ) {}

  processRequestBody(request: Request): void {
    this.inner.processRequestBody?.(request);
  }

  processRequestEof(request: Request): void {
    this.inner.processRequestEof?.(request);
  }

  processResponse(response: Response): void {
    this.inner.processResponse?.(response);
  }

  processResponseChunk(chunk: Uint8Array): void {
    this.inner.processResponseChunk?.(chunk);
  }

  processResponseEof(response: Response): void {
    try {
      this.loader.finishLoad(this.load);
    } finally {
      this.inner.processResponseEof?.(response);
    }
  }
}

/**
 * Tracks the loads a document is still waiting on. The document's load
 * event is held back while any of them is pending.
 */
export class DocumentLoader {
  private readonly blockingLoads: LoadType[] = [];
  private inhibited = false;

  constructor(
    private readonly context: FetchContext,
    private readonly cache: CorsCache = new CorsCache(),
    initialLoad?: URL
  ) {
    if (initialLoad) {
      this.blockingLoads.push({ kind: 'pageSource', url: initialLoad });
    }
  }

  addBlockingLoad(load: LoadType): void {
    this.blockingLoads.push(load);
  }

  /** Registers `load` and starts fetching it; the load finishes at response EOF. */
  fetchAsync(
    load: LoadType,
    request: Request,
    target: FetchTaskTarget = new NoopFetchTarget()
  ): void {
    if (request.destination === '') {
      request.destination = loadDestination(load);
    }
    this.addBlockingLoad(load);
    logDebug('Blocking load started', { load: describeLoad(load) });
    fetchAsync(
      request,
      new LoadTrackingTarget(this, load, target),
      this.context,
      this.cache
    );
  }

  finishLoad(load: LoadType): void {
    const index = this.blockingLoads.findIndex((pending) =>
      isSameLoad(pending, load)
    );
    if (index === -1) {
      throw new AppError(
        `Unknown completed load: ${describeLoad(load)}`,
        500,
        'UNKNOWN_LOAD'
      );
    }
    this.blockingLoads.splice(index, 1);
  }

  isBlocked(): boolean {
    return this.blockingLoads.length > 0;
  }

  inhibitEvents(): void {
    this.inhibited = true;
  }

  eventsInhibited(): boolean {
    return this.inhibited;
  }

  pendingLoads(): readonly LoadType[] {
    return [...this.blockingLoads];
  }
}

/** Holds a document's load event open until terminated. */
export class LoadBlocker {
  private load: LoadType | undefined;

  constructor(
    private readonly loader: DocumentLoader,
    load: LoadType
  ) {
    loader.addBlockingLoad(load);
    this.load = load;
  }

  /** Finishes the blocker's load, once. Returns undefined so callers can drop their reference. */
  static terminate(blocker: LoadBlocker | undefined): undefined {
    const load = blocker?.load;
    if (blocker && load) {
      blocker.load = undefined;
      blocker.loader.finishLoad(load);
    }
    return undefined;
  }

  get url(): URL | undefined {
    return this.load?.url;
  }
}

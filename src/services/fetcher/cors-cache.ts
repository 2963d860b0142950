import NodeCache from 'node-cache';

import { config } from '../../config/index.js';
import { originKey } from '../../models/origin.js';
import {
  type CorsCacheKeySnapshot,
  normalizeMethod,
  type Request,
} from '../../models/request.js';

import { logWarn } from '../logger.js';

type EntryKind = 'method' | 'header';

export interface CorsCacheEntry {
  readonly kind: EntryKind;
  readonly name: string;
  readonly maxAge: number;
  readonly credentials: boolean;
  readonly createdAt: number;
}

export interface CorsCacheOptions {
  maxKeys?: number;
}

function scopePrefix(snapshot: CorsCacheKeySnapshot): string {
  return `${originKey(snapshot.origin)} ${snapshot.url} `;
}

function buildKey(
  snapshot: CorsCacheKeySnapshot,
  credentials: boolean,
  kind: EntryKind,
  name: string
): string {
  return `${scopePrefix(snapshot)}${credentials ? 1 : 0} ${kind} ${name}`;
}

function normalizeName(kind: EntryKind, name: string): string {
  return kind === 'header' ? name.toLowerCase() : normalizeMethod(name);
}

/**
 * Preflight authorizations keyed by (origin, url, credentials). Expiry is
 * checked against the wall clock on every lookup.
 */
export class CorsCache {
  private readonly store: NodeCache;
  private readonly maxKeys: number;

  constructor(options: CorsCacheOptions = {}) {
    this.maxKeys = options.maxKeys ?? config.corsCache.maxKeys;
    this.store = new NodeCache({
      stdTTL: 0,
      checkperiod: 0,
      useClones: false,
      maxKeys: this.maxKeys,
    });
  }

  get size(): number {
    return this.store.keys().filter((key) => this.store.has(key)).length;
  }

  matchMethod(request: Request, method: string): boolean {
    return this.match(request.snapshotCacheKey(), 'method', method);
  }

  matchHeader(request: Request, header: string): boolean {
    return this.match(request.snapshotCacheKey(), 'header', header);
  }

  insert(
    request: Request,
    maxAge: number,
    methods: readonly string[],
    headers: readonly string[]
  ): void {
    const snapshot = request.snapshotCacheKey();
    for (const method of methods) {
      this.put(snapshot, 'method', method, maxAge);
    }
    for (const header of headers) {
      this.put(snapshot, 'header', header, maxAge);
    }
  }

  clear(request: Request): void {
    const prefix = scopePrefix(request.snapshotCacheKey());
    const stale = this.store.keys().filter((key) => key.startsWith(prefix));
    if (stale.length > 0) this.store.del(stale);
  }

  flush(): void {
    this.store.flushAll();
  }

  // Without a check period node-cache only evicts a stale key when it is read.
  private pruneExpired(): void {
    for (const key of this.store.keys()) this.store.has(key);
  }

  private match(
    snapshot: CorsCacheKeySnapshot,
    kind: EntryKind,
    name: string
  ): boolean {
    const normalized = normalizeName(kind, name);
    // Entries stored with credentials also cover uncredentialed requests.
    if (this.store.has(buildKey(snapshot, true, kind, normalized))) {
      return true;
    }
    if (snapshot.credentials) return false;
    return this.store.has(buildKey(snapshot, false, kind, normalized));
  }

  private put(
    snapshot: CorsCacheKeySnapshot,
    kind: EntryKind,
    name: string,
    maxAge: number
  ): void {
    const normalized = normalizeName(kind, name);
    const key = buildKey(snapshot, snapshot.credentials, kind, normalized);

    // node-cache treats a TTL of 0 as "never expires".
    if (maxAge <= 0) {
      this.store.del(key);
      return;
    }

    const entry: CorsCacheEntry = {
      kind,
      name: normalized,
      maxAge,
      credentials: snapshot.credentials,
      createdAt: Date.now(),
    };

    if (this.store.keys().length >= this.maxKeys) this.pruneExpired();

    try {
      this.store.set(key, entry, maxAge);
    } catch (error) {
      logWarn('CORS cache insert failed', {
        key: key.substring(0, 200),
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}

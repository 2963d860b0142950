import { randomUUID } from 'node:crypto';

export interface OpaqueOrigin {
  readonly kind: 'opaque';
  readonly id: string;
}

export interface TupleOrigin {
  readonly kind: 'tuple';
  readonly scheme: string;
  readonly host: string;
  readonly port: number;
}

export type Origin = OpaqueOrigin | TupleOrigin;

const DEFAULT_PORTS: Readonly<Record<string, number>> = {
  'http:': 80,
  'https:': 443,
  'ws:': 80,
  'wss:': 443,
  'ftp:': 21,
};

export function createOpaqueOrigin(): OpaqueOrigin {
  return { kind: 'opaque', id: randomUUID() };
}

/** Schemes without a tuple origin (about:, data:, file:, blob:) get a fresh opaque one. */
export function originOf(url: URL): Origin {
  const defaultPort = DEFAULT_PORTS[url.protocol];
  if (defaultPort === undefined || !url.hostname) return createOpaqueOrigin();

  return {
    kind: 'tuple',
    scheme: url.protocol.slice(0, -1),
    host: url.hostname,
    port: url.port ? Number.parseInt(url.port, 10) : defaultPort,
  };
}

export function isSameOrigin(a: Origin, b: Origin): boolean {
  if (a.kind === 'opaque') return b.kind === 'opaque' && a.id === b.id;
  if (b.kind === 'opaque') return false;
  return a.scheme === b.scheme && a.host === b.host && a.port === b.port;
}

export function isSameOriginUrl(origin: Origin, url: URL): boolean {
  if (origin.kind === 'opaque') return false;
  return isSameOrigin(origin, originOf(url));
}

export function serializeOrigin(origin: Origin): string {
  if (origin.kind === 'opaque') return 'null';

  const defaultPort = DEFAULT_PORTS[`${origin.scheme}:`];
  const port = origin.port === defaultPort ? '' : `:${origin.port}`;
  return `${origin.scheme}://${origin.host}${port}`;
}

export function originKey(origin: Origin): string {
  return origin.kind === 'opaque'
    ? `opaque:${origin.id}`
    : serializeOrigin(origin);
}

export type HeaderPair = readonly [name: string, value: string];

export type HeadersInit =
  | Readonly<Record<string, string | readonly string[]>>
  | Iterable<HeaderPair>;

function isPairIterable(init: HeadersInit): init is Iterable<HeaderPair> {
  return Symbol.iterator in init;
}

/**
 * Ordered header list. Names compare case-insensitively; the casing and
 * position of the first occurrence are kept.
 */
export class HeaderList implements Iterable<HeaderPair> {
  private entries: [string, string][] = [];

  static from(init?: HeadersInit): HeaderList {
    const list = new HeaderList();
    if (!init) return list;

    if (isPairIterable(init)) {
      for (const [name, value] of init) list.append(name, value);
      return list;
    }

    for (const [name, value] of Object.entries(init)) {
      if (typeof value === 'string') {
        list.append(name, value);
      } else {
        for (const item of value) list.append(name, item);
      }
    }
    return list;
  }

  get size(): number {
    return this.entries.length;
  }

  has(name: string): boolean {
    const key = name.toLowerCase();
    return this.entries.some(([entryName]) => entryName.toLowerCase() === key);
  }

  get(name: string): string | undefined {
    const values = this.getAll(name);
    return values.length > 0 ? values.join(', ') : undefined;
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.entries
      .filter(([entryName]) => entryName.toLowerCase() === key)
      .map(([, value]) => value);
  }

  append(name: string, value: string): void {
    this.entries.push([name, value]);
  }

  set(name: string, value: string): void {
    const key = name.toLowerCase();
    const index = this.entries.findIndex(
      ([entryName]) => entryName.toLowerCase() === key
    );
    if (index === -1) {
      this.entries.push([name, value]);
      return;
    }

    const existingName = this.entries[index]?.[0] ?? name;
    this.entries = this.entries.filter(
      ([entryName], i) => i === index || entryName.toLowerCase() !== key
    );
    this.entries[index] = [existingName, value];
  }

  delete(name: string): void {
    const key = name.toLowerCase();
    this.entries = this.entries.filter(
      ([entryName]) => entryName.toLowerCase() !== key
    );
  }

  names(): string[] {
    const seen = new Set<string>();
    const names: string[] = [];
    for (const [name] of this.entries) {
      const key = name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      names.push(name);
    }
    return names;
  }

  filter(predicate: (name: string, value: string) => boolean): HeaderList {
    const list = new HeaderList();
    for (const [name, value] of this.entries) {
      if (predicate(name, value)) list.append(name, value);
    }
    return list;
  }

  clone(): HeaderList {
    return this.filter(() => true);
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const name of this.names()) {
      record[name.toLowerCase()] = this.get(name) ?? '';
    }
    return record;
  }

  [Symbol.iterator](): Iterator<HeaderPair> {
    return this.entries
      .map(([name, value]): HeaderPair => [name, value])
      [Symbol.iterator]();
  }
}

const SIMPLE_METHODS = new Set(['GET', 'HEAD', 'POST']);

const SIMPLE_CONTENT_TYPES = new Set([
  'application/x-www-form-urlencoded',
  'multipart/form-data',
  'text/plain',
]);

const FORBIDDEN_RESPONSE_HEADERS = new Set(['set-cookie', 'set-cookie2']);

export const CORS_SAFELISTED_RESPONSE_HEADERS: ReadonlySet<string> = new Set([
  'cache-control',
  'content-language',
  'content-type',
  'expires',
  'last-modified',
  'pragma',
]);

export function isSimpleMethod(method: string): boolean {
  return SIMPLE_METHODS.has(method);
}

export function mediaTypeEssence(value: string): string {
  return (value.split(';')[0] ?? '').trim().toLowerCase();
}

export function isSimpleHeader(name: string, value: string): boolean {
  switch (name.toLowerCase()) {
    case 'accept':
    case 'accept-language':
    case 'content-language':
      return true;
    case 'content-type':
      return SIMPLE_CONTENT_TYPES.has(mediaTypeEssence(value));
    default:
      return false;
  }
}

export function isForbiddenResponseHeader(name: string): boolean {
  return FORBIDDEN_RESPONSE_HEADERS.has(name.toLowerCase());
}

export function parseHeaderNameList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

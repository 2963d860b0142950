export interface DecodedDataUrl {
  mediaType: string;
  body: Uint8Array;
}

const DEFAULT_MEDIA_TYPE = 'text/plain;charset=US-ASCII';

function percentDecodeBytes(input: string): Uint8Array {
  const source = new TextEncoder().encode(input);
  const output: number[] = [];

  for (let i = 0; i < source.length; i += 1) {
    const byte = source[i] ?? 0;
    if (byte === 0x25 && i + 2 < source.length) {
      const hex = String.fromCharCode(source[i + 1] ?? 0, source[i + 2] ?? 0);
      if (/^[0-9A-Fa-f]{2}$/.test(hex)) {
        output.push(Number.parseInt(hex, 16));
        i += 2;
        continue;
      }
    }
    output.push(byte);
  }

  return Uint8Array.from(output);
}

function decodeBase64(bytes: Uint8Array): Uint8Array | null {
  const text = new TextDecoder().decode(bytes).replace(/[\t\n\f\r ]/g, '');
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(text) || text.length % 4 === 1) {
    return null;
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}

function normalizeMediaType(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) return DEFAULT_MEDIA_TYPE;
  // A bare ";charset=..." keeps the default type.
  if (trimmed.startsWith(';')) return `text/plain${trimmed}`;
  return trimmed;
}

/** Returns null for anything that is not a well-formed data: URL. */
export function decodeDataUrl(url: URL): DecodedDataUrl | null {
  if (url.protocol !== 'data:') return null;

  const href = url.href.slice('data:'.length);
  const hashIndex = href.indexOf('#');
  const withoutFragment = hashIndex === -1 ? href : href.slice(0, hashIndex);
  const commaIndex = withoutFragment.indexOf(',');
  if (commaIndex === -1) return null;

  let header = withoutFragment.slice(0, commaIndex);
  const payload = withoutFragment.slice(commaIndex + 1);
  let bytes = percentDecodeBytes(payload);

  const base64Match = /;\s*base64\s*$/i.exec(header);
  if (base64Match) {
    header = header.slice(0, base64Match.index);
    const decoded = decodeBase64(bytes);
    if (!decoded) return null;
    bytes = decoded;
  }

  return {
    mediaType: normalizeMediaType(
      new TextDecoder().decode(percentDecodeBytes(header))
    ),
    body: bytes,
  };
}

import { describe, expect, test } from 'vitest';

import { decodeDataUrl } from '../../../src/utils/data-url.js';
import { guessContentType } from '../../../src/utils/mime.js';

function decodeText(href: string): { mediaType: string; text: string } | null {
  const decoded = decodeDataUrl(new URL(href));
  if (!decoded) return null;
  return {
    mediaType: decoded.mediaType,
    text: new TextDecoder().decode(decoded.body),
  };
}

describe('decodeDataUrl', () => {
  test('decodes a base64 payload', () => {
    expect(
      decodeText('data:text/html;base64,PHA+U2Vydm88L3A+')
    ).toEqual({ mediaType: 'text/html', text: '<p>Servo</p>' });
  });

  test('percent-decodes a plain payload', () => {
    expect(decodeText('data:text/plain;charset=utf-8,caf%C3%A9%20ok')).toEqual({
      mediaType: 'text/plain;charset=utf-8',
      text: 'café ok',
    });
  });

  test('defaults the media type', () => {
    expect(decodeText('data:,hello')).toEqual({
      mediaType: 'text/plain;charset=US-ASCII',
      text: 'hello',
    });
    expect(decodeText('data:;charset=utf-8,hi')?.mediaType).toBe(
      'text/plain;charset=utf-8'
    );
  });

  test('ignores the fragment', () => {
    expect(decodeText('data:text/plain,abc#frag')?.text).toBe('abc');
  });

  test('rejects malformed urls', () => {
    expect(decodeText('data:text/plain')).toBeNull();
    expect(decodeText('data:text/plain;base64,@@@')).toBeNull();
    expect(decodeDataUrl(new URL('https://example.com/'))).toBeNull();
  });
});

describe('guessContentType', () => {
  test('maps known extensions and falls back to octet-stream', () => {
    expect(guessContentType('/srv/static/site.css')).toBe('text/css');
    expect(guessContentType('/srv/static/INDEX.HTML')).toBe('text/html');
    expect(guessContentType('/srv/static/blob.bin')).toBe(
      'application/octet-stream'
    );
  });
});

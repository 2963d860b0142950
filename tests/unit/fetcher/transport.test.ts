import { gzipSync } from 'node:zlib';

import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { HeaderList } from '../../../src/models/headers.js';
import { HttpTransport } from '../../../src/services/fetcher/transport.js';

const ORIGIN = 'http://localhost:8000';

async function readAll(body: AsyncIterable<Uint8Array>): Promise<string> {
  const decoder = new TextDecoder();
  let text = '';
  for await (const chunk of body) {
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

describe('HttpTransport', () => {
  let agent: MockAgent;
  let transport: HttpTransport;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    transport = new HttpTransport({ dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  test('returns status, reason, headers and body', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/data', method: 'GET' })
      .reply(200, 'hello', { headers: { 'content-type': 'text/plain' } });

    const response = await transport.request({
      method: 'GET',
      url: new URL(`${ORIGIN}/data`),
      headers: HeaderList.from({ Accept: '*/*' }),
    });

    expect(response.status).toBe(200);
    expect(response.statusText).toBe('OK');
    expect(response.headers.get('content-type')).toBe('text/plain');
    expect(await readAll(response.body)).toBe('hello');
  });

  test('does not follow redirects', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/old', method: 'GET' })
      .reply(301, '', { headers: { location: '/new' } });

    const response = await transport.request({
      method: 'GET',
      url: new URL(`${ORIGIN}/old`),
      headers: new HeaderList(),
    });

    expect(response.status).toBe(301);
    expect(response.statusText).toBe('Moved Permanently');
    expect(response.headers.get('location')).toBe('/new');
  });

  test('passes arbitrary methods through', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/submit', method: 'CHICKEN' })
      .reply(202, 'accepted');

    const response = await transport.request({
      method: 'CHICKEN',
      url: new URL(`${ORIGIN}/submit`),
      headers: new HeaderList(),
      body: new TextEncoder().encode('payload'),
    });

    expect(response.status).toBe(202);
    expect(await readAll(response.body)).toBe('accepted');
  });

  test('decodes gzip bodies', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/zipped', method: 'GET' })
      .reply(200, gzipSync('compressed text'), {
        headers: { 'content-encoding': 'gzip' },
      });

    const response = await transport.request({
      method: 'GET',
      url: new URL(`${ORIGIN}/zipped`),
      headers: new HeaderList(),
    });

    expect(await readAll(response.body)).toBe('compressed text');
  });

  test('rejects when the connection is refused', async () => {
    await expect(
      transport.request({
        method: 'GET',
        url: new URL('http://unreachable.test/'),
        headers: new HeaderList(),
      })
    ).rejects.toThrow();
  });
});

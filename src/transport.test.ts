import { describe, it, expect, vi } from 'vitest';
import { TransportError } from './errors';
import { createLogger } from './logger';
import { HttpTransport } from './transport';
import { jsonResponse } from './test/fake-service';

function createTransport(fetchFn: typeof fetch, timeout = 1000) {
  return new HttpTransport({ fetch: fetchFn, timeout, logger: createLogger('silent') });
}

describe('HttpTransport', () => {
  it('appends query parameters and skips undefined ones', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({}));
    const transport = createTransport(fetchFn);

    await transport.send({
      method: 'GET',
      url: 'https://api.test/v1/files',
      query: { key: 'test-key', pageSize: 10, pageToken: undefined },
    });

    expect(fetchFn.mock.calls[0]?.[0]).toBe('https://api.test/v1/files?key=test-key&pageSize=10');
  });

  it('encodes JSON bodies', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({}));
    const transport = createTransport(fetchFn);

    await transport.send({ method: 'POST', url: 'https://api.test/v1/things', json: { a: 1 } });

    const init = fetchFn.mock.calls[0]?.[1];
    expect(init?.body).toBe('{"a":1}');
    expect(new Headers(init?.headers).get('content-type')).toBe('application/json');
  });

  it('sends raw bytes without a JSON content type', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({}));
    const transport = createTransport(fetchFn);

    await transport.send({
      method: 'POST',
      url: 'https://upload.test/session/1',
      body: new TextEncoder().encode('hello'),
    });

    const init = fetchFn.mock.calls[0]?.[1];
    const body = init?.body;
    expect(body).toBeInstanceOf(Blob);
    expect(body instanceof Blob ? await body.text() : undefined).toBe('hello');
    expect(new Headers(init?.headers).get('content-type')).toBeNull();
  });

  it('returns non-200 responses instead of throwing', async () => {
    const transport = createTransport(async () =>
      jsonResponse({ error: { message: 'quota exceeded' } }, 429)
    );

    const response = await transport.send({ method: 'GET', url: 'https://api.test/v1/files' });

    expect(response.status).toBe(429);
    expect(response.body).toEqual({ error: { message: 'quota exceeded' } });
  });

  it('keeps non-JSON bodies as text', async () => {
    const transport = createTransport(async () =>
      new Response('Bad Gateway', { status: 502, headers: { 'content-type': 'text/plain' } })
    );

    const response = await transport.send({ method: 'GET', url: 'https://api.test/v1/files' });

    expect(response.body).toBe('Bad Gateway');
  });

  it('falls back to text when a JSON body does not parse', async () => {
    const transport = createTransport(async () =>
      new Response('{"truncated', { status: 200, headers: { 'content-type': 'application/json' } })
    );

    const response = await transport.send({ method: 'GET', url: 'https://api.test/v1/files' });

    expect(response.body).toBe('{"truncated');
  });

  it('exposes every value of a repeated response header', async () => {
    const transport = createTransport(async () =>
      new Response(null, {
        status: 200,
        headers: [
          ['X-Goog-Upload-URL', 'https://upload.test/a'],
          ['X-Goog-Upload-URL', 'https://upload.test/b'],
        ],
      })
    );

    const response = await transport.send({ method: 'POST', url: 'https://api.test/upload' });

    expect(response.header('x-goog-upload-url')).toEqual([
      'https://upload.test/a',
      'https://upload.test/b',
    ]);
    expect(response.header('X-Missing')).toEqual([]);
  });

  it('splits repeated header values only where a new value starts', async () => {
    const transport = createTransport(async () =>
      new Response(null, {
        status: 200,
        headers: [
          ['X-Goog-Upload-URL', 'https://upload.test/a?ids=1,2'],
          ['X-Goog-Upload-URL', ''],
          ['X-Goog-Upload-URL', 'https://upload.test/b'],
        ],
      })
    );

    const response = await transport.send({ method: 'POST', url: 'https://api.test/upload' });

    expect(response.header('X-Goog-Upload-URL')).toEqual([
      'https://upload.test/a?ids=1,2',
      '',
      'https://upload.test/b',
    ]);
  });

  it('sends repeated request header values', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({}));
    const transport = createTransport(fetchFn);

    await transport.send({
      method: 'GET',
      url: 'https://api.test/v1/files',
      headers: { Accept: ['application/json', 'text/plain'] },
    });

    expect(new Headers(fetchFn.mock.calls[0]?.[1]?.headers).get('accept')).toBe(
      'application/json, text/plain'
    );
  });

  it('wraps network failures in TransportError', async () => {
    const transport = createTransport(async () => {
      throw new TypeError('fetch failed');
    });

    const sent = transport.send({ method: 'GET', url: 'https://api.test/v1/files?key=test-key' });

    await expect(sent).rejects.toBeInstanceOf(TransportError);
    await expect(sent).rejects.toMatchObject({
      kind: 'transport',
      timedOut: false,
      message: 'GET https://api.test/v1/files?key=[REDACTED] failed: fetch failed',
    });
  });

  it('times out with TransportError', async () => {
    const transport = createTransport(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
      20
    );

    const sent = transport.send({ method: 'GET', url: 'https://api.test/v1/slow' });

    await expect(sent).rejects.toMatchObject({
      kind: 'transport',
      timedOut: true,
      message: 'GET https://api.test/v1/slow timed out after 20ms',
    });
  });

  it('lets a request override the default timeout', async () => {
    const transport = createTransport(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
      5000
    );

    await expect(
      transport.send({ method: 'GET', url: 'https://api.test/v1/slow', timeout: 10 })
    ).rejects.toMatchObject({ timedOut: true });
  });
});

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { Result } from '../errors';

export const API_ORIGIN = 'https://generativelanguage.googleapis.com';
export const UPLOAD_ORIGIN = 'https://upload.test';
export const TEST_API_KEY = 'test-key';

type FetchInput = Parameters<typeof fetch>[0];
type FetchInit = Parameters<typeof fetch>[1];

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  /** Decoded JSON body */
  json?: unknown;
  /** Raw body bytes */
  bytes?: Uint8Array;
}

export interface FakeServiceOptions {
  /** Answer a request instead of the default handler; return undefined to fall through */
  route?: (request: RecordedRequest) => Response | undefined;
  /** Milliseconds to wait before answering the transfer of a given display name */
  transferDelay?: (displayName: string) => number;
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json; charset=UTF-8', ...headers },
  });
}

/**
 * In-process stand-in for the file service, installed as the client's fetch.
 *
 * Initiate requests get a session URL under UPLOAD_ORIGIN; transfers to that
 * URL answer with a file object built from what was announced and sent.
 */
export class FakeFileService {
  readonly requests: RecordedRequest[] = [];
  readonly fetch = vi.fn<typeof fetch>((input, init) => this.handle(input, init));
  private readonly options: FakeServiceOptions;
  private readonly sessions = new Map<string, { displayName: string; mimeType: string }>();
  private nextSession = 1;

  constructor(options: FakeServiceOptions = {}) {
    this.options = options;
  }

  /** Requests sent to upload session URLs */
  get transfers(): RecordedRequest[] {
    return this.requests.filter((r) => r.url.origin === UPLOAD_ORIGIN);
  }

  /** Initiate requests */
  get initiations(): RecordedRequest[] {
    return this.requests.filter((r) => r.url.pathname === '/upload/v1beta/files');
  }

  private async handle(input: FetchInput, init: FetchInit): Promise<Response> {
    const request = await record(input, init);
    this.requests.push(request);

    const routed = this.options.route?.(request);
    if (routed) return routed;

    if (request.method === 'POST' && request.url.pathname === '/upload/v1beta/files') {
      return this.initiate(request);
    }

    const session = this.sessions.get(request.url.href);
    if (request.method === 'POST' && session) {
      const delay = this.options.transferDelay?.(session.displayName) ?? 0;
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      return this.transfer(request, session);
    }

    return jsonResponse({ error: { code: 404, message: 'Not found' } }, 404);
  }

  private initiate(request: RecordedRequest): Response {
    const url = `${UPLOAD_ORIGIN}/session/${this.nextSession++}`;
    const json = request.json;
    const displayName =
      isObject(json) && isObject(json.file) && typeof json.file.display_name === 'string'
        ? json.file.display_name
        : '';

    this.sessions.set(url, {
      displayName,
      mimeType: request.headers.get('X-Goog-Upload-Header-Content-Type') ?? '',
    });

    return new Response(null, {
      status: 200,
      headers: { 'X-Goog-Upload-URL': url, 'X-Goog-Upload-Status': 'active' },
    });
  }

  private transfer(
    request: RecordedRequest,
    session: { displayName: string; mimeType: string }
  ): Response {
    const id = request.url.pathname.split('/').pop() ?? '0';
    return jsonResponse({
      file: remoteFile({
        name: `files/file-${id}`,
        displayName: session.displayName,
        mimeType: session.mimeType,
        sizeBytes: String(request.bytes?.byteLength ?? 0),
      }),
    });
  }
}

/**
 * A file object as the service returns it
 */
export function remoteFile(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const name = typeof overrides.name === 'string' ? overrides.name : 'files/abc123';
  return {
    name,
    displayName: 'report.pdf',
    mimeType: 'application/pdf',
    sizeBytes: '12345',
    createTime: '2024-05-01T10:00:00.000000Z',
    updateTime: '2024-05-01T10:00:00.000000Z',
    expirationTime: '2024-05-03T10:00:00.000000Z',
    sha256Hash: 'ZmFrZS1oYXNo',
    uri: `${API_ORIGIN}/v1beta/${name}`,
    state: 'ACTIVE',
    ...overrides,
  };
}

/**
 * Temporary directory holding files for upload tests
 */
export async function createFixtureDir(
  files: Record<string, string | Uint8Array>
): Promise<{ dir: string; path: (name: string) => string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'genai-upload-'));
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(dir, name), content);
  }
  return {
    dir,
    path: (name) => join(dir, name),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

async function record(input: FetchInput, init: FetchInit): Promise<RecordedRequest> {
  const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
  const headers = new Headers(init?.headers);
  const request: RecordedRequest = {
    method: init?.method ?? 'GET',
    url: new URL(href),
    headers,
  };

  const body = init?.body;
  if (typeof body === 'string') {
    request.json = JSON.parse(body);
  } else if (body instanceof Blob) {
    request.bytes = new Uint8Array(await body.arrayBuffer());
  }
  return request;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.success) {
    throw new Error(`Expected a successful result, got ${String(result.error)}`);
  }
  return result.data;
}

export function unwrapError<T, E>(result: Result<T, E>): E {
  if (result.success) {
    throw new Error('Expected a failed result');
  }
  return result.error;
}

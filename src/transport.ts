import type { Logger } from 'pino';
import { TransportError } from './errors';
import type { TransportRequest, TransportResponse } from './types';

export interface TransportOptions {
  fetch?: typeof fetch;
  /** Default request timeout in milliseconds */
  timeout: number;
  logger: Logger;
}

/**
 * HTTP transport on top of fetch.
 *
 * Every completed request resolves, whatever its status; only requests that
 * never complete (network failure, timeout) reject, with a TransportError.
 * Nothing is retried here.
 */
export class HttpTransport {
  private readonly fetchFn: typeof fetch;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(options: TransportOptions) {
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeout = options.timeout;
    this.logger = options.logger;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const url = buildUrl(request.url, request.query);
    const headers = new Headers();

    for (const [name, value] of Object.entries(request.headers ?? {})) {
      for (const v of Array.isArray(value) ? value : [value]) {
        headers.append(name, v);
      }
    }

    let body: Blob | string | undefined;
    if (request.body !== undefined) {
      body = toBlob(request.body);
    } else if (request.json !== undefined) {
      headers.set('Content-Type', 'application/json');
      body = JSON.stringify(request.json);
    }

    const timeout = request.timeout ?? this.timeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    this.logger.debug({ method: request.method, url: redactUrl(url) }, 'HTTP request');

    try {
      const response = await this.fetchFn(url, {
        method: request.method,
        headers,
        body,
        signal: controller.signal,
      });

      const decoded = await this.parseBody(response);

      return {
        status: response.status,
        header: (name) => splitHeader(response.headers.get(name)),
        body: decoded,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(
          `${request.method} ${redactUrl(url)} timed out after ${timeout}ms`,
          { cause: error, timedOut: true }
        );
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(
        `${request.method} ${redactUrl(url)} failed: ${reason}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Decode JSON bodies, keep everything else as text
   */
  private async parseBody(response: Response): Promise<unknown> {
    const text = await response.text();
    const contentType = response.headers.get('content-type') ?? '';

    if (!contentType.includes('json') || text === '') {
      return text;
    }

    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
}

function buildUrl(
  base: string,
  query?: Record<string, string | number | undefined>
): string {
  if (!query) return base;

  const url = new URL(base);
  for (const [name, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.set(name, String(value));
    }
  }
  return url.toString();
}

/**
 * fetch joins repeated header values with ", ". A comma separates two values
 * only where the next one is empty or starts an absolute URL, so commas inside
 * a URL stay part of it and empty values are still counted.
 */
const HEADER_VALUE_BOUNDARY = /,\s*(?=[a-z][a-z0-9+.-]*:\/\/|,|$)/i;

function splitHeader(value: string | null): string[] {
  if (value === null) return [];
  return value.split(HEADER_VALUE_BOUNDARY).map((v) => v.trim());
}

function redactUrl(url: string): string {
  return url.replace(/([?&]key=)[^&]*/, '$1[REDACTED]');
}

/**
 * Copy bytes into a standalone ArrayBuffer-backed Blob
 */
function toBlob(data: Uint8Array): Blob {
  const copy = new ArrayBuffer(data.byteLength);
  new Uint8Array(copy).set(data);
  return new Blob([copy]);
}

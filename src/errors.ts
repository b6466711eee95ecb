/**
 * Discriminant carried by every SDK error
 */
export type GenAIErrorKind =
  | 'local_io'
  | 'protocol_violation'
  | 'remote'
  | 'transport'
  | 'malformed_response'
  | 'invalid_argument'
  | 'batch_task';

/**
 * Base class for every error the SDK reports
 */
export abstract class GenAIError extends Error {
  abstract readonly kind: GenAIErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A local file could not be stat'ed or read
 */
export class LocalIOError extends GenAIError {
  readonly kind = 'local_io' as const;
  /** Path of the local file */
  public readonly path: string;
  /** Node error code (ENOENT, EACCES, ...) when one is available */
  public readonly code?: string;

  constructor(path: string, message: string, options?: { cause?: unknown; code?: string }) {
    super(`${message}: ${path}`, options);
    this.path = path;
    this.code = options?.code;
  }
}

/**
 * The service answered, but not in the shape the upload handshake requires
 */
export class ProtocolViolationError extends GenAIError {
  readonly kind = 'protocol_violation' as const;
}

/**
 * The service answered with a status other than 200
 */
export class RemoteError extends GenAIError {
  readonly kind = 'remote' as const;
  /** HTTP status code */
  public readonly status: number;
  /** Decoded response body */
  public readonly body: unknown;

  constructor(status: number, body: unknown, message?: string) {
    super(message ?? `HTTP ${status}: ${describeBody(body)}`);
    this.status = status;
    this.body = body;
  }
}

/**
 * The request never completed (DNS, connection, timeout)
 */
export class TransportError extends GenAIError {
  readonly kind = 'transport' as const;
  public readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, options);
    this.timedOut = options?.timedOut ?? false;
  }
}

/**
 * A response payload failed normalization
 */
export class MalformedResponseError extends GenAIError {
  readonly kind = 'malformed_response' as const;
  /** One entry per failed field, formatted as `path: reason` */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message} (${issues.join('; ')})` : message);
    this.issues = issues;
  }
}

export class InvalidArgumentError extends GenAIError {
  readonly kind = 'invalid_argument' as const;
}

/**
 * A batch task terminated abnormally instead of reporting a result
 */
export class BatchTaskError extends GenAIError {
  readonly kind = 'batch_task' as const;
  /** Input position of the task that crashed */
  public readonly index: number;

  constructor(index: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Batch task ${index} crashed: ${reason}`, { cause });
    this.index = index;
  }
}

/**
 * Errors a single file upload can report
 */
export type UploadError =
  | LocalIOError
  | ProtocolViolationError
  | RemoteError
  | TransportError
  | MalformedResponseError
  | InvalidArgumentError;

/**
 * Errors a batch upload can report
 */
export type BatchUploadError = UploadError | BatchTaskError;

/**
 * Errors the request/response operations (list, get, delete, generate) can report
 */
export type RequestError =
  | RemoteError
  | TransportError
  | MalformedResponseError
  | InvalidArgumentError;

export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

export function isUploadError(error: unknown): error is UploadError {
  return (
    error instanceof LocalIOError ||
    error instanceof ProtocolViolationError ||
    error instanceof RemoteError ||
    error instanceof TransportError ||
    error instanceof MalformedResponseError ||
    error instanceof InvalidArgumentError
  );
}

export function isRequestError(error: unknown): error is RequestError {
  return (
    error instanceof RemoteError ||
    error instanceof TransportError ||
    error instanceof MalformedResponseError ||
    error instanceof InvalidArgumentError
  );
}

function describeBody(body: unknown): string {
  if (typeof body === 'string') {
    return body.length > 0 ? body : '<empty body>';
  }
  try {
    return JSON.stringify(body) ?? String(body);
  } catch {
    return String(body);
  }
}

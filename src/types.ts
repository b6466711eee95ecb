import type { Logger, LevelWithSilent } from 'pino';

/**
 * Configuration options for the GenAIClient
 */
export interface ClientConfig {
  /** API key sent as the `key` query parameter on service endpoints */
  apiKey: string;
  /** Service origin (default: https://generativelanguage.googleapis.com) */
  baseUrl?: string;
  /** API version path segment (default: v1beta) */
  apiVersion?: string;
  /** Timeout in milliseconds for JSON requests (default: 30000) */
  timeout?: number;
  /** Timeout in milliseconds for the byte transfer to an upload URL (default: 600000) */
  uploadTimeout?: number;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
  /** Local file access (default: node:fs) */
  storage?: LocalStorage;
  /** Logger to use instead of creating one from `logLevel` */
  logger?: Logger;
  /** Level of the logger the client creates (default: warn) */
  logLevel?: LevelWithSilent;
}

/**
 * Stat result from local storage
 */
export interface LocalFileStat {
  /** Size in bytes */
  size: number;
  /** Whether the path is a regular file */
  isFile: boolean;
}

/**
 * Local storage collaborator used by upload sessions
 */
export interface LocalStorage {
  stat(path: string): Promise<LocalFileStat>;
  readFile(path: string): Promise<Uint8Array>;
}

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * A single request handed to the transport
 */
export interface TransportRequest {
  method: HttpMethod;
  /** Fully qualified URL */
  url: string;
  /** Header values; an array sends the header once per value */
  headers?: Record<string, string | string[]>;
  /** Query parameters appended to `url` */
  query?: Record<string, string | number | undefined>;
  /** JSON-encodable body */
  json?: unknown;
  /** Raw byte body, sent as is */
  body?: Uint8Array;
  /** Overrides the transport's default timeout */
  timeout?: number;
}

/**
 * What the transport returns for every completed request, whatever its status
 */
export interface TransportResponse {
  status: number;
  /** All values received for a header, in order; empty when absent */
  header(name: string): string[];
  /** JSON-decoded body, or the raw text when the body is not JSON */
  body: unknown;
}

/**
 * Options for uploading a single file
 */
export interface UploadOptions {
  /** Overrides the MIME type inferred from the path extension */
  mimeType?: string;
  /** Overrides the default display name (the path's base name) */
  displayName?: string;
}

/**
 * Options for uploading several files at once
 */
export interface BatchUploadOptions extends UploadOptions {
  /** Maximum simultaneous upload sessions (default: unbounded) */
  concurrency?: number;
  /** Called as each file finishes uploading, while the batch is still running */
  onFileComplete?: (file: FileDescriptor, index: number) => void;
}

/**
 * Immutable input of one upload session
 */
export interface UploadRequest {
  readonly path: string;
  readonly mimeType: string;
  readonly displayName: string;
}

/**
 * Protocol phase of an upload session
 */
export type UploadPhase =
  | 'idle'
  | 'initiating'
  | 'transferring'
  | 'finalizing'
  | 'completed'
  | 'failed';

/**
 * Lifecycle state reported by the service for an uploaded file
 */
export type FileState = 'STATE_UNSPECIFIED' | 'PROCESSING' | 'ACTIVE' | 'FAILED';

/**
 * An uploaded file as confirmed by the service
 */
export interface FileDescriptor {
  /** Resource name assigned by the service (`files/...`) */
  readonly name: string;
  /** Locator used to reference the file in generation requests */
  readonly uri: string;
  readonly mimeType: string;
  readonly displayName?: string;
  readonly sizeBytes: number;
  /** Known states are typed; any other tag the service sends is kept verbatim */
  readonly state?: FileState | (string & {});
  readonly sha256Hash?: string;
  readonly createTime?: string;
  readonly updateTime?: string;
  readonly expirationTime?: string;
}

/**
 * Parameters for listing files
 */
export interface ListFilesOptions {
  /** Maximum number of files per page */
  pageSize?: number;
  /** Token from a previous page */
  pageToken?: string;
}

/**
 * One page of files
 */
export interface FileList {
  files: FileDescriptor[];
  /** Present when more pages are available */
  nextPageToken?: string;
}

/**
 * Reference to an uploaded file inside a content part
 */
export interface FileData {
  mimeType: string;
  fileUri: string;
}

/**
 * Base64 encoded bytes embedded in a content part
 */
export interface InlineData {
  mimeType: string;
  data: string;
}

/**
 * A request content part
 */
export type Part =
  | { text: string }
  | { fileData: FileData }
  | { inlineData: InlineData };

/**
 * A turn of a generation request
 */
export interface Content {
  role?: 'user' | 'model';
  parts: Part[];
}

/**
 * Prompt text, or explicit contents (for example text plus uploaded files)
 */
export type GenerateContentInput = string | Content[];

/**
 * A part of a generated candidate
 */
export interface ResponsePart {
  text?: string;
  inlineData?: InlineData;
}

export interface ResponseContent {
  parts: ResponsePart[];
  role: string;
}

export interface SafetyRating {
  category?: string;
  probability?: string;
}

export interface Candidate {
  content: ResponseContent;
  finishReason: string;
  index: number;
  safetyRatings: SafetyRating[];
}

export interface UsageMetadata {
  promptTokenCount: number;
  candidatesTokenCount: number;
  totalTokenCount: number;
}

/**
 * Normalized response from a generation request
 */
export interface GenerateContentResponse {
  candidates: Candidate[];
  usageMetadata?: UsageMetadata;
}

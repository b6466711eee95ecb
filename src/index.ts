/**
 * GenAI File Uploader
 *
 * A TypeScript client for the Generative Language file service:
 * - Resumable uploads (initiate, transfer, finalize) of local files
 * - Concurrent batch uploads with input ordering and fail-fast errors
 * - File listing, lookup and deletion
 * - Content generation that references uploaded files
 *
 * @packageDocumentation
 */

export { GenAIClient } from './client';
export { configFromEnv, DEFAULT_CONFIG } from './config';
export { uploadFile, uploadFiles, listFiles, getFile, deleteFile } from './files';
export { generateContent, fileDataPart, toGenerateContentResponse } from './generate-content';
export { toFileDescriptor } from './file-descriptor';
export { createUploadRequest, inferMimeType } from './upload-request';
export { UploadSession } from './upload-session';
export { runBatch } from './batch-upload';
export { HttpTransport } from './transport';
export { nodeFileStorage } from './local-storage';

export type { BatchOptions } from './batch-upload';
export type { ResolvedConfig } from './config';

export type {
  // Configuration
  ClientConfig,
  LocalStorage,
  LocalFileStat,

  // Transport
  HttpMethod,
  TransportRequest,
  TransportResponse,

  // Upload types
  UploadOptions,
  BatchUploadOptions,
  UploadRequest,
  UploadPhase,
  FileDescriptor,
  FileState,
  FileList,
  ListFilesOptions,

  // Generation types
  Content,
  Part,
  FileData,
  InlineData,
  GenerateContentInput,
  GenerateContentResponse,
  Candidate,
  ResponseContent,
  ResponsePart,
  SafetyRating,
  UsageMetadata,
} from './types';

export {
  GenAIError,
  LocalIOError,
  ProtocolViolationError,
  RemoteError,
  TransportError,
  MalformedResponseError,
  InvalidArgumentError,
  BatchTaskError,
  isUploadError,
  isRequestError,
} from './errors';

export type {
  GenAIErrorKind,
  UploadError,
  BatchUploadError,
  RequestError,
  Result,
} from './errors';

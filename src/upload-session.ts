import type { Logger } from 'pino';
import type { GenAIClient } from './client';
import {
  LocalIOError,
  ProtocolViolationError,
  RemoteError,
} from './errors';
import { toFileDescriptor } from './file-descriptor';
import { errorCode } from './local-storage';
import { expectOk, isRecord } from './request';
import type {
  FileDescriptor,
  LocalFileStat,
  TransportResponse,
  UploadPhase,
  UploadRequest,
} from './types';

export const UPLOAD_URL_HEADER = 'X-Goog-Upload-URL';

/**
 * One resumable upload of a local file.
 *
 * The protocol runs in strictly sequential phases:
 *
 * 1. initiate: announce size, MIME type and display name; the service answers
 *    with a single-use upload URL in the `X-Goog-Upload-URL` header
 * 2. transfer: send the whole file to that URL with the combined
 *    `upload, finalize` command at offset 0
 * 3. finalize: decode the `{ file: {...} }` body into a FileDescriptor
 *
 * The file is read into memory in one piece and a partially sent upload cannot
 * be resumed. A session runs once; create a new one to retry.
 *
 * @example
 * ```typescript
 * const session = new UploadSession(client, createUploadRequest('report.pdf'));
 * const file = await session.run();
 * ```
 */
export class UploadSession {
  readonly request: UploadRequest;
  private readonly client: GenAIClient;
  private readonly logger: Logger;
  private currentPhase: UploadPhase = 'idle';
  private negotiatedUrl: string | undefined;
  private payloadLength = 0;

  constructor(client: GenAIClient, request: UploadRequest) {
    this.client = client;
    this.request = request;
    this.logger = client.logger.child({ path: request.path });
  }

  get phase(): UploadPhase {
    return this.currentPhase;
  }

  /** Upload URL issued by the service, once initiated */
  get uploadUrl(): string | undefined {
    return this.negotiatedUrl;
  }

  /** Byte length of the payload, once the file has been stat'ed */
  get byteLength(): number {
    return this.payloadLength;
  }

  /**
   * Run every phase and return the descriptor of the uploaded file
   *
   * @throws LocalIOError, ProtocolViolationError, RemoteError, TransportError or MalformedResponseError
   */
  async run(): Promise<FileDescriptor> {
    if (this.currentPhase !== 'idle') {
      throw new Error(`Upload session already ${this.currentPhase}`);
    }

    try {
      this.payloadLength = await this.statLocalFile();

      this.setPhase('initiating');
      this.negotiatedUrl = await this.initiate();

      this.setPhase('transferring');
      const bytes = await this.readLocalFile();
      const response = await this.transfer(this.negotiatedUrl, bytes);

      this.setPhase('finalizing');
      const file = this.finalize(response);

      this.setPhase('completed');
      this.logger.info(
        { name: file.name, sizeBytes: file.sizeBytes, mimeType: file.mimeType },
        'File uploaded'
      );
      return file;
    } catch (error) {
      const failedIn = this.currentPhase;
      this.setPhase('failed');
      if (!(error instanceof RemoteError)) {
        this.logger.warn({ err: error, phase: failedIn }, 'Upload failed');
      }
      throw error;
    }
  }

  private setPhase(phase: UploadPhase) {
    this.currentPhase = phase;
    this.logger.debug({ phase }, 'Upload phase');
  }

  private async statLocalFile(): Promise<number> {
    const { path } = this.request;

    let stat: LocalFileStat;
    try {
      stat = await this.client.storage.stat(path);
    } catch (error) {
      throw new LocalIOError(path, 'Cannot stat file', { cause: error, code: errorCode(error) });
    }

    if (!stat.isFile) {
      throw new LocalIOError(path, 'Not a regular file');
    }
    return stat.size;
  }

  private async initiate(): Promise<string> {
    const { mimeType, displayName } = this.request;

    const response = await this.client.transport.send({
      method: 'POST',
      url: this.client.uploadEndpoint('files'),
      query: this.client.authQuery(),
      headers: {
        'X-Goog-Upload-Protocol': 'resumable',
        'X-Goog-Upload-Command': 'start',
        'X-Goog-Upload-Header-Content-Length': String(this.payloadLength),
        'X-Goog-Upload-Header-Content-Type': mimeType,
      },
      json: { file: { display_name: displayName } },
    });

    expectOk(response, this.logger);

    const urls = response.header(UPLOAD_URL_HEADER);
    const [uploadUrl] = urls;
    if (urls.length !== 1 || uploadUrl === undefined) {
      throw new ProtocolViolationError(
        `Expected exactly one ${UPLOAD_URL_HEADER} header, got ${urls.length}`
      );
    }
    if (uploadUrl === '') {
      throw new ProtocolViolationError(`${UPLOAD_URL_HEADER} header is empty`);
    }
    return uploadUrl;
  }

  private async readLocalFile(): Promise<Uint8Array> {
    const { path } = this.request;

    let bytes: Uint8Array;
    try {
      bytes = await this.client.storage.readFile(path);
    } catch (error) {
      throw new LocalIOError(path, 'Cannot read file', { cause: error, code: errorCode(error) });
    }

    if (bytes.byteLength !== this.payloadLength) {
      throw new LocalIOError(
        path,
        `File changed during upload (announced ${this.payloadLength} bytes, read ${bytes.byteLength})`
      );
    }
    return bytes;
  }

  /**
   * The upload URL is fully qualified and self-authenticating, so neither the
   * API key nor the JSON defaults of the initiate request are sent along.
   */
  private transfer(uploadUrl: string, bytes: Uint8Array): Promise<TransportResponse> {
    return this.client.transport.send({
      method: 'POST',
      url: uploadUrl,
      headers: {
        'Content-Length': String(bytes.byteLength),
        'X-Goog-Upload-Offset': '0',
        'X-Goog-Upload-Command': 'upload, finalize',
      },
      body: bytes,
      timeout: this.client.config.uploadTimeout,
    });
  }

  private finalize(response: TransportResponse): FileDescriptor {
    const body = expectOk(response, this.logger);

    if (!isRecord(body) || !isRecord(body.file)) {
      throw new ProtocolViolationError('Upload response has no "file" object');
    }
    return toFileDescriptor(body.file);
  }
}

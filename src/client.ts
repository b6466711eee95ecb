import type { Logger } from 'pino';
import { resolveConfig, type ResolvedConfig } from './config';
import { deleteFile, getFile, listFiles, uploadFile, uploadFiles } from './files';
import { generateContent } from './generate-content';
import { nodeFileStorage } from './local-storage';
import { createLogger } from './logger';
import { HttpTransport } from './transport';
import type {
  BatchUploadOptions,
  ClientConfig,
  GenerateContentInput,
  ListFilesOptions,
  LocalStorage,
  UploadOptions,
} from './types';

/**
 * GenAIClient
 *
 * Holds one explicit configuration (API key, endpoints, transport, logger,
 * local storage) and passes it to every operation. Create one per
 * configuration; several clients can coexist in a process.
 *
 * @example
 * ```typescript
 * const client = new GenAIClient({ apiKey: 'your-api-key' });
 *
 * const result = await client.uploadFiles(['a.pdf', 'b.png'], { concurrency: 4 });
 * if (!result.success) {
 *   console.error(result.error.kind, result.error.message);
 * }
 * ```
 */
export class GenAIClient {
  readonly config: ResolvedConfig;
  readonly logger: Logger;
  readonly transport: HttpTransport;
  readonly storage: LocalStorage;

  constructor(config: ClientConfig) {
    this.config = resolveConfig(config);
    this.logger = this.config.logger ?? createLogger(this.config.logLevel);
    this.storage = this.config.storage ?? nodeFileStorage;
    this.transport = new HttpTransport({
      fetch: this.config.fetch,
      timeout: this.config.timeout,
      logger: this.logger,
    });
  }

  /**
   * URL of a versioned API resource, e.g. `files` or `models/x:generateContent`
   */
  apiEndpoint(resource: string): string {
    return `${this.config.baseUrl}/${this.config.apiVersion}/${resource}`;
  }

  /**
   * URL of a versioned upload resource
   */
  uploadEndpoint(resource: string): string {
    return `${this.config.baseUrl}/upload/${this.config.apiVersion}/${resource}`;
  }

  /**
   * Query parameters that authenticate a request to the service endpoints
   */
  authQuery(): { key: string } {
    return { key: this.config.apiKey };
  }

  uploadFile(path: string, options?: UploadOptions) {
    return uploadFile(this, path, options);
  }

  uploadFiles(paths: readonly string[], options?: BatchUploadOptions) {
    return uploadFiles(this, paths, options);
  }

  listFiles(options?: ListFilesOptions) {
    return listFiles(this, options);
  }

  getFile(name: string) {
    return getFile(this, name);
  }

  deleteFile(name: string) {
    return deleteFile(this, name);
  }

  generateContent(model: string, input: GenerateContentInput) {
    return generateContent(this, model, input);
  }
}

import { z } from 'zod';
import { runBatch } from './batch-upload';
import type { GenAIClient } from './client';
import {
  InvalidArgumentError,
  MalformedResponseError,
  fail,
  isRequestError,
  isUploadError,
  type BatchUploadError,
  type RequestError,
  type Result,
  type UploadError,
} from './errors';
import { formatIssues, toFileDescriptor } from './file-descriptor';
import { attempt, expectOk } from './request';
import { createUploadRequest } from './upload-request';
import { UploadSession } from './upload-session';
import type {
  BatchUploadOptions,
  FileDescriptor,
  FileList,
  ListFilesOptions,
  UploadOptions,
} from './types';

const fileListSchema = z.object({
  files: z.array(z.unknown()).default([]),
  nextPageToken: z.string().optional(),
});

/**
 * Upload one local file with the resumable upload protocol
 *
 * @param path - Local file path
 * @param options - MIME type and display name overrides
 * @returns The descriptor of the uploaded file, or the error that stopped the upload
 *
 * @example
 * ```typescript
 * const result = await uploadFile(client, 'docs/report.pdf');
 * if (result.success) {
 *   console.log(result.data.uri);
 * }
 * ```
 */
export function uploadFile(
  client: GenAIClient,
  path: string,
  options: UploadOptions = {}
): Promise<Result<FileDescriptor, UploadError>> {
  return attempt(async () => {
    const request = createUploadRequest(path, options);
    return new UploadSession(client, request).run();
  }, isUploadError);
}

/**
 * Upload several local files concurrently
 *
 * Descriptors come back in the order of `paths`. The first failure, whichever
 * file it belongs to, is the result of the whole batch; uploads already in
 * flight are left to finish and their results are discarded. The options
 * apply to every file.
 */
export async function uploadFiles(
  client: GenAIClient,
  paths: readonly string[],
  options: BatchUploadOptions = {}
): Promise<Result<FileDescriptor[], BatchUploadError>> {
  const { concurrency, onFileComplete, ...uploadOptions } = options;

  if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency < 1)) {
    return fail(new InvalidArgumentError('concurrency must be an integer >= 1'));
  }

  return runBatch(paths, (path) => uploadFile(client, path, uploadOptions), {
    concurrency,
    onItemComplete: onFileComplete,
    logger: client.logger,
  });
}

/**
 * List one page of uploaded files
 */
export function listFiles(
  client: GenAIClient,
  options: ListFilesOptions = {}
): Promise<Result<FileList, RequestError>> {
  return attempt(async () => {
    const { pageSize, pageToken } = options;
    if (pageSize !== undefined && (!Number.isInteger(pageSize) || pageSize < 1)) {
      throw new InvalidArgumentError('pageSize must be an integer >= 1');
    }

    const response = await client.transport.send({
      method: 'GET',
      url: client.apiEndpoint('files'),
      query: { ...client.authQuery(), pageSize, pageToken },
    });

    const parsed = fileListSchema.safeParse(expectOk(response, client.logger));
    if (!parsed.success) {
      throw new MalformedResponseError('Invalid file list in response', formatIssues(parsed.error));
    }

    return {
      files: parsed.data.files.map(toFileDescriptor),
      nextPageToken: parsed.data.nextPageToken,
    };
  }, isRequestError);
}

/**
 * Fetch the current descriptor of a file
 *
 * @param name - `files/abc123`, or just `abc123`
 */
export function getFile(
  client: GenAIClient,
  name: string
): Promise<Result<FileDescriptor, RequestError>> {
  return attempt(async () => {
    const response = await client.transport.send({
      method: 'GET',
      url: client.apiEndpoint(resourceName(name)),
      query: client.authQuery(),
    });
    return toFileDescriptor(expectOk(response, client.logger));
  }, isRequestError);
}

/**
 * Delete an uploaded file
 *
 * @param name - `files/abc123`, or just `abc123`
 */
export function deleteFile(
  client: GenAIClient,
  name: string
): Promise<Result<void, RequestError>> {
  return attempt(async () => {
    const response = await client.transport.send({
      method: 'DELETE',
      url: client.apiEndpoint(resourceName(name)),
      query: client.authQuery(),
    });
    expectOk(response, client.logger);
  }, isRequestError);
}

export function resourceName(name: string): string {
  const trimmed = name.trim();
  if (trimmed === '') {
    throw new InvalidArgumentError('file name must not be empty');
  }
  return trimmed.includes('/') ? trimmed : `files/${trimmed}`;
}

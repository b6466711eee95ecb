import { basename } from 'node:path';
import { lookup } from 'mime-types';
import { InvalidArgumentError } from './errors';
import type { UploadOptions, UploadRequest } from './types';

export const FALLBACK_MIME_TYPE = 'application/octet-stream';

/**
 * Resolve a path and its options into the immutable input of an upload session
 *
 * @throws InvalidArgumentError when the path or an override is empty
 */
export function createUploadRequest(path: string, options: UploadOptions = {}): UploadRequest {
  if (path.trim() === '') {
    throw new InvalidArgumentError('path must not be empty');
  }
  if (options.mimeType !== undefined && options.mimeType.trim() === '') {
    throw new InvalidArgumentError('mimeType must not be empty');
  }
  if (options.displayName !== undefined && options.displayName.trim() === '') {
    throw new InvalidArgumentError('displayName must not be empty');
  }

  return Object.freeze({
    path,
    mimeType: options.mimeType ?? inferMimeType(path),
    displayName: options.displayName ?? basename(path),
  });
}

export function inferMimeType(path: string): string {
  return lookup(path) || FALLBACK_MIME_TYPE;
}

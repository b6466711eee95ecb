import { z } from 'zod';
import { MalformedResponseError } from './errors';
import type { FileDescriptor } from './types';

/**
 * Byte counts arrive as decimal strings (int64 in JSON); plain numbers are
 * accepted as long as they are non-negative safe integers.
 */
const sizeBytesSchema = z.union([
  z.string().transform((value, ctx) => {
    const n = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(n)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'must be a non-negative integer string',
      });
      return z.NEVER;
    }
    return n;
  }),
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
]);

const remoteFileSchema = z.object({
  name: z.string().min(1),
  uri: z.string().min(1),
  mimeType: z.string().min(1),
  sizeBytes: sizeBytesSchema,
  displayName: z.string().optional(),
  state: z.string().optional(),
  sha256Hash: z.string().optional(),
  createTime: z.string().optional(),
  updateTime: z.string().optional(),
  expirationTime: z.string().optional(),
});

/**
 * Normalize a file object returned by the service.
 *
 * @throws MalformedResponseError when a required field is missing or malformed
 */
export function toFileDescriptor(payload: unknown): FileDescriptor {
  const parsed = remoteFileSchema.safeParse(payload);

  if (!parsed.success) {
    throw new MalformedResponseError('Invalid file object in response', formatIssues(parsed.error));
  }

  const file = parsed.data;
  const descriptor: FileDescriptor = {
    name: file.name,
    uri: file.uri,
    mimeType: file.mimeType,
    sizeBytes: file.sizeBytes,
    displayName: file.displayName,
    state: file.state,
    sha256Hash: file.sha256Hash,
    createTime: file.createTime,
    updateTime: file.updateTime,
    expirationTime: file.expirationTime,
  };

  return Object.freeze(descriptor);
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${path}: ${issue.message}`;
  });
}

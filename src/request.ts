import type { Logger } from 'pino';
import { RemoteError, fail, ok, type Result } from './errors';
import type { TransportResponse } from './types';

/**
 * Run an operation and turn the errors it is expected to report into a
 * failed result. Anything else is a fault and keeps propagating.
 */
export async function attempt<T, E>(
  operation: () => Promise<T>,
  isExpected: (error: unknown) => error is E
): Promise<Result<T, E>> {
  try {
    return ok(await operation());
  } catch (error) {
    if (isExpected(error)) {
      return fail(error);
    }
    throw error;
  }
}

/**
 * Return the body of a 200 response
 *
 * @throws RemoteError for any other status
 */
export function expectOk(response: TransportResponse, logger: Logger): unknown {
  if (response.status !== 200) {
    logger.error({ status: response.status, body: response.body }, `HTTP ${response.status}`);
    throw new RemoteError(response.status, response.body);
  }
  return response.body;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

import PQueue from 'p-queue';
import type { Logger } from 'pino';
import { BatchTaskError, fail, ok, type Result } from './errors';

export interface BatchOptions<T> {
  /** Maximum simultaneous tasks (default: unbounded) */
  concurrency?: number;
  /**
   * Called for each successful task while the batch is still undecided.
   * If it throws, the batch promise rejects with that error.
   */
  onItemComplete?: (value: T, index: number) => void;
  logger?: Logger;
}

/**
 * Run one task per input concurrently and collect the results in input order.
 *
 * Fail-fast: the first task that reports an error, or throws, decides the
 * batch. Tasks still waiting behind the concurrency cap are dropped, but tasks
 * already running are not cancelled; they finish on their own and their
 * outcomes are ignored. Without a cap every task starts at once, so callers
 * uploading many files should pass `concurrency`.
 *
 * @returns every value in input order, or the first error observed
 */
export function runBatch<I, T, E>(
  inputs: readonly I[],
  task: (input: I, index: number) => Promise<Result<T, E>>,
  options: BatchOptions<T> = {}
): Promise<Result<T[], E | BatchTaskError>> {
  if (inputs.length === 0) {
    return Promise.resolve(ok([]));
  }

  const { concurrency = Infinity, onItemComplete, logger } = options;
  const queue = new PQueue({ concurrency });
  const slots = new Array<T>(inputs.length);
  let remaining = inputs.length;
  let decided = false;

  return new Promise((resolve, reject) => {
    const stop = () => {
      decided = true;
      queue.clear();
    };

    const decide = (outcome: Result<T[], E | BatchTaskError>, index?: number) => {
      if (decided) return;
      stop();

      if (!outcome.success) {
        logger?.warn(
          { index, err: outcome.error, remaining },
          'Batch stopped at first failure'
        );
      }
      resolve(outcome);
    };

    const runTask = async (input: I, index: number): Promise<void> => {
      if (decided) return;

      let outcome: Result<T, E>;
      try {
        outcome = await task(input, index);
      } catch (error) {
        decide(fail(new BatchTaskError(index, error)), index);
        return;
      }
      if (decided) return;

      if (!outcome.success) {
        decide(fail(outcome.error), index);
        return;
      }

      slots[index] = outcome.data;
      remaining--;
      try {
        onItemComplete?.(outcome.data, index);
      } catch (error) {
        stop();
        reject(error);
        return;
      }

      if (remaining === 0) {
        decide(ok(slots));
      }
    };

    inputs.forEach((input, index) => {
      void queue.add(() => runTask(input, index));
    });
  });
}

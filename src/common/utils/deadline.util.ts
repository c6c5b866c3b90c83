// src/common/utils/deadline.util.ts

import { DeadlineExceededError } from '../errors/weather.errors';

/**
 * Runs `work` under a total time budget.
 *
 * When the budget runs out the returned promise rejects with
 * `DeadlineExceededError` and the signal handed to `work` is aborted, so any
 * in-flight HTTP request tied to it is torn down as well.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  label: string,
  work: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new DeadlineExceededError(`${label} did not finish within ${timeoutMs}ms`, {
          details: { timeoutMs },
        })
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

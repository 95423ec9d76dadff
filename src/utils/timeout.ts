import { JobTimeoutError } from '../errors';

/**
 * Runs `work` with a signal that aborts after `timeoutMs`, and rejects with
 * JobTimeoutError at that point. The work stops at its next signal check.
 */
export async function withJobTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  url: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new JobTimeoutError(timeoutMs, url);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

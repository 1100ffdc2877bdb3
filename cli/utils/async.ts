export const sleep = (ms: number, signal?: AbortSignal | null): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface RetryOptions {
  /** Extra attempts after the first one. */
  retries: number;
  delayMs: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  signal?: AbortSignal;
}

/**
 * Runs `task` until it resolves or the retry budget is spent. Backoff grows linearly:
 * `delayMs * attempt`.
 */
export const withRetry = async <T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
  let attempt = 1;
  for (;;) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt > options.retries || !options.shouldRetry(error)) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      await sleep(options.delayMs * attempt, options.signal);
      attempt += 1;
    }
  }
};

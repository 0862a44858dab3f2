export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
  /** Errors this returns false for are rethrown at once. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Backoff schedule for `attempts` tries: one wait between each pair, capped. */
export function backoffDelays(options: RetryOptions = {}): number[] {
  const attempts = Math.max(1, options.attempts ?? 3);
  const backoff = options.backoffFactor ?? 2;
  const maxDelay = options.maxDelayMs ?? 5_000;
  const delays: number[] = [];
  let delay = Math.max(0, options.delayMs ?? 250);
  for (let i = 1; i < attempts; i++) {
    delays.push(delay);
    delay = Math.min(maxDelay, Math.ceil(delay * backoff));
  }
  return delays;
}

export async function retry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const delays = backoffDelays(options);
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const delay = delays[attempt - 1];
      if (delay === undefined || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      if (delay > 0) {
        await wait(delay);
      }
    }
  }
}

/**
 * Options for the retry mechanism
 */
export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  /** Explicit wait before each retry; overrides the exponential schedule */
  delaysMs?: readonly number[];
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Waits for a specified duration
 */
const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Default options for retries
 */
const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'delaysMs'>> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
  shouldRetry: () => true,
  onRetry: () => undefined,
  sleep: delay,
};

/**
 * Delay before retry number `attempt` (1-based). Past the end of an
 * explicit schedule the last entry repeats.
 */
export function retryDelayFor(attempt: number, options: RetryOptions = {}): number {
  const config = { ...DEFAULT_OPTIONS, ...options };
  if (options.delaysMs && options.delaysMs.length > 0) {
    const index = Math.min(attempt - 1, options.delaysMs.length - 1);
    return options.delaysMs[index];
  }
  return Math.min(
    config.initialDelayMs * Math.pow(config.backoffFactor, attempt - 1),
    config.maxDelayMs
  );
}

/**
 * Executes a function with exponential backoff retry logic
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      // If we've reached max attempts or shouldn't retry this error, throw
      if (attempt >= config.maxAttempts || !config.shouldRetry(error)) {
        throw error;
      }

      const waitMs = retryDelayFor(attempt, options);
      config.onRetry(error, attempt, waitMs);
      await config.sleep(waitMs);
    }
  }
}

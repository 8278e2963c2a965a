export interface RetryAttempt {
  attempt: number;
  /** Time left for this attempt, when the call runs under a budget. */
  timeoutMs?: number;
}

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Wall-clock budget shared by every attempt and the backoff between them. */
  budgetMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retries `fn` with exponential backoff. Under a budget, each attempt gets an
 * equal share of the time still left, and no retry starts once the backoff
 * alone would use up what remains.
 */
export const retry = async <T>(
  fn: (context: RetryAttempt) => Promise<T>,
  options: RetryOptions = { attempts: 3, baseDelayMs: 500 },
): Promise<T> => {
  const {
    attempts,
    baseDelayMs,
    maxDelayMs = 30_000,
    budgetMs,
    shouldRetry,
    clock = Date.now,
    sleep = defaultSleep,
  } = options;
  const deadline = budgetMs === undefined ? null : clock() + budgetMs;
  const remaining = (): number => (deadline === null ? Number.POSITIVE_INFINITY : deadline - clock());

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    const timeoutMs =
      deadline === null ? undefined : Math.max(1, Math.floor(remaining() / (attempts - attempt + 1)));
    try {
      return await fn({ attempt, timeoutMs });
    } catch (error) {
      lastError = error;
      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      const allowRetry =
        attempt < attempts && (shouldRetry ? shouldRetry(error) : true) && remaining() > delay;
      if (!allowRetry) {
        throw error;
      }
      await sleep(delay);
    }
  }
  throw lastError;
};

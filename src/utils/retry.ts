/**
 * Bounded retry with fixed or exponential delay, used for readiness probes
 * and endpoint discovery against freshly announced nodes
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number; // 1 = fixed delay
  timeoutMs: number; // per attempt, 0 = none
  shouldRetry?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 10,
  initialDelayMs: 1000,
  maxDelayMs: 1000,
  multiplier: 1,
  timeoutMs: 0,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(
      `Failed after ${attempts} attempts. Last error: ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`,
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return fn();
  }
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timeout after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Executes fn until it resolves, the predicate refuses a retry, or attempts run out
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void
): Promise<T> {
  let lastError: unknown = null;
  let delay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await withTimeout(fn, config.timeoutMs);
      onLog?.({ timestamp: new Date(), attempt, delay: 0, success: true });
      return result;
    } catch (error) {
      lastError = error;
      const retryable = config.shouldRetry ? config.shouldRetry(error) : true;
      const hasNext = retryable && attempt < config.maxAttempts;

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: hasNext ? delay : undefined,
      });

      if (!retryable) {
        throw error;
      }
      if (!hasNext) {
        break;
      }

      await sleep(delay);
      delay = Math.min(delay * config.multiplier, config.maxDelayMs);
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

/**
 * Check if an error looks like a transient transport failure
 */
export function isRetryableError(error: unknown): boolean {
  const errorMessage = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  const retryablePatterns = [
    'timeout',
    'unavailable',
    'deadline exceeded',
    'econnrefused',
    'econnreset',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}

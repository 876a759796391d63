export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface RetryOptions {
  readonly sleep?: (ms: number) => Promise<void>;
  readonly isRetryable?: (error: unknown) => boolean;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 200, maxDelayMs: 5_000 };

const THROTTLE_NAMES = ['Throttl', 'TooManyRequests', 'RequestLimitExceeded', 'SlowDown'];

const hasRetryableMarker = (error: object): boolean =>
  '$retryable' in error && typeof error.$retryable === 'object' && error.$retryable !== null;

export const isThrottlingError = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  if (hasRetryableMarker(error)) return true;
  return THROTTLE_NAMES.some((marker) => error.name.includes(marker));
};

const UNREACHABLE_CODES = ['ENOTFOUND', 'EAI_AGAIN'];

/** True when the service has no resolvable endpoint in the client's region. */
export const isEndpointUnavailable = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  if (error.name === 'UnknownEndpoint') return true;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  return UNREACHABLE_CODES.some((marker) => code === marker || error.message.includes(marker));
};

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `operation` up to `policy.maxAttempts` times, waiting with exponential
 * backoff between attempts. Only errors accepted by `isRetryable` are retried;
 * the last error is rethrown.
 */
export const withRetry = async <T>(operation: () => Promise<T>, policy: RetryPolicy, options: RetryOptions = {}): Promise<T> => {
  const sleep = options.sleep ?? defaultSleep;
  const isRetryable = options.isRetryable ?? isThrottlingError;
  const attempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) throw error;
      const delay = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
};

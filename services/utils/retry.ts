
export class ApiError extends Error {
  constructor(
    public code: 'MISSING_KEY' | 'RATE_LIMIT' | 'NETWORK' | 'NOT_FOUND' | 'UNKNOWN',
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Stops further attempts; the in-flight attempt sees the same signal. */
  signal?: AbortSignal;
  label?: string;
}

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');

const defaultShouldRetry = (error: unknown): boolean => {
  if (isAbortError(error)) return false;
  // Don't retry on 4xx client errors unless it's a rate limit
  if (error instanceof ApiError) {
    if (error.code === 'MISSING_KEY' || error.code === 'NOT_FOUND') return false;
    if (error.code === 'RATE_LIMIT') return true;
  }
  if (error instanceof Response && error.status >= 400 && error.status < 500) {
    return error.status === 429;
  }
  return true;
};

const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export const fetchWithRetry = async <T>(
  fn: (signal?: AbortSignal) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> => {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoffMultiplier = 2,
    shouldRetry = defaultShouldRetry,
    signal,
    label = 'Retry',
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(signal);
    } catch (error) {
      lastError = error;

      if (signal?.aborted || !shouldRetry(error) || attempt === maxRetries) {
        throw error;
      }

      const delay = delayMs * Math.pow(backoffMultiplier, attempt);
      console.warn(`[${label}] Attempt ${attempt + 1} failed, retrying in ${delay}ms...`);
      await sleep(delay, signal);
    }
  }

  throw lastError;
};

/**
 * Bounded retry with exponential backoff and jitter.
 *
 * Used for status-report delivery (TransportError only) and for the
 * per-stage retry policy of individual stage bodies.
 */

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 200,
  jitterMs: 50,
};

export interface RetryOptions extends Partial<RetryConfig> {
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function getRetryDelay(attempt: number, config: Partial<RetryConfig> = {}): number {
  const { baseDelayMs, jitterMs } = { ...DEFAULT_RETRY_CONFIG, ...config };
  const exponentialDelay = baseDelayMs * 2 ** attempt;
  const jitter = jitterMs > 0 ? Math.random() * jitterMs * 2 - jitterMs : 0;
  return Math.max(0, exponentialDelay + jitter);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries } = { ...DEFAULT_RETRY_CONFIG, ...options };
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= maxRetries) break;
      if (options.shouldRetry && !options.shouldRetry(error, attempt)) break;

      const delay = getRetryDelay(attempt, options);
      options.onRetry?.(error, attempt, delay);
      if (delay > 0) {
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  throw lastError ?? new Error('Max retries exceeded');
}

export function withTimeout<T>(promise: Promise<T>, ms: number, message: string, onTimeout?: () => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new Error(message));
    }, ms);

    promise.then(
      (val) => { clearTimeout(timer); resolve(val); },
      (err) => { clearTimeout(timer); reject(err); }
    );
  });
}

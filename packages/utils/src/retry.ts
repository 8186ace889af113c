/**
 * Retry Logic
 * 
 * Configurable retry wrapper with exponential backoff.
 */

export interface RetryOptions {
  /** Total number of calls, the first one included */
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Delay to wait after the given failed attempt (1-based)
 */
export function backoffDelay(attempt: number, options: Partial<RetryOptions> = {}): number {
  const opts = { ...defaultOptions, ...options };
  const delay = opts.initialDelay * Math.pow(opts.backoffMultiplier, attempt - 1);
  return Math.min(delay, opts.maxDelay);
}

/**
 * Execute a function with automatic retry on failure
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      
      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      
      if (attempt === opts.maxAttempts) {
        throw error;
      }
      
      const delay = backoffDelay(attempt, opts);
      opts.onRetry?.(error, attempt, delay);
      
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

export type RetryConfig = {
  maxAttempts: number;
  delayMs: number;
  backoffFactor: number;
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  delayMs: 500,
  backoffFactor: 2,
};

export function sleepMs(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  params: RetryConfig & {
    shouldRetry?: (err: unknown) => boolean;
    onRetry?: (err: unknown, attempt: number, waitMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
  }
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(params.maxAttempts));
  const sleep = params.sleep ?? sleepMs;
  let waitMs = params.delayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || (params.shouldRetry && !params.shouldRetry(err))) throw err;
      params.onRetry?.(err, attempt, waitMs);
      await sleep(waitMs);
      waitMs *= params.backoffFactor;
    }
  }
}

export interface RetryOptions {
  /** Total tries including the first one (default: 3) */
  attempts?: number;
  /** Back-off base; attempt n waits up to baseDelayMs * 2^(n-1) (default: 250) */
  baseDelayMs?: number;
  onError?: (err: unknown, attempt: number) => void;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((res) => setTimeout(res, ms));

/**
 * Calls `fn` until it resolves or `attempts` is exhausted, rethrowing the
 * last error. Waits use exponential back-off with full jitter.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, opts.attempts ?? 3);
  const baseDelay = opts.baseDelayMs ?? 250;
  const sleep = opts.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      opts.onError?.(err, attempt);
      if (attempt >= attempts) throw err;

      const exp = baseDelay * 2 ** (attempt - 1);
      await sleep(Math.random() * exp);
    }
  }
}

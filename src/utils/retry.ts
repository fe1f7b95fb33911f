/**
 * Retry timing utilities.
 *
 * Backoff delay computation, an AbortSignal-aware sleep, and a timeout race
 * used by the restart coordinator for its retry loop and health probes.
 */

export interface BackoffConfig {
  /**
   * Delay used for the first retry attempt (in milliseconds).
   */
  initialDelayMs: number;
  /**
   * Maximum delay between attempts (in milliseconds).
   */
  maxDelayMs: number;
  /**
   * Exponential backoff multiplier applied after each attempt.
   */
  backoffMultiplier: number;
}

/**
 * Error thrown when a delay is aborted via AbortSignal.
 */
export class RetryAbortedError extends Error {
  constructor(message = 'Retry aborted') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

/**
 * Error thrown by withTimeout when the deadline passes first.
 */
export class OperationTimeoutError extends Error {
  constructor(public readonly timeoutMs: number, label = 'Operation') {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Sleep helper aware of AbortSignal.
 *
 * @throws RetryAbortedError if the signal is (or becomes) aborted
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new RetryAbortedError();
  }

  if (ms <= 0) {
    return;
  }

  if (!signal) {
    await new Promise((resolve) => setTimeout(resolve, ms));
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      reject(new RetryAbortedError());
    };

    signal.addEventListener('abort', onAbort);
  });
}

/**
 * Delay before retry number `retry` (1-based).
 *
 * retry 1 waits initialDelayMs, each following retry multiplies the previous
 * delay, capped at maxDelayMs.
 */
export function backoffDelay(retry: number, config: BackoffConfig): number {
  if (retry < 1 || config.initialDelayMs <= 0) {
    return 0;
  }
  const scaled = config.initialDelayMs * Math.pow(config.backoffMultiplier, retry - 1);
  if (!Number.isFinite(scaled)) {
    return config.maxDelayMs;
  }
  return Math.min(config.maxDelayMs, Math.round(scaled));
}

/**
 * Race a promise against a deadline.
 *
 * The timer is always cleared; the losing promise is left to settle on its own.
 *
 * @throws OperationTimeoutError when the deadline passes first
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label?: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(timeoutMs, label)), timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

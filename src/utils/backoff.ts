/**
 * Cancellable sleep, deadlines and exponential backoff.
 */

export interface BackoffOptions {
  /** Total attempts, including the first (default: 4) */
  attempts?: number;
  /** Delay before the second attempt (default: 250ms) */
  baseDelayMs?: number;
  /** Upper bound for a single delay (default: 4000ms) */
  maxDelayMs?: number;
  /** Growth factor between delays (default: 2) */
  factor?: number;
  /** Aborts the sleep between attempts and stops retrying */
  signal?: AbortSignal;
  /** Only errors for which this returns true are retried (default: all) */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * Delay for attempt n (1-based, the delay that follows attempt n).
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  factor = 2
): number {
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(factor, attempt - 1));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` with a signal that aborts after `ms` or when `parent` aborts.
 * Rejects with `onTimeout()` when the deadline passes first.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new AbortedError();
  }
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', forwardAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  // Settles only by rejection: on the deadline or when the parent aborts
  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
      controller.abort();
    }, ms);
    controller.signal.addEventListener('abort', () => reject(new AbortedError()), { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Retry `fn` with exponential backoff. The last error is rethrown once the
 * attempts run out or `shouldRetry` refuses it.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: BackoffOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? 4;
  const baseDelayMs = options.baseDelayMs ?? 250;
  const maxDelayMs = options.maxDelayMs ?? 4000;
  const factor = options.factor ?? 2;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt >= attempts || options.signal?.aborted) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, factor);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}

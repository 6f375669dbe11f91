/**
 * Async helpers - bounded waits, cancellable sleeps, backoff
 */

/**
 * Error thrown when an operation exceeds its time budget
 */
export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Error thrown when a wait is interrupted by an abort signal
 */
export class AbortedError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timer = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timer]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Sleep for `ms`, resolving early (with `false`) when the signal aborts.
 * Resolves `true` when the full delay elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve(false);
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Exponential backoff delay for the n-th consecutive failure (1-based)
 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
}

/**
 * Uniform jitter in [0, spread)
 */
export function jitter(spread: number, random: () => number = Math.random): number {
  return spread > 0 ? Math.floor(random() * spread) : 0;
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown error";
}

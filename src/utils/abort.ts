/**
 * Bounded, cancellable async calls.
 *
 * Every retrieval and generation call in the engine goes through
 * runWithTimeout(): the task receives an AbortSignal that fires when the
 * deadline passes or the caller's signal aborts, whichever comes first.
 */

/** Raised when a bounded call exceeds its deadline. */
export class OperationTimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/** Raised when the caller's AbortSignal fires during a bounded call. */
export class OperationAbortedError extends Error {
  constructor(public readonly label: string) {
    super(`${label} was aborted`);
    this.name = 'OperationAbortedError';
  }
}

export interface TimeoutOptions {
  /** Deadline in milliseconds */
  timeoutMs: number;
  /** Caller's signal; aborting it cancels the task */
  signal?: AbortSignal;
  /** Name used in error messages */
  label: string;
}

/**
 * Run a task with a deadline and cooperative cancellation.
 *
 * @throws OperationTimeoutError when the deadline passes
 * @throws OperationAbortedError when the caller aborts
 */
export async function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, signal, label } = options;

  if (signal?.aborted) {
    throw new OperationAbortedError(label);
  }

  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  // Reject before aborting so the race settles with our error rather than
  // whatever the task throws once its signal fires.
  const guard = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new OperationTimeoutError(label, timeoutMs));
      controller.abort();
    }, timeoutMs);

    if (signal) {
      onAbort = () => {
        reject(new OperationAbortedError(label));
        controller.abort();
      };
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  // Suppress unhandled rejection if the guard fires after the race settles.
  guard.catch(() => {});

  try {
    return await Promise.race([task(controller.signal), guard]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  }
}

/** True for errors produced by an abort, ours or the platform's. */
export function isAbortError(error: unknown): boolean {
  if (error instanceof OperationAbortedError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

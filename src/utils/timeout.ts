/**
 * Timeout and cancellation helpers for upstream calls.
 */

/**
 * Thrown when an operation exceeds its time budget.
 */
export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run an abortable operation with a timeout that cleans up on success or failure.
 *
 * The operation receives a signal that fires when the timeout elapses or the
 * caller's `signal` aborts. The race against the timer also settles the call
 * for operations that ignore their signal.
 *
 * @throws TimeoutError when the budget is exceeded
 * @throws the caller's abort reason when `signal` aborts
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: { label?: string; signal?: AbortSignal } = {}
): Promise<T> {
  const { label = 'Operation', signal } = options;
  signal?.throwIfAborted();

  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const onAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  const abortPromise = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true,
    });
  });

  // Suppress unhandled rejections from the losing side of the race
  timeoutPromise.catch(() => {});
  abortPromise.catch(() => {});

  try {
    return await Promise.race([operation(controller.signal), timeoutPromise, abortPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Timeout and cancellation for model-backed tasks.
 *
 * A task receives an AbortSignal that fires when its own timeout elapses or
 * the parent signal (e.g. a document deadline) aborts. The returned promise
 * settles at that moment even if the task ignores the signal.
 */

export class TaskTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
  }
}

export class TaskCancelledError extends Error {
  constructor(reason: unknown) {
    super(`Cancelled: ${reason instanceof Error ? reason.message : String(reason ?? 'aborted')}`);
    this.name = 'TaskCancelledError';
  }
}

/**
 * Run `task` with its own timeout, linked to an optional parent signal.
 * The timer and the parent listener are always released on settle.
 *
 * @throws TaskTimeoutError when timeoutMs elapses first
 * @throws TaskCancelledError when the parent signal aborts first
 */
export function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    return Promise.reject(new TaskCancelledError(parentSignal.reason));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const onParentAbort = () => {
      const error = new TaskCancelledError(parentSignal?.reason);
      controller.abort(error);
      settle(() => reject(error));
    };

    const timer = setTimeout(() => {
      const error = new TaskTimeoutError(timeoutMs);
      controller.abort(error);
      settle(() => reject(error));
    }, timeoutMs);

    const settle = (finish: () => void) => {
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', onParentAbort);
      finish();
    };

    parentSignal?.addEventListener('abort', onParentAbort, { once: true });

    let running: Promise<T>;
    try {
      running = task(controller.signal);
    } catch (error) {
      settle(() => reject(error));
      return;
    }

    running.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error))
    );
  });
}

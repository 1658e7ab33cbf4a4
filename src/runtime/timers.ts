/**
 * Timer helpers resolved from {@link globalThis} at call time. Sinon fake
 * timers install their overrides on the global object, so looking the
 * functions up lazily keeps deadlines under the control of the tests.
 */
export type TimeoutHandle = ReturnType<typeof globalThis.setTimeout>;

export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  return globalThis.setTimeout(callback, delayMs);
}

export function runtimeClearTimeout(handle: TimeoutHandle): void {
  globalThis.clearTimeout(handle);
}

export interface DeadlineOptions {
  readonly timeoutMs: number;
  /** Parent signal; aborting it aborts the task and rejects with its reason. */
  readonly signal?: AbortSignal;
  /** Builds the rejection used when the deadline elapses first. */
  readonly onTimeout: () => Error;
}

/**
 * Runs `task` with a dedicated abort signal and rejects when either the
 * deadline elapses or the parent signal fires. The task is aborted in both
 * cases and never awaited past that point.
 */
export function withDeadline<T>(task: (signal: AbortSignal) => Promise<T>, options: DeadlineOptions): Promise<T> {
  const controller = new AbortController();
  const parent = options.signal;
  if (parent?.aborted) {
    controller.abort(parent.reason);
    return Promise.reject(parent.reason);
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: TimeoutHandle | null = null;

    const settle = (outcome: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer !== null) {
        runtimeClearTimeout(timer);
      }
      parent?.removeEventListener("abort", onParentAbort);
      outcome();
    };

    function onParentAbort(): void {
      const reason: unknown = parent?.reason;
      controller.abort(reason);
      settle(() => reject(reason));
    }

    parent?.addEventListener("abort", onParentAbort, { once: true });
    if (Number.isFinite(options.timeoutMs) && options.timeoutMs > 0) {
      timer = runtimeSetTimeout(() => {
        const error = options.onTimeout();
        controller.abort(error);
        settle(() => reject(error));
      }, options.timeoutMs);
    }

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      settle(() => reject(error));
      return;
    }
    pending.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error)),
    );
  });
}

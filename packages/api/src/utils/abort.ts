import { RequestCancelledError, type RagComponent } from '../errors';

/**
 * A per-call timeout composed with the caller's cancellation signal.
 * `signal` aborts on whichever fires first; `timedOut()` tells them apart.
 */
export interface Deadline {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      onParentAbort();
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Run `task` under a deadline, always releasing the timer.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (deadline: Deadline) => Promise<T>
): Promise<T> {
  const deadline = createDeadline(timeoutMs, parent);
  try {
    return await task(deadline);
  } finally {
    deadline.dispose();
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined, component: RagComponent): void {
  if (signal?.aborted) {
    throw new RequestCancelledError(component, { cause: signal.reason });
  }
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts, whichever is
 * first. Guards against clients that ignore their abort signal.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return Promise.race([promise, aborted]).finally(() => {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  });
}

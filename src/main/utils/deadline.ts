import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Signal that fires when either the parent signal aborts or the timeout elapses.
 */
export interface Deadline {
  signal: AbortSignal;
  /** True once the timeout, not the parent, aborted the signal. */
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
  const onParentAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}

/**
 * Runs `task` under a deadline, always releasing the timer afterwards.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const deadline = createDeadline(timeoutMs, parent);
  try {
    return await task(deadline.signal);
  } finally {
    deadline.dispose();
  }
}

/**
 * Sleeps for `ms`, resolving false instead of throwing when the signal aborts first.
 */
export async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
}

import { DeadlineExceededError, type DeadlineScope } from './errors';

/** Longest delay setTimeout honours; larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Clamp a delay into the range setTimeout accepts.
 */
export function timerDelay(ms: number): number {
  return Math.min(Math.max(ms, 0), MAX_TIMER_MS);
}

export interface Deadline {
  signal: AbortSignal;
  /** Clears the timer and detaches from the parent signal */
  dispose(): void;
}

/**
 * Create an abort signal that fires after `timeoutMs` or when `parent` aborts,
 * whichever comes first. The abort reason is a DeadlineExceededError for the
 * timer, or the parent's own reason.
 */
export function createDeadline(
  parent: AbortSignal | undefined,
  timeoutMs: number,
  scope: DeadlineScope
): Deadline {
  const controller = new AbortController();

  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    controller.abort(new DeadlineExceededError(scope, timeoutMs));
  }, timerDelay(timeoutMs));

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with `promise` unless `signal` aborts first, in which case reject
 * with the signal's reason. Lets the caller abandon calls that ignore the signal.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    // Keep a late rejection of the abandoned call from surfacing as unhandled
    promise.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Sleep for specified milliseconds, waking early with a rejection on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, timerDelay(ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

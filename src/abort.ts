// Cancellation helpers shared by the store adapter, the retry loop and the upstream call
import { clearTimeout, setTimeout } from 'node:timers';
import { RequestAbortedError } from './errors';

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RequestAbortedError(stage);
  }
}

/**
 * Settle with `promise`, or reject with RequestAbortedError as soon as `signal` aborts.
 * The underlying operation keeps running; its late result is dropped.
 */
export function raceWithSignal<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  stage: string
): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestAbortedError(stage));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export interface AttemptSignal {
  signal: AbortSignal;
  /** True once the attempt was cut off by its own timeout rather than by the parent. */
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Derive a signal for one upstream attempt: aborted when the inbound request
 * aborts or when `timeoutMs` elapses, whichever comes first.
 */
export function createAttemptSignal(parent: AbortSignal | undefined, timeoutMs: number): AttemptSignal {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = timeoutMs > 0
    ? setTimeout(() => {
        expired = true;
        controller.abort(new Error(`upstream timeout after ${timeoutMs}ms`));
      }, timeoutMs).unref()
    : undefined;

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

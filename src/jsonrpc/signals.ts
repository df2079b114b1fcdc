// This module holds the AbortSignal plumbing shared by calls, timeouts and the serve loop.

import { abortReason } from './errors.js';

// This helper settles with the promise, or rejects with the abort reason as soon as the signal fires.
export function raceSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(signal));
    };

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

    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

// This helper forwards aborts from any source signal into the target controller and returns an unlink function.
export function linkAbort(target: AbortController, sources: ReadonlyArray<AbortSignal | undefined>): () => void {
  const unlinks: Array<() => void> = [];

  for (const source of sources) {
    if (!source) {
      continue;
    }

    if (source.aborted) {
      target.abort(source.reason);
      break;
    }

    const onAbort = (): void => {
      target.abort(source.reason);
    };
    source.addEventListener('abort', onAbort, { once: true });
    unlinks.push(() => source.removeEventListener('abort', onAbort));
  }

  return () => {
    for (const unlink of unlinks) {
      unlink();
    }
  };
}

export interface DeadlineSignal {
  signal: AbortSignal | undefined;
  dispose: () => void;
}

// This helper combines an optional caller signal with an optional timeout whose abort reason is built lazily.
export function withDeadline(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined,
  onTimeout: () => Error
): DeadlineSignal {
  if (timeoutMs === undefined) {
    return { signal, dispose: () => undefined };
  }

  const controller = new AbortController();
  const unlink = linkAbort(controller, [signal]);
  const timer = setTimeout(() => {
    controller.abort(onTimeout());
  }, timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      unlink();
    }
  };
}

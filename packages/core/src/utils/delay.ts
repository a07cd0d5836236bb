/**
 * Abortable sleep used by every polling loop.
 */

export class AbortError extends Error {
  override readonly name = 'AbortError';

  constructor(message = 'Operation aborted') {
    super(message);
    Object.setPrototypeOf(this, AbortError.prototype);
  }
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort(): void {
      clearTimeout(timeout);
      reject(new AbortError());
    }

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AbortError();
  }
}

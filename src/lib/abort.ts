/**
 * AbortSignal helpers.
 *
 * Backend clients don't all accept a signal, so calls are raced against it:
 * the caller gets the signal's reason as soon as it fires, and the backend
 * call is left to settle on its own.
 */

export function throwIfAborted(signal?: AbortSignal): void {
  signal?.throwIfAborted();
}

/** True when `error` is the reason of an aborted `signal`. */
export function isAbortReason(error: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true && error === signal.reason;
}

export function abortable<T>(run: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return run();
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    let work: Promise<T>;
    try {
      work = run();
    } catch (error) {
      signal.removeEventListener('abort', onAbort);
      reject(error);
      return;
    }

    work.then(
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

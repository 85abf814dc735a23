import { CancelledError } from '../errors.js';

/**
 * Settles with `promise`, or rejects with CancelledError as soon as `signal`
 * aborts. The underlying work is left running for its other consumers.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // Observe the abandoned promise so its rejection is not reported as unhandled
    promise.catch(() => undefined);
    return Promise.reject(new CancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export interface TimeoutOptions<T> {
  onTimeout: () => Error;
  /** Receives a result that arrives after the deadline has already fired. */
  onLateResult?: (value: T) => void;
  /** Receives a failure that arrives after the deadline has already fired. */
  onLateError?: (error: unknown) => void;
}

/**
 * Settles with `promise`, or rejects with `onTimeout()` once `timeoutMs`
 * elapses first. The timer is always cleared.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions<T>
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      reject(options.onTimeout());
    }, timeoutMs);

    promise.then(
      (value) => {
        if (timedOut) {
          options.onLateResult?.(value);
          return;
        }
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        if (timedOut) {
          options.onLateError?.(error);
          return;
        }
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

const IDLE = Symbol("idle");

type Step<T> = IteratorResult<T> | typeof IDLE;

export interface BoundedSequenceOptions {
  idleTimeoutMs: number;
  signal?: AbortSignal | undefined;
  /** Releases the underlying source. Defaults to `source.return()`. */
  stop?: () => void | Promise<void>;
}

/**
 * Turns an open-ended source (a watcher that keeps waiting for updates)
 * into a finite sequence: it ends on the first gap longer than
 * `idleTimeoutMs`, when the source completes, or when `signal` aborts.
 * The source is released on every exit path.
 */
export async function* takeUntilIdle<T>(
  source: AsyncIterator<T>,
  options: BoundedSequenceOptions
): AsyncGenerator<T, void, undefined> {
  try {
    while (!options.signal?.aborted) {
      const step = await nextWithin(source, options.idleTimeoutMs, options.signal);
      if (step === IDLE || step.done) {
        return;
      }
      yield step.value;
    }
  } finally {
    if (options.stop) {
      await options.stop();
    } else {
      await source.return?.();
    }
  }
}

function nextWithin<T>(
  source: AsyncIterator<T>,
  idleTimeoutMs: number,
  signal: AbortSignal | undefined
): Promise<Step<T>> {
  return new Promise<Step<T>>((resolve, reject) => {
    let settled = false;

    const cleanup = () => {
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };

    const finish = (step: Step<T>) => {
      if (settled) {
        return;
      }
      cleanup();
      resolve(step);
    };

    const onAbort = () => finish(IDLE);
    const timer = setTimeout(() => finish(IDLE), idleTimeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    source.next().then(finish, (error: unknown) => {
      if (settled) {
        return;
      }
      cleanup();
      reject(error);
    });
  });
}

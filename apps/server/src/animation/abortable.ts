/**
 * Wait `ms` milliseconds unless `signal` aborts first.
 * @returns true if the full delay elapsed, false if aborted
 */
export function delay(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export type Raced<T> = { aborted: false; value: T } | { aborted: true };

/**
 * Settle with `work` or with `{ aborted: true }`, whichever comes first.
 * A rejection of `work` after the abort is dropped: nobody is waiting for it.
 */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<Raced<T>> {
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve({ aborted: true });
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve({ aborted: false, value });
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

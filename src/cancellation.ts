/**
 * Cancellation helpers
 *
 * Cancellation is an AbortSignal handed to every suspension point. Waits
 * resolve with a status when the signal fires; they never throw for it.
 */

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Settle with `work`'s value, or with `'cancelled'` as soon as `signal` aborts.
 * The abort listener is removed once either side settles.
 */
export function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T | 'cancelled'> {
  if (!signal) return work;
  if (signal.aborted) return Promise.resolve('cancelled');

  return new Promise<T | 'cancelled'>((resolve, reject) => {
    const onAbort = (): void => resolve('cancelled');
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
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

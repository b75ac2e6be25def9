/**
 * Parse a `|` delimited table whose header line starts with `#`.
 * Further `#` lines (units, comments) are skipped.
 */
export function parseDelimited<K extends string>(
  content: string,
  headers: readonly K[],
  delimiter = "|",
): Record<K, string>[] {
  return content
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "" && !line.startsWith("#"))
    .map((line) => {
      const values = line.split(delimiter);
      return Object.fromEntries(
        headers.map((header, index) => [header, values[index]?.trim() ?? ""]),
      ) as Record<K, string>;
    });
}

/**
 * Limit how many promises created through the returned function run at once.
 */
export function createLimiter(concurrency: number) {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Invalid concurrency: ${concurrency}`);
  }

  let active = 0;
  const queue: (() => void)[] = [];

  // A finished task hands its slot straight to the next queued one
  const release = () => {
    const wake = queue.shift();
    if (wake) wake();
    else active--;
  };

  return async function limit<T>(task: () => Promise<T>): Promise<T> {
    if (active >= concurrency) {
      await new Promise<void>((resolve) => queue.push(resolve));
    } else {
      active++;
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. The underlying
 * work is abandoned, not cancelled.
 */
export function abortable<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });

    // Settling after an abort is a no-op, but keeps a late rejection handled
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

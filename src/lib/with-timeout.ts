/**
 * Promise timeout utility with timer cleanup.
 */

export type TimeoutErrorFactory = (timeoutMs: number) => Error;

/**
 * Races `promise` against a timer. The timer is cleared on resolve, reject
 * and timeout, so a settled call never keeps the event loop alive.
 *
 * @param onTimeout - message or factory for the rejection raised on timeout
 * @param controller - aborted when the timer fires, for callers that can cancel
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: string | TimeoutErrorFactory,
  controller?: AbortController
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller?.abort();
      reject(
        typeof onTimeout === 'string' ? new Error(onTimeout) : onTimeout(timeoutMs)
      );
    }, Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) clearTimeout(timeoutId);
  }
}

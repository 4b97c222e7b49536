import { awaitWithAbort, createAbortError } from "./abort-utils.js";

export type SettledTask<T, R> =
  | { item: T; status: "fulfilled"; value: R }
  | { item: T; status: "rejected"; reason: unknown };

export interface SettleOptions<T, R> {
  /** Maximum number of tasks in flight. Values below 1 are treated as 1. */
  concurrency: number;
  signal?: AbortSignal;
  /**
   * Checked after every recorded outcome; once it returns true no further
   * tasks are launched. Tasks already running are still awaited.
   */
  shouldStop?: (outcomes: readonly SettledTask<T, R>[]) => boolean;
}

/**
 * Runs `task` over `items` on a fixed-size pool and returns every outcome in
 * completion order. Task failures are captured, never thrown.
 *
 * The join observes `signal`: once it aborts, no task is launched and the
 * returned promise rejects with the abort reason without waiting for tasks
 * still in flight. Tasks receive the same signal and are expected to stop on it.
 */
export async function settleWithConcurrency<T, R>(
  items: readonly T[],
  task: (item: T, signal?: AbortSignal) => Promise<R>,
  options: SettleOptions<T, R>,
): Promise<SettledTask<T, R>[]> {
  const { signal, shouldStop } = options;
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const outcomes: SettledTask<T, R>[] = [];
  const active = new Set<Promise<void>>();
  let next = 0;
  let stopped = false;

  const launch = (item: T) => {
    const running: Promise<void> = Promise.resolve()
      .then(() => task(item, signal))
      .then(
        (value) => {
          outcomes.push({ item, status: "fulfilled", value });
        },
        (reason: unknown) => {
          outcomes.push({ item, status: "rejected", reason });
        },
      )
      .finally(() => {
        active.delete(running);
        if (!stopped && shouldStop?.(outcomes)) {
          stopped = true;
        }
      });
    active.add(running);
  };

  while ((!stopped && next < items.length) || active.size > 0) {
    if (signal?.aborted) {
      throw createAbortError(signal);
    }
    while (!stopped && active.size < concurrency && next < items.length) {
      launch(items[next]);
      next += 1;
    }
    if (active.size > 0) {
      await awaitWithAbort(Promise.race(active), signal);
    }
  }

  return outcomes;
}

import { anySignal } from "any-signal";

/**
 * Returns the abort reason from a signal as an Error, or creates a generic AbortError.
 */
export function createAbortError(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) {
    return reason;
  }
  if (reason === undefined) {
    const error = new Error("The operation was aborted");
    error.name = "AbortError";
    return error;
  }
  const error = new Error(`The operation was aborted: ${String(reason)}`, { cause: reason });
  error.name = "AbortError";
  return error;
}

/**
 * Wraps a promise so it rejects immediately when the signal fires.
 * The wrapped promise keeps running; only the wait is abandoned.
 */
export async function awaitWithAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) throw createAbortError(signal);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(createAbortError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
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

/**
 * Combines an optional caller signal with a per-call timeout.
 * `clear` releases the listeners any-signal attaches to the caller signal.
 */
export function withTimeoutSignal(
  timeoutMs: number,
  parentSignal?: AbortSignal,
): { signal: AbortSignal; timeoutSignal: AbortSignal; clear: () => void } {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  const combined = anySignal(parentSignal ? [timeoutSignal, parentSignal] : [timeoutSignal]);
  return {
    signal: combined,
    timeoutSignal,
    clear: () => combined.clear(),
  };
}

/**
 * Abort Signal Utility
 * Bounds follow-up work (such as reading a response body) by the same signal as the request
 */

export function createAbortError(): Error {
  return Object.assign(new Error("The operation was aborted"), { name: "AbortError" });
}

/**
 * Race a promise against an AbortSignal
 *
 * Rejects with an AbortError once the signal aborts, even when the promise
 * never settles (a body stream that stalls after the headers arrived).
 */
export async function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  let rejectAborted: (reason: Error) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const onAbort = () => rejectAborted(createAbortError());

  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener("abort", onAbort, { once: true });
  }

  try {
    // Abort first, so an already aborted signal wins over a settled promise
    return await Promise.race([aborted, promise]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

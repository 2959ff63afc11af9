export class CancelledError extends Error {
  override readonly name = "CancelledError";

  constructor(readonly reason?: unknown) {
    super(reason === undefined ? "Cancelled" : `Cancelled: ${String(reason)}`);
  }
}

/**
 * True for failures caused by our own cancellation rather than by the
 * operation itself: CancelledError, DOM/undici AbortError, axios
 * CanceledError, or the reason an aborted `signal` was given.
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (error instanceof CancelledError) return true;
  if (signal?.aborted && error === signal.reason) return true;
  return error instanceof Error && (error.name === "AbortError" || error.name === "CanceledError");
}

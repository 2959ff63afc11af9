import { fromPromise } from "./fromPromise.js";
import type { AsyncTask, FromPromiseOptions } from "./fromPromise.js";
import type { AsyncStatus } from "./types.js";

export interface AsyncMeta {
  /** idle / scheduled / pending / success / error */
  status: () => AsyncStatus;
  /** Current error (only in the error state) */
  error: () => unknown;
  /** Runs the task again, superseding the previous request */
  reload: () => void;
  /** Aborts the in-flight request and ignores whatever it returns */
  cancel: (reason?: unknown) => void;
  reset: (reason?: unknown) => void;
  markScheduled: () => void;
  /** Whether pending runs keep showing the previous success */
  keepPreviousValueOnPending: boolean;
}

/**
 * Tuple form of {@link fromPromise}:
 *
 * const [movies, meta] = asyncSignal((signal) => client.search("alien", { signal }));
 *
 * createEffect(() => {
 *   const list = movies();
 *   const status = meta.status();
 * });
 */
export function asyncSignal<T>(
  task: AsyncTask<T>,
  options?: FromPromiseOptions<T>
): [() => T | undefined, AsyncMeta] {
  const { value, ...meta } = fromPromise<T>(task, options);
  return [
    value,
    { ...meta, keepPreviousValueOnPending: options?.keepPreviousValueOnPending ?? true },
  ];
}

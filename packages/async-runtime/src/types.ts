export type AsyncStatus = "idle" | "scheduled" | "pending" | "success" | "error";

export interface AsyncSignal<T> {
  /** Latest accepted result (or undefined) */
  value: () => T | undefined;
  /** idle / scheduled / pending / success / error */
  status: () => AsyncStatus;
  /** Failure of the latest run; only set in the error state */
  error: () => unknown;
  /** Starts a new run, aborting and invalidating the previous one */
  reload: () => void;
  /** Aborts the in-flight run; its result will be ignored */
  cancel: (reason?: unknown) => void;
  /** Cancels and goes back to idle with no value */
  reset: (reason?: unknown) => void;
  /** Marks a run as queued but not yet started */
  markScheduled: () => void;
}

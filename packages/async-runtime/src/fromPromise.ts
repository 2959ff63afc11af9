import { batch, signal } from "@lull/core";
import { CancelledError, isCancellation } from "./errors.js";
import { createLogger } from "./logger.js";
import type { AsyncSignal, AsyncStatus } from "./types.js";

const log = createLogger("async");

export type AsyncTask<T> = (signal: AbortSignal) => Promise<T>;

export interface FromPromiseOptions<T = unknown> {
  /** Start a run at creation (default true) */
  eager?: boolean;
  onSuccess?: (value: T) => void;
  /** Genuine failures only; cancellations never reach it */
  onError?: (error: unknown) => void;
  /** Keep the last value visible while a new run is pending (default true) */
  keepPreviousValueOnPending?: boolean;
  /** Called when an in-flight run is cancelled */
  onCancel?: (reason?: unknown) => void;
  /** Name used in log lines */
  label?: string;
}

interface Inflight {
  generation: number;
  controller: AbortController;
}

export function fromPromise<T>(
  task: AsyncTask<T>,
  options: FromPromiseOptions<T> = {}
): AsyncSignal<T> {
  const value = signal<T | undefined>(undefined);
  const status = signal<AsyncStatus>("idle");
  const error = signal<unknown>(undefined);

  const keepPrev = options.keepPreviousValueOnPending ?? true;
  const label = options.label ?? "task";

  let generation = 0;
  let inflight: Inflight | null = null;

  // the only run allowed to write results
  const isCurrent = (gen: number) => inflight !== null && inflight.generation === gen;

  // a throwing callback must not turn into an unhandled rejection
  function notify(hook: string, callback: () => void) {
    try {
      callback();
    } catch (e) {
      log.error(`${label}: ${hook} callback threw`, e);
    }
  }

  const settledStatus = (): AsyncStatus => (value.peek() === undefined ? "idle" : "success");

  function abortInflight(reason: unknown): boolean {
    if (!inflight) return false;
    const { controller } = inflight;
    inflight = null;
    controller.abort(new CancelledError(reason));
    return true;
  }

  function run() {
    if (abortInflight("superseded")) {
      log.debug(`${label}: superseded in-flight run`);
    }

    const gen = ++generation;
    const controller = new AbortController();
    inflight = { generation: gen, controller };

    batch(() => {
      status.set("pending");
      error.set(undefined);
      if (!keepPrev) value.set(undefined);
    });

    let promise: Promise<T>;
    try {
      promise = task(controller.signal);
    } catch (e) {
      promise = Promise.reject(e);
    }

    promise.then(
      (result) => {
        if (!isCurrent(gen)) {
          log.debug(`${label}: dropped result of stale run #${gen}`);
          return;
        }
        inflight = null;

        batch(() => {
          value.set(result);
          status.set("success");
        });
        notify("onSuccess", () => options.onSuccess?.(result));
      },
      (err: unknown) => {
        if (!isCurrent(gen)) {
          log.debug(`${label}: dropped failure of stale run #${gen}`);
          return;
        }
        inflight = null;

        if (isCancellation(err, controller.signal)) {
          log.debug(`${label}: run #${gen} was cancelled`);
          status.set(settledStatus());
          return;
        }

        batch(() => {
          error.set(err);
          status.set("error");
        });
        notify("onError", () => options.onError?.(err));
      }
    );
  }

  function cancel(reason?: unknown) {
    const aborted = abortInflight(reason);
    const now = status.peek();
    if (now === "pending" || now === "scheduled") status.set(settledStatus());
    if (!aborted) return;

    log.debug(`${label}: cancelled`, reason ?? "");
    notify("onCancel", () => options.onCancel?.(reason));
  }

  function reset(reason?: unknown) {
    cancel(reason);
    batch(() => {
      value.set(undefined);
      error.set(undefined);
      status.set("idle");
    });
  }

  function markScheduled() {
    batch(() => {
      status.set("scheduled");
      error.set(undefined);
      if (!keepPrev) value.set(undefined);
    });
  }

  if (options.eager ?? true) {
    run();
  }

  return {
    value: value.get,
    status: status.get,
    error: error.get,
    reload: run,
    cancel,
    reset,
    markScheduled,
  };
}

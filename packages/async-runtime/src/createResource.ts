import { createEffect, signal, untracked, type Comparator } from "@lull/core";
import { asyncSignal } from "./asyncSignal.js";
import type { AsyncMeta } from "./asyncSignal.js";
import { createDebouncer } from "./debounce.js";
import type { FromPromiseOptions } from "./fromPromise.js";
import { createLogger } from "./logger.js";
import { timerScheduler, type TaskScheduler } from "./timer.js";

const log = createLogger("resource");

export interface FetchContext {
  /** Aborted once this request is superseded or the resource is disposed */
  signal: AbortSignal;
}

export type Fetcher<S, T> = (source: S, ctx: FetchContext) => Promise<T>;

export interface ResourceOptions<S, T> extends Omit<FromPromiseOptions<T>, "eager"> {
  /** Quiet period after the last source change before fetching (default 0) */
  debounceMs?: number;
  scheduler?: TaskScheduler;
  /** Source values that should not be fetched; the resource goes idle instead */
  skip?: (source: S) => boolean;
  /** Fetch the initial source value without waiting for the quiet period */
  immediate?: boolean;
  /** Source values considered unchanged are not refetched (default Object.is) */
  equals?: Comparator<S>;
}

/**
 * The resource drives its own status, so the raw `reset` and `markScheduled`
 * transitions stay internal. `reload` is the same as `refetch`.
 */
export interface ResourceMeta<S> extends Omit<AsyncMeta, "reset" | "markScheduled"> {
  /** Source value of the current or last issued request */
  source: () => S | undefined;
  /** Fetches the current source value now, skipping the quiet period */
  refetch: () => void;
  /** Stops following the source and drops any waiting or in-flight work */
  dispose: () => void;
}

export function createResource<S, T>(
  source: () => S,
  fetcher: Fetcher<S, T>,
  options: ResourceOptions<S, T> = {}
): [() => T | undefined, ResourceMeta<S>] {
  const {
    debounceMs = 0,
    scheduler = timerScheduler,
    skip,
    immediate = false,
    equals = Object.is,
    ...asyncOptions
  } = options;

  let latest: S;
  let issued: S;
  const requested = signal<{ source: S } | null>(null);
  let disposed = false;

  // the source is driving, so never run eagerly
  const [value, meta] = asyncSignal<T>(
    (abortSignal) => fetcher(issued, { signal: abortSignal }),
    { ...asyncOptions, eager: false }
  );

  const fire = () => {
    if (disposed) return;
    issued = latest;
    requested.set({ source: issued });
    meta.reload();
  };

  const debouncer = createDebouncer(debounceMs, fire, { scheduler });

  let first = true;

  function follow(next: S) {
    if (!first && equals(latest, next)) return;
    latest = next;
    debouncer.cancel();
    meta.cancel("source-changed");

    if (skip?.(next)) {
      meta.reset("skipped");
      requested.set(null);
    } else if ((first && immediate) || debounceMs <= 0) {
      fire();
    } else {
      meta.markScheduled();
      debouncer.trigger();
    }
    first = false;
  }

  const stop = createEffect(() => {
    const next = source();
    // only the source is a dependency; writes below must not subscribe
    untracked(() => follow(next));
  });

  function refetch() {
    if (disposed) return;
    debouncer.cancel();
    if (skip?.(latest)) return;
    fire();
  }

  function dispose() {
    if (disposed) return;
    disposed = true;
    stop();
    debouncer.cancel();
    meta.cancel("disposed");
    log.debug("disposed");
  }

  return [
    value,
    {
      status: meta.status,
      error: meta.error,
      cancel: meta.cancel,
      keepPreviousValueOnPending: meta.keepPreviousValueOnPending,
      reload: refetch,
      source: () => requested.get()?.source,
      refetch,
      dispose,
    },
  ];
}

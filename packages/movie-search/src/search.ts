import { batch, computed, createEffect, signal } from "@lull/core";
import { createLogger, createResource, type TaskScheduler } from "@lull/async-runtime";
import type { Movie, MovieClient } from "./client.js";
import type { SearchConfig } from "./config.js";
import { describeFailure } from "./errors.js";

const log = createLogger("movie-search");

export type SearchView =
  | { kind: "idle" }
  | { kind: "loading"; query: string; previous: Movie[] }
  | { kind: "results"; query: string; movies: Movie[]; total: number }
  | { kind: "empty"; query: string }
  | { kind: "error"; query: string; message: string };

export interface MovieSearchOptions {
  client: MovieClient;
  config: Pick<SearchConfig, "debounceMs" | "minQueryLength">;
  scheduler?: TaskScheduler;
}

export interface MovieSearch {
  /** Feed the latest text of the search box */
  setQuery: (text: string) => void;
  /** Raw text as typed */
  text: () => string;
  /** Trimmed text the search runs on */
  query: () => string;
  view: () => SearchView;
  /** Calls `listener` with the current view and after every change */
  watch: (listener: (view: SearchView) => void) => () => void;
  refetch: () => void;
  /** Cancels waiting and in-flight searches and stops all watchers */
  dispose: () => void;
}

export function createMovieSearch({ client, config, scheduler }: MovieSearchOptions): MovieSearch {
  const text = signal("");
  const query = computed(() => text.get().trim());

  const [page, meta] = createResource(
    () => query.get(),
    (q, { signal }) => client.search(q, { signal }),
    {
      debounceMs: config.debounceMs,
      scheduler,
      skip: (q) => q.length < config.minQueryLength,
      label: "movie-search",
      onError: (err) => log.warn(`search failed: ${describeFailure(err)}`),
    }
  );

  const view = computed<SearchView>(() => {
    const searched = meta.source() ?? "";
    switch (meta.status()) {
      case "idle":
        return { kind: "idle" };
      case "scheduled":
      case "pending":
        return { kind: "loading", query: query.get(), previous: page()?.movies ?? [] };
      case "error":
        return { kind: "error", query: searched, message: describeFailure(meta.error()) };
      case "success": {
        const result = page();
        if (!result || result.movies.length === 0) return { kind: "empty", query: searched };
        return { kind: "results", query: searched, movies: result.movies, total: result.total };
      }
    }
  });

  const watchers = new Set<() => void>();

  function watch(listener: (view: SearchView) => void) {
    const stop = createEffect(() => {
      listener(view.get());
    });
    const unwatch = () => {
      stop();
      watchers.delete(unwatch);
    };
    watchers.add(unwatch);
    return unwatch;
  }

  function dispose() {
    meta.dispose();
    for (const unwatch of [...watchers]) unwatch();
    view.dispose();
    query.dispose();
  }

  return {
    setQuery: (value) => batch(() => text.set(value)),
    text: text.get,
    query: query.get,
    view: view.get,
    watch,
    refetch: meta.refetch,
    dispose,
  };
}

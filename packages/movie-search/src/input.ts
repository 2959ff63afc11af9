import type { MovieSearch } from "./search.js";

/** Anything that fires input events and exposes its current text. */
export interface InputLike extends EventTarget {
  readonly value: string;
}

/**
 * Feeds `input` into `search`, starting with its current value. The returned
 * function unbinds; it leaves the search itself running.
 */
export function bindInput(
  input: InputLike,
  search: Pick<MovieSearch, "setQuery">,
  eventType = "input"
): () => void {
  const onInput = () => search.setQuery(input.value);
  input.addEventListener(eventType, onInput);
  onInput();
  return () => input.removeEventListener(eventType, onInput);
}

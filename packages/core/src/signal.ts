import { propagate, type Comparator } from "./computed.js";
import { createNode, trackRead } from "./graph.js";

export interface Signal<T> {
  get: () => T;
  set: (next: T) => void;
  update: (fn: (prev: T) => T) => void;
  peek: () => T;
}

export function signal<T>(initial: T, equals: Comparator<T> = Object.is): Signal<T> {
  const node = createNode("signal");
  let value = initial;

  const set = (next: T) => {
    if (equals(value, next)) return;
    value = next;
    if (node.observers.size > 0) propagate(node);
  };

  return {
    get: () => {
      trackRead(node);
      return value;
    },
    set,
    update: (fn) => set(fn(value)),
    peek: () => value,
  };
}

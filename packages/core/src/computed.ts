import {
  createNode,
  disconnect,
  disconnectSources,
  runObserved,
  trackRead,
  type ReactiveNode,
} from "./graph.js";
import { effectFor } from "./registry.js";

export type Comparator<T> = (a: T, b: T) => boolean;

interface ComputedNode extends ReactiveNode {
  kind: "computed";
  stale: boolean;
}

function isComputed(node: ReactiveNode): node is ComputedNode {
  return node.kind === "computed" && "stale" in node;
}

/**
 * Marks every observer of `source` out of date: derived nodes become stale
 * (recursively), effects are queued.
 */
export function propagate(source: ReactiveNode) {
  for (const observer of source.observers) {
    if (observer.kind === "effect") {
      effectFor(observer)?.schedule();
      continue;
    }
    if (isComputed(observer) && !observer.stale) {
      observer.stale = true;
      propagate(observer);
    }
  }
}

export function computed<T>(fn: () => T, equals: Comparator<T> = Object.is) {
  const node: ComputedNode = { ...createNode("computed"), kind: "computed", stale: true };
  let current: { value: T } | null = null;
  let evaluating = false;

  function evaluate(): T {
    if (evaluating) throw new Error("Cycle detected in computed");
    evaluating = true;
    try {
      disconnectSources(node);
      const next = runObserved(node, fn);
      if (current === null || !equals(current.value, next)) {
        current = { value: next };
      }
      node.stale = false;
      return current.value;
    } finally {
      evaluating = false;
    }
  }

  const get = (): T => {
    trackRead(node);
    if (node.stale || current === null) return evaluate();
    return current.value;
  };

  const peek = (): T | undefined => current?.value;

  const dispose = () => {
    disconnectSources(node);
    for (const observer of [...node.observers]) disconnect(observer, node);
    node.stale = true;
    current = null;
  };

  return { get, peek, dispose };
}

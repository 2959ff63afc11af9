export type NodeKind = "signal" | "computed" | "effect";

export interface ReactiveNode {
  kind: NodeKind;
  /** Nodes this node read during its last evaluation. */
  sources: Set<ReactiveNode>;
  /** Nodes that read this node. */
  observers: Set<ReactiveNode>;
}

export function createNode(kind: NodeKind): ReactiveNode {
  return { kind, sources: new Set(), observers: new Set() };
}

export function connect(observer: ReactiveNode, source: ReactiveNode) {
  if (observer.kind === "signal") {
    throw new Error("Signal nodes cannot depend on others");
  }
  if (observer.sources.has(source)) return;
  observer.sources.add(source);
  source.observers.add(observer);
}

export function disconnect(observer: ReactiveNode, source: ReactiveNode) {
  observer.sources.delete(source);
  source.observers.delete(observer);
}

export function disconnectSources(observer: ReactiveNode) {
  for (const source of [...observer.sources]) disconnect(observer, source);
}

let activeObserver: ReactiveNode | null = null;

export function runObserved<T>(observer: ReactiveNode | null, fn: () => T): T {
  const prev = activeObserver;
  activeObserver = observer;
  try {
    return fn();
  } finally {
    activeObserver = prev;
  }
}

/** Reads inside `fn` do not become dependencies of the running observer. */
export function untracked<T>(fn: () => T): T {
  return runObserved(null, fn);
}

export function trackRead(source: ReactiveNode) {
  if (activeObserver) connect(activeObserver, source);
}

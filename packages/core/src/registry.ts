import type { ReactiveNode } from "./graph.js";

export interface EffectHandle {
  schedule(): void;
}

// effect node -> the instance that re-runs it
const effects = new WeakMap<ReactiveNode, EffectHandle>();

export function attachEffect(node: ReactiveNode, handle: EffectHandle) {
  effects.set(node, handle);
}

export function detachEffect(node: ReactiveNode) {
  effects.delete(node);
}

export function effectFor(node: ReactiveNode): EffectHandle | undefined {
  return effects.get(node);
}

import { createNode, disconnectSources, runObserved } from "./graph.js";
import { attachEffect, detachEffect, type EffectHandle } from "./registry.js";
import { scheduleJob, type Schedulable } from "./scheduler.js";

export type Cleanup = () => void;

export interface EffectOptions {
  /** Lower runs first within a flush. */
  priority?: number;
  /**
   * Receives errors thrown by the effect body or its cleanups. Without it
   * they propagate out of the flush.
   */
  onError?: (error: unknown) => void;
}

let currentEffect: EffectInstance | null = null;

/** Registers `cb` to run before the current effect re-runs or is disposed. */
export function onCleanup(cb: Cleanup) {
  currentEffect?.cleanups.push(cb);
}

export class EffectInstance implements Schedulable, EffectHandle {
  readonly node = createNode("effect");
  readonly priority: number;
  cleanups: Cleanup[] = [];
  disposed = false;

  constructor(
    private readonly fn: () => void | Cleanup,
    private readonly options: EffectOptions = {}
  ) {
    this.priority = options.priority ?? 0;
    attachEffect(this.node, this);
  }

  run() {
    if (this.disposed) return;
    this.runCleanups();
    disconnectSources(this.node);

    const prev = currentEffect;
    currentEffect = this;
    try {
      const ret = runObserved(this.node, this.fn);
      if (typeof ret === "function") this.cleanups.push(ret);
    } catch (e) {
      this.report(e);
    } finally {
      currentEffect = prev;
    }
  }

  schedule() {
    scheduleJob(this);
  }

  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    disconnectSources(this.node);
    detachEffect(this.node);
    this.runCleanups();
  }

  private runCleanups() {
    const failures: unknown[] = [];
    // reverse registration order
    for (let i = this.cleanups.length - 1; i >= 0; i--) {
      try {
        this.cleanups[i]?.();
      } catch (e) {
        failures.push(e);
      }
    }
    this.cleanups.length = 0;
    for (const failure of failures) this.report(failure);
  }

  private report(error: unknown) {
    if (!this.options.onError) throw error;
    this.options.onError(error);
  }
}

export function createEffect(fn: () => void | Cleanup, options?: EffectOptions) {
  const inst = new EffectInstance(fn, options);
  inst.run();
  return () => inst.dispose();
}

import { describe, expect, it, vi } from "vitest";
import { batch, computed, createEffect, flushSync, onCleanup, signal, untracked } from "../index.js";

describe("signal", () => {
  it("set/update/peek read and write the current value", () => {
    const count = signal(1);

    count.set(2);
    count.update((n) => n * 10);

    expect(count.get()).toBe(20);
    expect(count.peek()).toBe(20);
  });

  it("equal writes do not re-run dependants", () => {
    const name = signal("a");
    const seen: string[] = [];

    createEffect(() => {
      seen.push(name.get());
    });
    name.set("a");
    flushSync();

    expect(seen).toEqual(["a"]);
  });

  it("custom comparator decides what counts as a change", () => {
    const query = signal("star", (a, b) => a.trim() === b.trim());
    const seen: string[] = [];

    createEffect(() => {
      seen.push(query.get());
    });
    query.set(" star ");
    flushSync();
    query.set("stars");
    flushSync();

    expect(seen).toEqual(["star", "stars"]);
  });
});

describe("computed", () => {
  it("evaluates lazily and caches until a dependency changes", () => {
    const a = signal(2);
    const fn = vi.fn(() => a.get() * 2);
    const doubled = computed(fn);

    expect(fn).not.toHaveBeenCalled();
    expect(doubled.get()).toBe(4);
    expect(doubled.get()).toBe(4);
    expect(fn).toHaveBeenCalledTimes(1);

    a.set(5);
    expect(doubled.get()).toBe(10);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("effects observe derived values", () => {
    const text = signal("  dune ");
    const trimmed = computed(() => text.get().trim());
    const seen: string[] = [];

    createEffect(() => {
      seen.push(trimmed.get());
    });
    text.set("alien");
    flushSync();

    expect(seen).toEqual(["dune", "alien"]);
  });

  it("detects cycles", () => {
    const self: { get: () => number } = computed((): number => self.get() + 1);
    expect(() => self.get()).toThrow("Cycle detected in computed");
  });

  it("dispose drops the cached value", () => {
    const a = signal(1);
    const c = computed(() => a.get());

    expect(c.get()).toBe(1);
    c.dispose();
    expect(c.peek()).toBeUndefined();
  });
});

describe("createEffect", () => {
  it("re-runs after a write, once per flush", async () => {
    const a = signal(0);
    const seen: number[] = [];

    createEffect(() => {
      seen.push(a.get());
    });
    a.set(1);
    a.set(2);
    await Promise.resolve();

    expect(seen).toEqual([0, 2]);
  });

  it("batch flushes synchronously on exit", () => {
    const a = signal(0);
    const seen: number[] = [];

    createEffect(() => {
      seen.push(a.get());
    });
    batch(() => {
      a.set(1);
      a.set(2);
    });

    expect(seen).toEqual([0, 2]);
  });

  it("runs cleanups in reverse order before re-running and on dispose", () => {
    const a = signal(0);
    const log: string[] = [];

    const dispose = createEffect(() => {
      const n = a.get();
      onCleanup(() => log.push(`first ${n}`));
      return () => log.push(`returned ${n}`);
    });

    batch(() => a.set(1));
    expect(log).toEqual(["returned 0", "first 0"]);

    dispose();
    expect(log).toEqual(["returned 0", "first 0", "returned 1", "first 1"]);
  });

  it("never runs again after dispose", () => {
    const a = signal(0);
    const fn = vi.fn(() => {
      a.get();
    });

    const dispose = createEffect(fn);
    dispose();
    a.set(1);
    flushSync();

    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("untracked reads do not subscribe", () => {
    const a = signal(0);
    const b = signal(0);
    const seen: string[] = [];

    createEffect(() => {
      seen.push(`${a.get()}:${untracked(() => b.get())}`);
    });
    batch(() => b.set(1));
    batch(() => a.set(1));

    expect(seen).toEqual(["0:0", "1:1"]);
  });

  it("routes cleanup errors to onError and still runs the rest", () => {
    const a = signal(0);
    const onError = vi.fn();
    const log: string[] = [];
    const boom = new Error("cleanup failed");

    createEffect(
      () => {
        a.get();
        onCleanup(() => log.push("kept"));
        onCleanup(() => {
          throw boom;
        });
      },
      { onError }
    );
    batch(() => a.set(1));

    expect(onError).toHaveBeenCalledWith(boom);
    expect(log).toEqual(["kept"]);
  });

  it("rethrows body errors without onError", () => {
    expect(() =>
      createEffect(() => {
        throw new Error("body failed");
      })
    ).toThrow("body failed");
  });
});

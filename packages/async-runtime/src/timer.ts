export interface ScheduledTask {
  /** Idempotent; a task that already fired is left alone. */
  cancel(): void;
  /** Neither fired nor cancelled yet. */
  readonly pending: boolean;
}

export interface TaskScheduler {
  schedule(run: () => void, delayMs: number): ScheduledTask;
}

export const timerScheduler: TaskScheduler = {
  schedule(run, delayMs) {
    let pending = true;
    const handle = setTimeout(() => {
      pending = false;
      run();
    }, Math.max(0, delayMs));

    return {
      get pending() {
        return pending;
      },
      cancel() {
        if (!pending) return;
        pending = false;
        clearTimeout(handle);
      },
    };
  },
};

export interface ManualScheduler extends TaskScheduler {
  /** Virtual time in ms since creation. */
  now(): number;
  /** Moves the clock forward, firing due tasks in time order. */
  advance(ms: number): void;
  /** Number of tasks still waiting. */
  readonly size: number;
}

interface Entry {
  at: number;
  order: number;
  run: () => void;
}

/**
 * A scheduler driven by hand. Tasks due at the same instant fire in the
 * order they were scheduled.
 */
export function createManualScheduler(): ManualScheduler {
  let clock = 0;
  let order = 0;
  const waiting = new Set<Entry>();

  function nextDue(limit: number): Entry | undefined {
    let next: Entry | undefined;
    for (const entry of waiting) {
      if (entry.at > limit) continue;
      if (!next || entry.at < next.at || (entry.at === next.at && entry.order < next.order)) {
        next = entry;
      }
    }
    return next;
  }

  return {
    schedule(run, delayMs) {
      const entry: Entry = { at: clock + Math.max(0, delayMs), order: order++, run };
      waiting.add(entry);
      return {
        get pending() {
          return waiting.has(entry);
        },
        cancel() {
          waiting.delete(entry);
        },
      };
    },
    now: () => clock,
    advance(ms) {
      const target = clock + ms;
      for (let entry = nextDue(target); entry; entry = nextDue(target)) {
        waiting.delete(entry);
        clock = entry.at;
        entry.run();
      }
      clock = target;
    },
    get size() {
      return waiting.size;
    },
  };
}

export interface Schedulable {
  run(): void;
  disposed?: boolean;
  priority?: number;
}

const MAX_FLUSH_ROUNDS = 10000;

const queue = new Set<Schedulable>();

let flushQueued = false;
let flushing = false;
let batchDepth = 0;

export function scheduleJob(job: Schedulable) {
  if (job.disposed) return;

  queue.add(job);

  if (!flushQueued && !flushing && batchDepth === 0) {
    flushQueued = true;
    queueMicrotask(flush);
  }
}

/**
 * Runs `fn` with flushing suspended. Jobs queued inside run synchronously
 * once the outermost batch exits, or in the next round of the flush that
 * is already running.
 */
export function batch<T>(fn: () => T): T {
  batchDepth++;
  try {
    return fn();
  } finally {
    batchDepth--;
    if (batchDepth === 0) flush();
  }
}

export function flushSync() {
  if (!flushQueued && queue.size === 0) return;
  flush();
}

function flush() {
  // a running flush picks up whatever is queued in its next round
  if (flushing) return;
  flushQueued = false;
  flushing = true;
  let rounds = 0;

  try {
    while (queue.size > 0) {
      if (++rounds > MAX_FLUSH_ROUNDS) {
        queue.clear();
        throw new Error("Infinite update loop");
      }

      const jobs = Array.from(queue).sort((a, b) => (a.priority ?? 0) - (b.priority ?? 0));
      queue.clear();
      for (const job of jobs) {
        if (!job.disposed) job.run();
      }
    }
  } finally {
    flushing = false;
    // jobs left behind by a throwing job
    if (queue.size > 0 && !flushQueued) {
      flushQueued = true;
      queueMicrotask(flush);
    }
  }
}

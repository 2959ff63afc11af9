import { timerScheduler, type ScheduledTask, type TaskScheduler } from "./timer.js";

export interface DebounceOptions {
  scheduler?: TaskScheduler;
}

export interface Debouncer {
  /** (Re)starts the quiet period; `run` fires once it elapses untouched. */
  trigger: () => void;
  cancel: () => void;
  /** Runs a waiting call now instead of at the end of the quiet period. */
  flush: () => void;
  readonly pending: boolean;
}

export function createDebouncer(
  delayMs: number,
  run: () => void,
  options: DebounceOptions = {}
): Debouncer {
  const scheduler = options.scheduler ?? timerScheduler;
  let task: ScheduledTask | null = null;

  const cancel = () => {
    task?.cancel();
    task = null;
  };

  return {
    trigger() {
      cancel();
      if (delayMs <= 0) {
        run();
        return;
      }
      task = scheduler.schedule(() => {
        task = null;
        run();
      }, delayMs);
    },
    cancel,
    flush() {
      if (!task?.pending) return;
      cancel();
      run();
    },
    get pending() {
      return task?.pending ?? false;
    },
  };
}

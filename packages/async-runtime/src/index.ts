export type { AsyncSignal, AsyncStatus } from "./types.js";
export { fromPromise, type AsyncTask, type FromPromiseOptions } from "./fromPromise.js";
export { asyncSignal, type AsyncMeta } from "./asyncSignal.js";
export {
  createResource,
  type FetchContext,
  type Fetcher,
  type ResourceMeta,
  type ResourceOptions,
} from "./createResource.js";
export { createDebouncer, type DebounceOptions, type Debouncer } from "./debounce.js";
export {
  createManualScheduler,
  timerScheduler,
  type ManualScheduler,
  type ScheduledTask,
  type TaskScheduler,
} from "./timer.js";
export { CancelledError, isCancellation } from "./errors.js";
export { createLogger } from "./logger.js";

export { signal, type Signal } from "./signal.js";
export { computed, type Comparator } from "./computed.js";
export { createEffect, onCleanup, type Cleanup, type EffectOptions } from "./effect.js";
export { batch, flushSync } from "./scheduler.js";
export { untracked } from "./graph.js";

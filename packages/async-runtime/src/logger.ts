import { createConsola, LogLevels, type ConsolaInstance, type LogType } from "consola";

function isLogType(name: string): name is LogType {
  return Object.hasOwn(LogLevels, name);
}

function levelFromEnv(): number | undefined {
  const name = process.env.LULL_LOG_LEVEL?.trim().toLowerCase();
  if (!name || !isLogType(name)) return undefined;
  return LogLevels[name];
}

const level = levelFromEnv();
const root = createConsola(level === undefined ? {} : { level });

export function createLogger(tag: string): ConsolaInstance {
  return root.withTag(tag);
}

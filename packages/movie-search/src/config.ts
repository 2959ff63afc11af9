import { z } from "zod";

const intFrom = (name: string) =>
  z.coerce.number({ invalid_type_error: `${name} must be a number` }).int(`${name} must be an integer`);

// an empty variable counts as unset, so it falls back to the default
const unsetIfBlank = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  MOVIE_API_KEY: z
    .string({ required_error: "MOVIE_API_KEY is required" })
    .trim()
    .min(1, "MOVIE_API_KEY must not be empty"),
  MOVIE_API_URL: z
    .string()
    .url("MOVIE_API_URL must be a URL")
    .default("https://www.omdbapi.com/"),
  SEARCH_DEBOUNCE_MS: z.preprocess(
    unsetIfBlank,
    intFrom("SEARCH_DEBOUNCE_MS").min(0, "SEARCH_DEBOUNCE_MS must be >= 0").default(300)
  ),
  SEARCH_MIN_QUERY_LENGTH: z.preprocess(
    unsetIfBlank,
    intFrom("SEARCH_MIN_QUERY_LENGTH").min(1, "SEARCH_MIN_QUERY_LENGTH must be >= 1").default(1)
  ),
  SEARCH_TIMEOUT_MS: z.preprocess(
    unsetIfBlank,
    intFrom("SEARCH_TIMEOUT_MS").positive("SEARCH_TIMEOUT_MS must be > 0").default(10_000)
  ),
});

export interface SearchConfig {
  apiKey: string;
  baseUrl: string;
  /** Quiet period after the last keystroke before searching */
  debounceMs: number;
  /** Shorter (trimmed) queries are not sent */
  minQueryLength: number;
  timeoutMs: number;
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): SearchConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message));
  }

  const data = parsed.data;
  return {
    apiKey: data.MOVIE_API_KEY,
    baseUrl: data.MOVIE_API_URL,
    debounceMs: data.SEARCH_DEBOUNCE_MS,
    minQueryLength: data.SEARCH_MIN_QUERY_LENGTH,
    timeoutMs: data.SEARCH_TIMEOUT_MS,
  };
}

import axios, { type AxiosAdapter, type AxiosResponse } from "axios";
import { z } from "zod";
import { CancelledError, createLogger } from "@lull/async-runtime";
import type { SearchConfig } from "./config.js";
import { MovieApiError } from "./errors.js";

const log = createLogger("movie-client");

const MovieSchema = z.object({
  Title: z.string(),
  Year: z.string(),
  imdbID: z.string(),
  Type: z.string(),
  Poster: z.string(),
});

const SearchResponseSchema = z.discriminatedUnion("Response", [
  z.object({
    Response: z.literal("True"),
    Search: z.array(MovieSchema),
    totalResults: z.coerce.number().int().nonnegative(),
  }),
  z.object({
    Response: z.literal("False"),
    Error: z.string(),
  }),
]);

// negative answers that just mean "nothing to show"
const NO_RESULTS = new Set(["Movie not found!", "Series not found!", "Episode not found!", "Too many results."]);

export type MovieType = "movie" | "series" | "episode";

export interface Movie {
  id: string;
  title: string;
  year: string;
  type: string;
  /** null when the service has no poster */
  poster: string | null;
}

export interface SearchPage {
  movies: Movie[];
  total: number;
}

export interface SearchOptions {
  signal?: AbortSignal;
  /** 1-based */
  page?: number;
  type?: MovieType;
}

export interface MovieClient {
  search(query: string, options?: SearchOptions): Promise<SearchPage>;
}

export interface MovieClientDeps {
  /** Replaces the HTTP transport, e.g. with an in-process one in tests */
  adapter?: AxiosAdapter;
}

function toMovie(raw: z.infer<typeof MovieSchema>): Movie {
  return {
    id: raw.imdbID,
    title: raw.Title,
    year: raw.Year,
    type: raw.Type,
    poster: raw.Poster === "N/A" ? null : raw.Poster,
  };
}

function toClientError(err: unknown, signal?: AbortSignal): Error {
  if (axios.isCancel(err) || signal?.aborted) {
    const reason: unknown = signal?.reason;
    return reason instanceof CancelledError ? reason : new CancelledError(reason ?? "aborted");
  }
  if (axios.isAxiosError(err)) {
    if (err.response) {
      const { status } = err.response;
      return new MovieApiError("http", `Movie API responded with ${status}`, status, { cause: err });
    }
    return new MovieApiError("network", err.message, undefined, { cause: err });
  }
  return new MovieApiError("network", err instanceof Error ? err.message : String(err), undefined, {
    cause: err,
  });
}

export function createMovieClient(
  config: Pick<SearchConfig, "apiKey" | "baseUrl" | "timeoutMs">,
  deps: MovieClientDeps = {}
): MovieClient {
  const http = axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    ...(deps.adapter ? { adapter: deps.adapter } : {}),
  });

  async function search(query: string, options: SearchOptions = {}): Promise<SearchPage> {
    const { signal, page, type } = options;
    log.debug(`search "${query}"${page ? ` page ${page}` : ""}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await http.get<unknown>("", {
        params: { s: query, apikey: config.apiKey, page, type },
        signal,
      });
    } catch (err) {
      throw toClientError(err, signal);
    }

    const parsed = SearchResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MovieApiError(
        "invalid-response",
        `Unexpected search response${issue ? ` at ${issue.path.join(".") || "<root>"}: ${issue.message}` : ""}`,
        response.status
      );
    }

    const body = parsed.data;
    if (body.Response === "False") {
      if (NO_RESULTS.has(body.Error)) return { movies: [], total: 0 };
      throw new MovieApiError("api", body.Error, response.status);
    }
    return { movies: body.Search.map(toMovie), total: body.totalResults };
  }

  return { search };
}

export { loadConfig, ConfigError, type SearchConfig } from "./config.js";
export {
  createMovieClient,
  type Movie,
  type MovieClient,
  type MovieClientDeps,
  type MovieType,
  type SearchOptions,
  type SearchPage,
} from "./client.js";
export { MovieApiError, describeFailure, type MovieApiErrorKind } from "./errors.js";
export { createMovieSearch, type MovieSearch, type MovieSearchOptions, type SearchView } from "./search.js";
export { bindInput, type InputLike } from "./input.js";

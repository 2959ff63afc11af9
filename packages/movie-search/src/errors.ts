export type MovieApiErrorKind = "network" | "http" | "invalid-response" | "api";

export class MovieApiError extends Error {
  override readonly name = "MovieApiError";

  constructor(
    readonly kind: MovieApiErrorKind,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Text shown to the user in place of results. */
export function describeFailure(error: unknown): string {
  if (!(error instanceof MovieApiError)) {
    return error instanceof Error ? error.message : "Something went wrong.";
  }
  switch (error.kind) {
    case "network":
      return "Could not reach the movie service.";
    case "http":
      return `The movie service returned an error (${error.status ?? "unknown status"}).`;
    case "invalid-response":
      return "The movie service sent an unexpected response.";
    case "api":
      return error.message;
  }
}

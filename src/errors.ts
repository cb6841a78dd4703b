/**
 * Fatal error types. Everything else (missing title, missing zone, missing
 * episode count) is resolved with a fallback value and never thrown.
 */

/** The input string carries no work code */
export class ResolutionError extends Error {
  constructor(readonly input: string) {
    super(`Unable to extract ncode from: ${input}`);
    this.name = "ResolutionError";
  }
}

export interface FetchErrorDetails {
  /** HTTP status, when the server answered */
  status?: number;
  /** Attempt number that produced this error (1-based) */
  attempt?: number;
  cause?: unknown;
}

/** A request failed; thrown once the fetcher's retries are exhausted */
export class FetchError extends Error {
  readonly status: number | null;
  readonly attempt: number;

  constructor(
    readonly url: string,
    message: string,
    { status, attempt = 1, cause }: FetchErrorDetails = {},
  ) {
    super(`${message}: ${url}`, cause === undefined ? undefined : { cause });
    this.name = "FetchError";
    this.status = status ?? null;
    this.attempt = attempt;
  }
}

/** Range filtering left nothing to download */
export class EmptyResultError extends Error {
  constructor(message = "No episodes matched the requested range.") {
    super(message);
    this.name = "EmptyResultError";
  }
}

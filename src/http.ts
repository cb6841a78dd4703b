/**
 * Rate-limited HTTP client. Every network request of the downloader goes
 * through a single HttpClient instance.
 */

import { FetchError } from "./errors.js";

/** Identifying user agent sent with every request */
export const DEFAULT_USER_AGENT = "narou-epub/0.1 (personal-use)";

/** Upper bound for a single backoff sleep (ms) */
export const MAX_BACKOFF = 5000;

/** Backoff before the second attempt (ms); doubles per attempt */
export const BASE_BACKOFF = 500;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  /** Minimum time between the starts of two requests (ms) */
  delay: number;
  /** Per-request timeout (ms) */
  timeout: number;
  /** Total number of attempts per request */
  retries: number;
  userAgent?: string;
  /** Transport, defaults to the global fetch */
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep inserted after a failed attempt, before the next one.
 *
 * @param attempt - 1-based number of the attempt that just failed
 *
 * @example
 * backoffDelay(1) // 500
 * backoffDelay(2) // 1000
 * backoffDelay(5) // 5000 (capped)
 */
export function backoffDelay(attempt: number): number {
  return Math.min(MAX_BACKOFF, BASE_BACKOFF * 2 ** (attempt - 1));
}

type AttemptResult = { ok: true; body: string } | { ok: false; error: FetchError };

export class HttpClient {
  readonly delay: number;
  readonly timeout: number;
  readonly retries: number;
  readonly headers: Readonly<Record<string, string>>;

  private lastRequest = 0;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: HttpClientOptions) {
    this.delay = Math.max(0, options.delay);
    this.timeout = options.timeout;
    this.retries = Math.max(1, options.retries);
    this.headers = { "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT };
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? Date.now;
  }

  private async throttle(): Promise<void> {
    if (this.delay <= 0) return;
    const wait = this.delay - (this.now() - this.lastRequest);
    if (wait > 0) {
      await this.sleep(wait);
    }
    this.lastRequest = this.now();
  }

  private async attempt(url: string, attempt: number): Promise<AttemptResult> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: this.headers,
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { ok: false, error: new FetchError(url, `Request failed (${reason})`, { attempt, cause: error }) };
    }

    if (!response.ok) {
      return { ok: false, error: new FetchError(url, `HTTP ${response.status}`, { status: response.status, attempt }) };
    }

    try {
      return { ok: true, body: await response.text() };
    } catch (error) {
      return { ok: false, error: new FetchError(url, "Failed to read response body", { attempt, cause: error }) };
    }
  }

  /**
   * GET a URL and return the response body as text.
   * Retries with exponential backoff; the throttle applies before every attempt.
   *
   * @throws {FetchError} The error of the final attempt once all attempts failed
   */
  async get(url: string): Promise<string> {
    let lastError: FetchError | null = null;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      await this.throttle();
      const result = await this.attempt(url, attempt);
      if (result.ok) {
        return result.body;
      }
      lastError = result.error;
      if (attempt < this.retries) {
        await this.sleep(backoffDelay(attempt));
      }
    }

    throw lastError ?? new FetchError(url, "No request attempted");
  }
}

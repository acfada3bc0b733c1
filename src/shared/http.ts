import ky, { type KyInstance } from "ky";

/**
 * Default User-Agent for HTTP requests.
 * Mimics a standard Chrome browser on macOS.
 */
export const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * Referer the media CDN expects on stream requests.
 */
export const PLAYER_REFERER = "https://play.nugs.net/";

export const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchFunction = typeof fetch;

export interface HttpClientOptions {
  /** Per-request timeout in milliseconds. */
  timeout?: number | undefined;
  userAgent?: string | undefined;
  /** Replaces the global fetch; tests pass an in-process stand-in. */
  fetch?: FetchFunction | undefined;
}

/**
 * Creates the HTTP client used across the app.
 *
 * Retries are disabled here: the transfer engine owns its retry policy and
 * API calls surface their first failure.
 */
export function createHttpClient(options: HttpClientOptions = {}): KyInstance {
  return ky.create({
    headers: {
      "User-Agent": options.userAgent ?? USER_AGENT,
    },
    timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
    retry: 0,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
}

/**
 * Generic URL utilities for parsing and manipulation.
 */

/**
 * Splits a manifest URL into the directory its relative URIs resolve against
 * and the query string that must be carried onto them.
 *
 * @example
 * getManifestBase("https://h/a/b/manifest.m3u8?x=1")
 * // => { baseUrl: "https://h/a/b/", query: "?x=1" }
 */
export function getManifestBase(url: string): { baseUrl: string; query: string } {
  const parsed = new URL(url);
  const path = parsed.pathname;
  const baseUrl = `${parsed.protocol}//${parsed.host}${path.substring(0, path.lastIndexOf("/") + 1)}`;
  return { baseUrl, query: parsed.search };
}

/**
 * Resolves a potentially relative URI against a base URL.
 * If the URI is already absolute (starts with http), returns it unchanged.
 *
 * @example
 * resolveUrl("segment001.ts", "https://cdn.example.com/videos/")
 * // => "https://cdn.example.com/videos/segment001.ts"
 */
export function resolveUrl(uri: string, baseUrl: string): string {
  return uri.startsWith("http") ? uri : baseUrl + uri;
}

/**
 * Resolves a URI and appends query params for authentication.
 * Signed CDN URLs need the manifest's token on every child request.
 *
 * @example
 * resolveUrlWithParams("segment.ts", "https://cdn.com/", "?token=abc")
 * // => "https://cdn.com/segment.ts?token=abc"
 */
export function resolveUrlWithParams(uri: string, baseUrl: string, queryParams: string): string {
  const resolved = resolveUrl(uri, baseUrl);
  // Don't add params if URL already has them
  return resolved.includes("?") ? resolved : resolved + queryParams;
}

/**
 * Reads one query parameter from a raw query string (with or without "?").
 */
export function getQueryParam(query: string, name: string): string | null {
  const value = new URLSearchParams(query.startsWith("?") ? query.slice(1) : query).get(name);
  return value === "" ? null : value;
}

/**
 * Error types shared by the transfer pipeline.
 *
 * Every failure that reaches the user is a `DownloadError` carrying one of the
 * categories below. Selection and manifest failures are separate classes because
 * they are never retried.
 */
import { TimeoutError } from "ky";

// ============================================================================
// Error Taxonomy
// ============================================================================

export const DOWNLOAD_ERROR_TYPE = {
  network: "network",
  timeout: "timeout",
  corruption: "corruption",
  filesystem: "filesystem",
  diskSpace: "disk_space",
  externalTool: "external_tool",
  unknown: "unknown",
} as const;

export type DownloadErrorType = (typeof DOWNLOAD_ERROR_TYPE)[keyof typeof DOWNLOAD_ERROR_TYPE];

const DEFAULT_SUGGESTIONS: Record<DownloadErrorType, string> = {
  network: "Check your internet connection and try again.",
  timeout: "The server is slow to respond. Try again later.",
  corruption: "The file was damaged in transit. It will be downloaded again.",
  filesystem: "Check that the output folder exists and is writable.",
  disk_space: "Free up disk space and try again.",
  external_tool: "Make sure ffmpeg is installed and on your PATH.",
  unknown: "Try again. If the problem persists, report it with the log output.",
};

const RETRYABLE_BY_DEFAULT: Record<DownloadErrorType, boolean> = {
  network: true,
  timeout: true,
  corruption: true,
  filesystem: false,
  disk_space: false,
  external_tool: false,
  unknown: false,
};

export interface DownloadErrorOptions {
  suggestion?: string | undefined;
  retryable?: boolean | undefined;
  cause?: unknown;
}

/**
 * A categorized transfer or finalization failure.
 */
export class DownloadError extends Error {
  readonly type: DownloadErrorType;
  readonly suggestion: string;
  readonly retryable: boolean;

  constructor(type: DownloadErrorType, message: string, options: DownloadErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DownloadError";
    this.type = type;
    this.suggestion = options.suggestion ?? DEFAULT_SUGGESTIONS[type];
    this.retryable = options.retryable ?? RETRYABLE_BY_DEFAULT[type];
  }

  /**
   * Message plus suggestion, for terminal output.
   */
  describe(): string {
    return `${this.message} (${this.type}). ${this.suggestion}`;
  }
}

/**
 * No quality option or video variant satisfies the request.
 */
export class SelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SelectionError";
  }
}

/**
 * A manifest could not be fetched into a usable shape.
 */
export class ManifestError extends Error {
  readonly url: string | undefined;

  constructor(message: string, url?: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ManifestError";
    this.url = url;
  }
}

export type ResumeRejection = "missing_file" | "size_mismatch" | "stale";

/**
 * A persisted resume state may not be used to continue a transfer.
 */
export class ResumeStateError extends Error {
  readonly reason: ResumeRejection;

  constructor(reason: ResumeRejection, message: string) {
    super(message);
    this.name = "ResumeStateError";
    this.reason = reason;
  }
}

/**
 * A vendor API request failed.
 */
export class ApiError extends Error {
  readonly endpoint: string;
  readonly statusCode: number | undefined;

  constructor(endpoint: string, message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ApiError";
    this.endpoint = endpoint;
    this.statusCode = statusCode;
  }
}

/**
 * Some items of a multi-item job failed; the rest completed.
 */
export class BatchFailureError extends Error {
  readonly failures: { id: string; error: string }[];

  constructor(label: string, failures: { id: string; error: string }[]) {
    super(`${failures.length} item(s) of ${label} failed`);
    this.name = "BatchFailureError";
    this.failures = failures;
  }
}

// ============================================================================
// Classification
// ============================================================================

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * Reads a Node-style `code` from an error or its cause chain.
 */
export function getErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps anything thrown during a transfer onto the download taxonomy.
 */
export function toDownloadError(error: unknown): DownloadError {
  if (error instanceof DownloadError) return error;

  const message = getErrorMessage(error);

  if (error instanceof TimeoutError || (error instanceof Error && error.name === "TimeoutError")) {
    return new DownloadError("timeout", message, { cause: error });
  }

  const code = getErrorCode(error);
  if (code !== undefined) {
    if (TIMEOUT_CODES.has(code)) {
      return new DownloadError("timeout", message, { cause: error });
    }
    if (TRANSIENT_CODES.has(code)) {
      return new DownloadError("network", message, { cause: error });
    }
    if (code === "ENOSPC") {
      return new DownloadError("disk_space", message, { cause: error });
    }
    if (code === "EACCES" || code === "EPERM" || code === "EROFS" || code === "ENOENT") {
      return new DownloadError("filesystem", message, { cause: error });
    }
    if (code === "ENOTFOUND") {
      return new DownloadError("network", message, {
        cause: error,
        retryable: false,
        suggestion: "The host could not be resolved. Check the URL.",
      });
    }
  }

  // undici reports socket failures as a bare TypeError
  if (error instanceof TypeError && message === "fetch failed") {
    return new DownloadError("network", message, { cause: error });
  }

  return new DownloadError("unknown", message, { cause: error });
}

/**
 * Status codes worth another attempt.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Error for an unexpected HTTP status on a media request.
 */
export function httpStatusError(status: number, url: string): DownloadError {
  return new DownloadError("network", `HTTP ${status} for ${url}`, {
    retryable: isRetryableStatus(status),
    ...(status === 401 || status === 403
      ? { suggestion: "The stream link expired or your subscription does not cover it." }
      : {}),
  });
}

/**
 * Resumable transfer engine.
 *
 * Single resources are written to `<target>.tmp` with range resume, bounded
 * retry and size/checksum verification, then renamed into place. Livestreams
 * are appended segment by segment into one file, with per-segment progress
 * kept in the resume state.
 */
import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { appendFile, open, truncate } from "node:fs/promises";
import { dirname, join } from "node:path";
import delay from "delay";
import type { KyInstance } from "ky";
import {
  DownloadError,
  ResumeStateError,
  getErrorMessage,
  httpStatusError,
  toDownloadError,
} from "../shared/errors.js";
import { ensureDir, getFileSize, removeFile, rename, writeFile } from "../shared/fs.js";
import { PLAYER_REFERER } from "../shared/http.js";
import type { Logger } from "../shared/logger.js";
import { ProgressTracker } from "./progress.js";
import type { ResumeState, ResumeStateStore } from "./resumeStore.js";
import type { ProgressCallback } from "./shared/types.js";

// ============================================================================
// Constants
// ============================================================================

const MIB = 1024 * 1024;

/** Transfers with more than this left to fetch get a disk-space check first. */
export const DISK_CHECK_THRESHOLD = 100 * MIB;
export const DISK_CHECK_SIZE = MIB;
export const DISK_CHECK_FILE = ".disk_space_test.tmp";

/** Resume state is saved after this many new bytes. */
export const STATE_SAVE_INTERVAL = MIB;

/** Backoff before attempt n+1 is n times this. */
export const RETRY_BACKOFF_MS = 1000;

export const DEFAULT_MAX_RETRIES = 3;

// ============================================================================
// Checksums
// ============================================================================

export function checksumOf(bytes: Uint8Array): string {
  return createHash("md5").update(bytes).digest("hex");
}

/**
 * MD5 of a file, streamed.
 */
export async function calculateChecksum(path: string): Promise<string> {
  const hash = createHash("md5");
  for await (const chunk of createReadStream(path)) {
    if (typeof chunk === "string" || chunk instanceof Uint8Array) {
      hash.update(chunk);
    }
  }
  return hash.digest("hex");
}

// ============================================================================
// Disk Check
// ============================================================================

/**
 * Writes and removes a small file in `dir`. Any failure is reported as a
 * disk-space error.
 */
export async function checkDiskSpace(dir: string): Promise<void> {
  const checkPath = join(dir, DISK_CHECK_FILE);
  try {
    await writeFile(checkPath, Buffer.alloc(DISK_CHECK_SIZE));
  } catch (error) {
    throw new DownloadError("disk_space", `Not enough disk space in ${dir}`, { cause: error });
  } finally {
    await removeFile(checkPath);
  }
}

// ============================================================================
// Engine
// ============================================================================

export type SleepFunction = (ms: number) => Promise<void>;
export type DiskSpaceCheck = (dir: string) => Promise<void>;

export interface TransferEngineOptions {
  http: KyInstance;
  store: ResumeStateStore;
  logger: Logger;
  maxRetries?: number | undefined;
  /** Backoff sleep; tests pass a recorder. */
  sleep?: SleepFunction | undefined;
  /** Clock for progress throughput. */
  now?: (() => number) | undefined;
  /** Defaults to `checkDiskSpace`. */
  diskCheck?: DiskSpaceCheck | undefined;
}

export interface TransferOptions {
  /** MD5 hex the finished file must match. */
  expectedChecksum?: string | undefined;
  onProgress?: ProgressCallback | undefined;
}

export interface LivestreamOptions {
  /** Manifest the segments came from; recorded in the resume state. */
  sourceUrl: string;
  onProgress?: ProgressCallback | undefined;
}

interface ResumePoint {
  offset: number;
  state: ResumeState | null;
}

export class TransferEngine {
  private readonly http: KyInstance;
  private readonly store: ResumeStateStore;
  private readonly logger: Logger;
  private readonly maxRetries: number;
  private readonly sleep: SleepFunction;
  private readonly now: () => number;
  private readonly diskCheck: DiskSpaceCheck;

  constructor(options: TransferEngineOptions) {
    this.http = options.http;
    this.store = options.store;
    this.logger = options.logger;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? Date.now;
    this.diskCheck = options.diskCheck ?? checkDiskSpace;
  }

  /**
   * Downloads `sourceUrl` to `targetPath`. The target only ever appears
   * complete; on final failure the temp file and its state are removed.
   * `expectedSize` of 0 takes the size the server declares.
   */
  async transfer(
    targetPath: string,
    sourceUrl: string,
    expectedSize = 0,
    options: TransferOptions = {}
  ): Promise<void> {
    await ensureDir(dirname(targetPath));

    const tempPath = `${targetPath}.tmp`;
    try {
      await this.withRetry(sourceUrl, () =>
        this.attemptTransfer(targetPath, tempPath, sourceUrl, expectedSize, options)
      );
    } catch (error) {
      await this.discard(tempPath);
      throw error;
    }
    await this.store.delete(tempPath);
  }

  /**
   * Appends segments in index order into `targetPath`. A valid resume state
   * continues at the first incomplete segment. On failure the file and state
   * are kept so a later run can continue.
   */
  async transferLivestream(
    targetPath: string,
    segmentUrls: readonly string[],
    options: LivestreamOptions
  ): Promise<void> {
    await ensureDir(dirname(targetPath));

    let state = await this.loadLivestreamState(targetPath, segmentUrls, options.sourceUrl);
    const total = state.segments.length;

    for (const segment of state.segments) {
      if (segment.completed) continue;

      const bytes = await this.withRetry(segment.url, () => this.fetchSegment(segment.url));
      try {
        await appendFile(targetPath, bytes);
      } catch (error) {
        throw toDownloadError(error);
      }

      const segments = state.segments.map((s) =>
        s.index === segment.index
          ? { ...s, size: bytes.length, checksum: checksumOf(bytes), completed: true }
          : s
      );
      state = await this.store.save({
        ...state,
        segments,
        downloadedSize: state.downloadedSize + bytes.length,
      });

      options.onProgress?.({
        percent: ((segment.index + 1) / total) * 100,
        phase: "downloading",
        downloadedBytes: state.downloadedSize,
        downloadedSegments: segment.index + 1,
        totalSegments: total,
      });
    }

    await this.store.delete(targetPath);
  }

  // --------------------------------------------------------------------------
  // Retry
  // --------------------------------------------------------------------------

  private async withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const failure = toDownloadError(error);
        if (!failure.retryable || attempt >= this.maxRetries) {
          throw failure;
        }
        this.logger.warn(`Attempt ${attempt}/${this.maxRetries} failed, retrying`, {
          url: label,
          error: failure.message,
        });
        await this.sleep(attempt * RETRY_BACKOFF_MS);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Single Resource
  // --------------------------------------------------------------------------

  private async attemptTransfer(
    targetPath: string,
    tempPath: string,
    sourceUrl: string,
    expectedSize: number,
    options: TransferOptions
  ): Promise<void> {
    const resume = await this.resumePoint(tempPath);

    const headers: Record<string, string> = { Referer: PLAYER_REFERER };
    if (resume.offset > 0) {
      headers.Range = `bytes=${resume.offset}-`;
      if (resume.state?.etag) {
        headers["If-Range"] = resume.state.etag;
      }
    }

    const response = await this.http.get(sourceUrl, { headers, throwHttpErrors: false });

    if (response.status === 416) {
      await response.body?.cancel();
      await this.discard(tempPath);
      throw new DownloadError("corruption", `Range not satisfiable for ${sourceUrl}`);
    }

    const etag = response.headers.get("etag") ?? "";
    let offset: number;
    if (response.status === 206) {
      const recorded = resume.state?.etag ?? "";
      if (recorded && etag && recorded !== etag) {
        await response.body?.cancel();
        await this.discard(tempPath);
        throw new DownloadError(
          "corruption",
          `Resource changed since the partial download: ETag ${recorded} is now ${etag}`
        );
      }
      offset = resume.offset;
    } else if (response.status === 200) {
      offset = 0;
    } else {
      await response.body?.cancel();
      throw httpStatusError(response.status, sourceUrl);
    }

    const total = expectedSize > 0 ? expectedSize : totalSizeFrom(response.headers, offset);
    if (total - offset > DISK_CHECK_THRESHOLD) {
      try {
        await this.diskCheck(dirname(tempPath));
      } catch (error) {
        await response.body?.cancel();
        throw error;
      }
    }
    if (offset > 0) {
      this.logger.debug("Resuming transfer", { path: tempPath, offset });
    }

    let state: ResumeState = {
      ...(resume.state ?? this.store.createInitialState(tempPath, sourceUrl, total)),
      url: sourceUrl,
      totalSize: total,
      downloadedSize: offset,
      etag,
    };

    const body = response.body;
    if (!body) {
      throw new DownloadError("network", `Empty response body from ${sourceUrl}`);
    }

    const tracker = new ProgressTracker(total, options.onProgress, {
      startBytes: offset,
      now: this.now,
    });
    const file = await open(tempPath, offset > 0 ? "a" : "w");
    const reader = body.getReader();
    let written = offset;
    let unsaved = 0;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        await file.write(value);
        written += value.length;
        unsaved += value.length;
        tracker.advance(value.length);

        if (unsaved >= STATE_SAVE_INTERVAL) {
          state = await this.store.save({ ...state, downloadedSize: written });
          unsaved = 0;
        }
      }
    } catch (error) {
      await this.store.save({ ...state, downloadedSize: written });
      throw error;
    } finally {
      await file.close();
    }

    state = await this.store.save({ ...state, downloadedSize: written });
    tracker.finish();

    if (total > 0 && written !== total) {
      await this.discard(tempPath);
      throw new DownloadError("corruption", `Size mismatch: expected ${total} bytes, got ${written}`);
    }

    if (options.expectedChecksum) {
      const actual = await calculateChecksum(tempPath);
      if (actual !== options.expectedChecksum.toLowerCase()) {
        await this.discard(tempPath);
        throw new DownloadError(
          "corruption",
          `Checksum mismatch: expected ${options.expectedChecksum}, got ${actual}`
        );
      }
    }

    try {
      await rename(tempPath, targetPath);
    } catch (error) {
      throw new DownloadError(
        "filesystem",
        `Could not move ${tempPath} into place: ${getErrorMessage(error)}`,
        { cause: error, retryable: false }
      );
    }
  }

  /**
   * Where to continue: a valid state wins, then the temp file's size.
   * An unusable state discards the partial file.
   */
  private async resumePoint(tempPath: string): Promise<ResumePoint> {
    let state: ResumeState | null;
    try {
      state = await this.store.load(tempPath);
    } catch (error) {
      this.logger.warn("Discarding unreadable resume state", { path: tempPath, error });
      await this.discard(tempPath);
      return { offset: 0, state: null };
    }

    if (state) {
      try {
        await this.validateOrRewind(state);
        return { offset: state.downloadedSize, state };
      } catch (error) {
        if (!(error instanceof ResumeStateError)) throw error;
        this.logger.debug("Resume state rejected", { path: tempPath, reason: error.reason });
        await this.discard(tempPath);
        return { offset: 0, state: null };
      }
    }

    return { offset: (await getFileSize(tempPath)) ?? 0, state: null };
  }

  /**
   * State is saved every `STATE_SAVE_INTERVAL` bytes, so an interrupted run
   * leaves a temp file longer than the recorded size. The bytes up to the
   * recorded size were flushed before that save; the tail is cut off and the
   * state validated again.
   */
  private async validateOrRewind(state: ResumeState): Promise<void> {
    try {
      await this.store.validate(state);
    } catch (error) {
      if (!(error instanceof ResumeStateError) || error.reason !== "size_mismatch") throw error;
      const size = await getFileSize(state.filePath);
      if (size === null || size < state.downloadedSize) throw error;

      this.logger.debug("Rewinding temp file to the saved state", {
        path: state.filePath,
        from: size,
        to: state.downloadedSize,
      });
      await truncate(state.filePath, state.downloadedSize);
      await this.store.validate(state);
    }
  }

  private async discard(path: string): Promise<void> {
    await removeFile(path);
    await this.store.delete(path);
  }

  // --------------------------------------------------------------------------
  // Livestream
  // --------------------------------------------------------------------------

  private async fetchSegment(url: string): Promise<Uint8Array> {
    const response = await this.http.get(url, {
      headers: { Referer: PLAYER_REFERER },
      throwHttpErrors: false,
    });
    if (!response.ok) {
      await response.body?.cancel();
      throw httpStatusError(response.status, url);
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    const declared = response.headers.get("content-length");
    if (declared !== null && Number(declared) !== bytes.length) {
      throw new DownloadError(
        "corruption",
        `Segment truncated: expected ${declared} bytes, got ${bytes.length}`
      );
    }
    return bytes;
  }

  private async loadLivestreamState(
    targetPath: string,
    segmentUrls: readonly string[],
    sourceUrl: string
  ): Promise<ResumeState> {
    let existing: ResumeState | null = null;
    try {
      existing = await this.store.load(targetPath);
      if (existing) {
        await this.store.validate(existing);
      }
    } catch (error) {
      this.logger.debug("Starting livestream from the first segment", {
        path: targetPath,
        error,
      });
      existing = null;
    }

    if (existing && existing.segments.length === segmentUrls.length) {
      const done = existing.segments.filter((s) => s.completed).length;
      this.logger.info(`Resuming livestream at segment ${done + 1}/${segmentUrls.length}`);
      // Signed segment URLs change between sessions.
      return {
        ...existing,
        segments: existing.segments.map((s, i) => ({ ...s, url: segmentUrls[i] ?? s.url })),
      };
    }

    await writeFile(targetPath, new Uint8Array(0));
    const fresh = this.store.createInitialState(targetPath, sourceUrl, 0);
    return this.store.save({
      ...fresh,
      segments: segmentUrls.map((url, index) => ({
        index,
        url,
        size: 0,
        checksum: "",
        completed: false,
      })),
    });
  }
}

/**
 * Full resource size from `Content-Range` or `Content-Length`, or 0 when unknown.
 */
export function totalSizeFrom(headers: Headers, offset: number): number {
  const range = headers.get("content-range");
  const rangeTotal = range ? /\/(\d+)$/.exec(range)?.[1] : undefined;
  if (rangeTotal !== undefined) return Number(rangeTotal);

  const length = headers.get("content-length");
  return length !== null && /^\d+$/.test(length) ? offset + Number(length) : 0;
}

import type { DownloadPhase, ProgressCallback } from "./shared/types.js";

/** Minimum gap between two progress updates. */
export const PROGRESS_INTERVAL_MS = 200;

export interface ProgressTrackerOptions {
  /** Bytes already on disk when the transfer starts. */
  startBytes?: number | undefined;
  phase?: DownloadPhase | undefined;
  now?: (() => number) | undefined;
}

/**
 * Counts transferred bytes and reports percent and throughput, at most once
 * per interval. `finish` always reports.
 */
export class ProgressTracker {
  private readonly now: () => number;
  private readonly phase: DownloadPhase;
  private downloaded: number;
  private lastReportAt: number;
  private lastReportBytes: number;

  constructor(
    private readonly totalBytes: number,
    private readonly onProgress: ProgressCallback | undefined,
    options: ProgressTrackerOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.phase = options.phase ?? "downloading";
    this.downloaded = options.startBytes ?? 0;
    this.lastReportAt = this.now();
    this.lastReportBytes = this.downloaded;
  }

  get bytes(): number {
    return this.downloaded;
  }

  advance(bytes: number): void {
    this.downloaded += bytes;
    if (!this.onProgress) return;
    if (this.now() - this.lastReportAt >= PROGRESS_INTERVAL_MS) {
      this.report();
    }
  }

  finish(): void {
    if (this.onProgress) this.report();
  }

  private report(): void {
    const at = this.now();
    const elapsed = at - this.lastReportAt;
    const bytesPerSecond =
      elapsed > 0 ? Math.round(((this.downloaded - this.lastReportBytes) * 1000) / elapsed) : 0;

    this.onProgress?.({
      percent: this.totalBytes > 0 ? Math.min(100, (this.downloaded / this.totalBytes) * 100) : 0,
      phase: this.phase,
      downloadedBytes: this.downloaded,
      totalBytes: this.totalBytes > 0 ? this.totalBytes : undefined,
      bytesPerSecond,
    });

    this.lastReportAt = at;
    this.lastReportBytes = this.downloaded;
  }
}

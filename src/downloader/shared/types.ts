/**
 * Shared types for the transfer pipeline.
 */

// ============================================================================
// Progress Types
// ============================================================================

/**
 * Download phase indicators.
 */
export type DownloadPhase = "downloading" | "decrypting" | "muxing";

/**
 * Unified progress callback payload.
 * Supports both byte-based and segment-based progress tracking.
 */
export interface DownloadProgress {
  /** Progress percentage (0-100) */
  percent: number;
  phase?: DownloadPhase | undefined;
  downloadedBytes?: number | undefined;
  /** Total bytes to download (if known) */
  totalBytes?: number | undefined;
  /** Throughput since the previous update */
  bytesPerSecond?: number | undefined;
  /** Segments appended (livestreams) */
  downloadedSegments?: number | undefined;
  totalSegments?: number | undefined;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

// ============================================================================
// Media Metadata
// ============================================================================

/**
 * One chapter of a video, as delivered by the catalog.
 */
export interface ChapterMark {
  startSeconds: number;
  title: string;
}

/**
 * Tags written into the final container.
 */
export interface TrackMetadata {
  title: string;
  artist: string;
  album: string;
  trackNumber?: number | undefined;
  year?: string | undefined;
}

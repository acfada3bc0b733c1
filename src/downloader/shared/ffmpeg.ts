/**
 * ffmpeg finalization: remuxing without re-encoding, chapters and tags.
 */
import { basename, dirname, extname, join } from "node:path";
import { execa } from "execa";
import { DownloadError, getErrorCode, getErrorMessage } from "../../shared/errors.js";
import { removeFile, rename, writeFile } from "../../shared/fs.js";
import type { Logger } from "../../shared/logger.js";
import type { ChapterMark, TrackMetadata } from "./types.js";

// ============================================================================
// Arguments
// ============================================================================

export interface MuxArgsOptions {
  chaptersPath?: string | undefined;
  metadata?: TrackMetadata | undefined;
}

function metadataArgs(metadata: TrackMetadata): string[] {
  const args: string[] = [];
  if (metadata.title) args.push("-metadata", `title=${metadata.title}`);
  if (metadata.artist) args.push("-metadata", `artist=${metadata.artist}`);
  if (metadata.album) args.push("-metadata", `album=${metadata.album}`);
  if (metadata.trackNumber !== undefined && metadata.trackNumber > 0) {
    args.push("-metadata", `track=${metadata.trackNumber}`);
  }
  if (metadata.year) args.push("-metadata", `year=${metadata.year}`);
  return args;
}

/**
 * Arguments for one codec-copy ffmpeg call. `input` is a path or `pipe:`.
 */
export function buildMuxArgs(input: string, outputPath: string, options: MuxArgsOptions = {}): string[] {
  const args = ["-hide_banner", "-y", "-i", input];
  if (options.chaptersPath) {
    args.push("-f", "ffmetadata", "-i", options.chaptersPath, "-map_metadata", "1");
  }
  if (options.metadata) {
    args.push(...metadataArgs(options.metadata));
  }
  args.push("-c", "copy", outputPath);
  return args;
}

/**
 * `dir/name.ext` becomes `dir/name.tmp.ext`, keeping the extension ffmpeg
 * picks the container from.
 */
export function tempOutputPath(outputPath: string): string {
  const ext = extname(outputPath);
  return join(dirname(outputPath), `${basename(outputPath, ext)}.tmp${ext}`);
}

// ============================================================================
// Chapters
// ============================================================================

/**
 * Renders chapters as an FFMETADATA1 document with whole-second bounds.
 * A chapter whose successor starts at or before it is dropped.
 */
export function formatChapterMetadata(chapters: readonly ChapterMark[], durationSeconds: number): string {
  let text = ";FFMETADATA1\n";

  chapters.forEach((chapter, i) => {
    const next = chapters[i + 1];
    let end: number;
    if (next) {
      if (next.startSeconds <= chapter.startSeconds) return;
      end = Math.round(next.startSeconds) - 1;
    } else {
      end = durationSeconds;
    }

    text += "\n[CHAPTER]\nTIMEBASE=1/1\n";
    text += `START=${Math.round(chapter.startSeconds)}\n`;
    text += `END=${end}\n`;
    text += `TITLE=${chapter.title}\n`;
  });

  return text;
}

// ============================================================================
// Output Parsing
// ============================================================================

/**
 * Reads the `Duration:` line of ffmpeg's input summary.
 * @returns Whole seconds, rounded, or null if not found.
 */
export function parseFfmpegDuration(output: string): number | null {
  const match = /Duration:\s*(\d+):(\d{2}):(\d{2})(?:\.(\d+))?/.exec(output);
  if (!match) return null;

  const [, hours = "0", mins = "0", secs = "0", fraction = "0"] = match;
  return Math.round(
    parseInt(hours, 10) * 3600 +
      parseInt(mins, 10) * 60 +
      parseInt(secs, 10) +
      parseFloat(`0.${fraction}`)
  );
}

/**
 * Maps ffmpeg's stderr and spawn error onto the download taxonomy.
 */
export function classifyFfmpegError(stderr: string, error?: unknown): DownloadError {
  const detail = `${stderr}\n${error === undefined ? "" : getErrorMessage(error)}`;
  const message = `ffmpeg failed: ${lastLine(stderr) ?? getErrorMessage(error)}`;
  const options = { cause: error };

  if (
    getErrorCode(error) === "ENOENT" ||
    detail.includes("ENOENT") ||
    detail.includes("No such file or directory")
  ) {
    return new DownloadError("external_tool", message, {
      ...options,
      retryable: false,
      suggestion: "Install ffmpeg or point ffmpegPath at it.",
    });
  }
  if (detail.includes("Permission denied")) {
    return new DownloadError("filesystem", message, options);
  }
  if (detail.includes("Invalid data found") || detail.includes("corrupt")) {
    return new DownloadError("corruption", message, { ...options, retryable: true });
  }
  if (detail.includes("No space left on device")) {
    return new DownloadError("disk_space", message, options);
  }
  if (detail.includes("Cannot load") || detail.includes("Unsupported codec")) {
    return new DownloadError("corruption", message, { ...options, retryable: true });
  }
  return new DownloadError("external_tool", message, { ...options, retryable: false });
}

function lastLine(text: string): string | undefined {
  const lines = text.split("\n").map((line) => line.trim()).filter(Boolean);
  return lines.at(-1);
}

function stderrOf(error: unknown): string {
  if (error instanceof Error && "stderr" in error && typeof error.stderr === "string") {
    return error.stderr;
  }
  return "";
}

// ============================================================================
// Finalizer
// ============================================================================

export interface MuxRequest extends MuxArgsOptions {
  /** A file path, or the assembled stream piped through stdin. */
  source: string | Uint8Array;
  outputPath: string;
}

export class Finalizer {
  constructor(
    private readonly ffmpegPath: string,
    private readonly logger: Logger
  ) {}

  /* v8 ignore start */
  async isAvailable(): Promise<boolean> {
    try {
      await execa(this.ffmpegPath, ["-version"]);
      return true;
    } catch {
      return false;
    }
  }
  /* v8 ignore stop */

  /**
   * Remuxes into a temp name next to `outputPath`, then renames it into place.
   */
  async mux(request: MuxRequest): Promise<void> {
    const tempPath = tempOutputPath(request.outputPath);
    const { source } = request;

    try {
      if (typeof source === "string") {
        await this.run(buildMuxArgs(source, tempPath, request));
      } else {
        await this.run(buildMuxArgs("pipe:", tempPath, request), source);
      }
    } catch (error) {
      await removeFile(tempPath);
      throw classifyFfmpegError(stderrOf(error), error);
    }

    try {
      await rename(tempPath, request.outputPath);
    } catch (error) {
      await removeFile(tempPath);
      throw new DownloadError("filesystem", `Could not move ${tempPath} into place`, {
        cause: error,
        retryable: false,
      });
    }
  }

  private async run(args: string[], input?: Uint8Array): Promise<void> {
    this.logger.debug("Running ffmpeg", { args: args.join(" ") });
    if (input) {
      await execa(this.ffmpegPath, args, { input });
    } else {
      await execa(this.ffmpegPath, args, { stdin: "ignore" });
    }
  }

  /**
   * Duration of a media file in whole seconds.
   */
  /* v8 ignore start */
  async readDuration(path: string): Promise<number> {
    // Without an output file ffmpeg exits 1 after printing the input summary.
    const result = await execa(this.ffmpegPath, ["-hide_banner", "-i", path], {
      reject: false,
      stdin: "ignore",
    });
    if (result.failed && getErrorCode(result) === "ENOENT") {
      throw classifyFfmpegError("", result);
    }

    const duration = parseFfmpegDuration(result.stderr);
    if (duration === null) {
      throw new DownloadError("external_tool", `Could not read the duration of ${path}`, {
        retryable: false,
      });
    }
    return duration;
  }
  /* v8 ignore stop */

  async writeChapters(chapters: readonly ChapterMark[], durationSeconds: number, path: string): Promise<void> {
    await writeFile(path, formatChapterMetadata(chapters, durationSeconds));
  }
}

/**
 * Persisted resume state for interrupted transfers.
 *
 * One JSON file per target, named by the MD5 of the target's absolute path.
 * Writes go through a temp file and a rename.
 */
import { createHash } from "node:crypto";
import { readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { ResumeStateError, getErrorCode } from "../shared/errors.js";
import { ensureDir, getFileSize, readFile, removeFile, stat, writeFileAtomic } from "../shared/fs.js";

// ============================================================================
// Schema
// ============================================================================

export const segmentStateSchema = z.object({
  index: z.number().int().nonnegative(),
  url: z.string(),
  size: z.number().int().nonnegative(),
  checksum: z.string(),
  completed: z.boolean(),
});

export const resumeStateSchema = z.object({
  filePath: z.string(),
  url: z.string(),
  totalSize: z.number().int().nonnegative(),
  downloadedSize: z.number().int().nonnegative(),
  etag: z.string(),
  checksum: z.string(),
  segments: z.array(segmentStateSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type SegmentState = z.infer<typeof segmentStateSchema>;
export type ResumeState = z.infer<typeof resumeStateSchema>;

export const STATE_FILE_SUFFIX = ".resume.json";

/** A state last saved longer ago than this is not resumed. */
export const RESUME_FRESHNESS_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Store
// ============================================================================

export interface ResumeStateStoreOptions {
  now?: (() => Date) | undefined;
}

export class ResumeStateStore {
  private readonly now: () => Date;

  constructor(
    readonly stateDir: string,
    options: ResumeStateStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  createInitialState(filePath: string, url: string, totalSize: number): ResumeState {
    const timestamp = this.now().toISOString();
    return {
      filePath: resolve(filePath),
      url,
      totalSize,
      downloadedSize: 0,
      etag: "",
      checksum: "",
      segments: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  statePathFor(filePath: string): string {
    const hash = createHash("md5").update(resolve(filePath)).digest("hex");
    return join(this.stateDir, `${hash}${STATE_FILE_SUFFIX}`);
  }

  /**
   * Writes the state with a fresh `updatedAt` and returns what was written.
   */
  async save(state: ResumeState): Promise<ResumeState> {
    const saved: ResumeState = {
      ...state,
      segments: state.segments.map((segment) => ({ ...segment })),
      updatedAt: this.now().toISOString(),
    };
    await ensureDir(this.stateDir);
    await writeFileAtomic(this.statePathFor(saved.filePath), JSON.stringify(saved, null, 2));
    return saved;
  }

  /**
   * Returns null when no state exists. A file that is not a valid state throws.
   */
  async load(filePath: string): Promise<ResumeState | null> {
    let raw: string;
    try {
      raw = await readFile(this.statePathFor(filePath), "utf-8");
    } catch (error) {
      if (getErrorCode(error) === "ENOENT") return null;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Corrupt resume state for ${filePath}`, { cause: error });
    }

    const parsed = resumeStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Invalid resume state for ${filePath}: ${z.prettifyError(parsed.error)}`);
    }
    return parsed.data;
  }

  async delete(filePath: string): Promise<void> {
    await removeFile(this.statePathFor(filePath));
  }

  /**
   * Throws ResumeStateError unless the file on disk matches the state and the
   * state is fresh.
   */
  async validate(state: ResumeState): Promise<void> {
    const size = await getFileSize(state.filePath);
    if (size === null) {
      throw new ResumeStateError("missing_file", `Partial file is missing: ${state.filePath}`);
    }
    if (size !== state.downloadedSize) {
      throw new ResumeStateError(
        "size_mismatch",
        `Partial file is ${size} bytes but the state records ${state.downloadedSize}`
      );
    }

    const age = this.now().getTime() - Date.parse(state.updatedAt);
    if (!(age <= RESUME_FRESHNESS_MS)) {
      throw new ResumeStateError("stale", `Resume state is older than 24 hours (${state.updatedAt})`);
    }
  }

  /**
   * Removes state files last modified more than `maxAgeMs` ago. Returns how many were removed.
   */
  async cleanupOlderThan(maxAgeMs: number): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.stateDir);
    } catch (error) {
      if (getErrorCode(error) === "ENOENT") return 0;
      throw error;
    }

    const cutoff = this.now().getTime() - maxAgeMs;
    let removed = 0;
    for (const entry of entries) {
      if (!entry.endsWith(STATE_FILE_SUFFIX)) continue;
      const path = join(this.stateDir, entry);
      const stats = await stat(path);
      if (stats.mtimeMs < cutoff && (await removeFile(path))) {
        removed++;
      }
    }
    return removed;
  }
}

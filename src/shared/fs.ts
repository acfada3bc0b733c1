import { access, mkdir, rename, stat, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { getErrorCode } from "./errors.js";

const isMissing = (error: unknown): boolean => getErrorCode(error) === "ENOENT";

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

/**
 * Writes a file, creating parent directories first.
 */
export async function outputFile(path: string, data: string | Uint8Array): Promise<void> {
  await ensureDir(dirname(path));
  await writeFile(path, data);
}

/**
 * Writes through a sibling temp file and renames it into place,
 * so readers never see a partial file.
 */
export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  const tempPath = `${path}.${process.pid}.tmp`;
  await outputFile(tempPath, data);
  try {
    await rename(tempPath, path);
  } catch (error) {
    await removeFile(tempPath);
    throw error;
  }
}

/**
 * Deletes a file. Returns false when it was already gone; other failures propagate.
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

/**
 * Size in bytes, or null when the file does not exist.
 */
export async function getFileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
}

/**
 * Path of an intermediate file next to `path`, sharing its name without the extension.
 *
 * @example
 * siblingPath("dir/01. Intro.m4a", ".enc.ts")
 * // => "dir/01. Intro.enc.ts"
 */
export function siblingPath(path: string, suffix: string): string {
  return join(dirname(path), `${basename(path, extname(path))}${suffix}`);
}

export { readFile, rename, stat, writeFile } from "node:fs/promises";

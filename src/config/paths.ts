import { homedir } from "node:os";
import { join, resolve } from "node:path";
import untildify from "untildify";

/** Settings and resume state live under ~/.tapevault/. */
export const APP_DIR = join(homedir(), ".tapevault");
export const RESUME_DIR = join(APP_DIR, "resume");

/**
 * Expands a leading `~` and resolves the result against the working directory.
 * Resume state is keyed by absolute path, so output paths are always made absolute.
 */
export function expandPath(path: string): string {
  return resolve(untildify(path));
}

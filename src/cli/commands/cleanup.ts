import chalk from "chalk";
import { ensureAppDirectories } from "../../config/configManager.js";
import { RESUME_DIR } from "../../config/paths.js";
import { RESUME_FRESHNESS_MS, ResumeStateStore } from "../../downloader/resumeStore.js";

export interface CleanupOptions {
  maxAge?: number | undefined;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Removes resume state files that can no longer be resumed.
 */
export async function cleanupCommand(options: CleanupOptions): Promise<void> {
  const maxAgeMs = options.maxAge === undefined ? RESUME_FRESHNESS_MS : options.maxAge * HOUR_MS;
  if (!Number.isFinite(maxAgeMs) || maxAgeMs < 0) {
    console.log(chalk.red(`\n❌ Invalid max age: ${String(options.maxAge)}\n`));
    process.exit(1);
  }

  await ensureAppDirectories();
  const store = new ResumeStateStore(RESUME_DIR);
  const removed = await store.cleanupOlderThan(maxAgeMs);

  console.log(chalk.blue("\n🧹 Resume state cleanup\n"));
  console.log(chalk.gray(`   Directory: ${RESUME_DIR}`));
  if (removed === 0) {
    console.log(chalk.green("   ✓ Nothing to remove\n"));
  } else {
    console.log(chalk.green(`   ✓ Removed ${removed} stale state file(s)\n`));
  }
}

import chalk from "chalk";
import cliProgress from "cli-progress";
import ora from "ora";
import { ApiClient } from "../../api/client.js";
import { collectInputUrls } from "../../catalog/inputs.js";
import { ensureAppDirectories, loadConfig } from "../../config/configManager.js";
import { RESUME_DIR } from "../../config/paths.js";
import { resolveSettings } from "../../config/settings.js";
import { ManifestResolver } from "../../downloader/hls/manifest.js";
import { ResumeStateStore } from "../../downloader/resumeStore.js";
import { Finalizer } from "../../downloader/shared/ffmpeg.js";
import type { DownloadProgress } from "../../downloader/shared/types.js";
import { TransferEngine } from "../../downloader/transfer.js";
import { Processor } from "../../processor/processor.js";
import { getErrorMessage } from "../../shared/errors.js";
import { formatBytes, formatSpeed } from "../../shared/format.js";
import { createHttpClient } from "../../shared/http.js";
import { createConsoleLogger } from "../../shared/logger.js";
import { createShutdownManager } from "../../shared/shutdown.js";

export interface DownloadOptions {
  format?: number | undefined;
  videoFormat?: number | undefined;
  output?: string | undefined;
  forceVideo?: boolean | undefined;
  skipVideos?: boolean | undefined;
  skipChapters?: boolean | undefined;
  tagAudio?: boolean | undefined;
  verbose?: boolean | undefined;
}

const PHASE_LABELS = {
  decrypting: "Decrypting...",
  muxing: "Muxing...",
} as const;

function describeTransfer(progress: DownloadProgress): string {
  if (progress.phase === "decrypting" || progress.phase === "muxing") {
    return PHASE_LABELS[progress.phase];
  }

  const parts: string[] = [];
  if (progress.totalSegments !== undefined) {
    parts.push(`${progress.downloadedSegments ?? 0}/${progress.totalSegments} segments`);
  } else if (progress.totalBytes) {
    parts.push(`${formatBytes(progress.downloadedBytes ?? 0)} of ${formatBytes(progress.totalBytes)}`);
  } else if (progress.downloadedBytes !== undefined) {
    parts.push(formatBytes(progress.downloadedBytes));
  }
  if (progress.bytesPerSecond) {
    parts.push(formatSpeed(progress.bytesPerSecond));
  }
  return parts.join(" | ");
}

/**
 * Downloads every release, video and playlist the given URLs point to.
 */
export async function downloadCommand(urls: string[], options: DownloadOptions): Promise<void> {
  const settings = resolveSettings(loadConfig(), {
    format: options.format,
    videoFormat: options.videoFormat,
    outPath: options.output,
    forceVideo: options.forceVideo,
    skipVideos: options.skipVideos,
    skipChapters: options.skipChapters,
    tagAudio: options.tagAudio,
  });

  const inputs = await collectInputUrls(urls);
  if (inputs.length === 0) {
    console.log(chalk.yellow("\n⚠️  No URLs to process.\n"));
    return;
  }

  await ensureAppDirectories();
  const logger = createConsoleLogger({ level: options.verbose ? "debug" : "info" });
  const http = createHttpClient({ timeout: settings.requestTimeoutMs });

  const finalizer = new Finalizer(settings.ffmpegPath, logger);
  if (!(await finalizer.isAvailable())) {
    console.log(chalk.red(`\n❌ ffmpeg not found at "${settings.ffmpegPath}"`));
    console.log(chalk.gray("   Install ffmpeg or run: tapevault config set ffmpegPath <path>\n"));
    process.exit(1);
  }

  const client = new ApiClient({
    http,
    logger,
    clientId: settings.apiClientId,
    developerKey: settings.apiDeveloperKey,
  });

  const spinner = ora("Signing in...").start();
  try {
    const session = await client.signIn({
      email: settings.email,
      password: settings.password,
      token: settings.token,
    });
    spinner.succeed(`Signed in successfully - ${session.planDescription}`);
  } catch (error) {
    spinner.fail("Sign-in failed");
    console.log(chalk.red(`\n❌ ${getErrorMessage(error)}`));
    console.log(chalk.gray("   Check your credentials with: tapevault config show\n"));
    process.exit(1);
  }

  const shutdown = createShutdownManager();
  shutdown.setup();

  let progressBar: cliProgress.SingleBar | undefined;
  shutdown.registerCleanup(() => progressBar?.stop());

  const processor = new Processor({
    catalog: client,
    resolver: new ManifestResolver(http, logger),
    transfer: new TransferEngine({
      http,
      store: new ResumeStateStore(RESUME_DIR),
      logger,
      maxRetries: settings.maxRetries,
    }),
    finalizer,
    http,
    logger,
    settings,
    shouldContinue: shutdown.shouldContinue,
    events: {
      transferStarted: (label) => {
        progressBar = new cliProgress.SingleBar(
          {
            format: "   {bar} {percentage}% | {label} | {status}",
            barCompleteChar: "█",
            barIncompleteChar: "░",
            barsize: 30,
            hideCursor: true,
          },
          cliProgress.Presets.shades_grey
        );
        progressBar.start(100, 0, { label, status: "Starting..." });
      },
      progress: (progress) => {
        progressBar?.update(Math.floor(progress.percent), { status: describeTransfer(progress) });
      },
      transferFinished: () => {
        progressBar?.stop();
        progressBar = undefined;
      },
    },
  });

  console.log(chalk.blue(`\n🎵 Processing ${inputs.length} URL(s)\n`));
  const summary = await processor.run(inputs);

  console.log(chalk.blue("\n📊 Summary\n"));
  console.log(chalk.green(`   ✓ Completed: ${summary.completed}`));
  if (summary.failed > 0) {
    console.log(chalk.red(`   ✗ Failed: ${summary.failed}`));
  }
  if (summary.skipped > 0) {
    console.log(chalk.yellow(`   ⏭  Skipped: ${summary.skipped}`));
  }
  if (summary.invalid.length > 0) {
    console.log(chalk.yellow(`   ⚠️  Invalid URLs: ${summary.invalid.length}`));
  }

  if (summary.errors.length > 0) {
    console.log(chalk.red("\n   Errors:"));
    for (const { id, error } of summary.errors) {
      console.log(chalk.gray(`   - ${id}: ${error}`));
    }
  }
  console.log();

  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

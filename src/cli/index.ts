#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { cleanupCommand, type CleanupOptions } from "./commands/cleanup.js";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { downloadCommand, type DownloadOptions } from "./commands/download.js";

// Global error handler to ensure clean exit
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("\n❌ Unhandled error"));
  if (reason instanceof Error) {
    console.error(chalk.gray(`   ${reason.message}`));
  }
  process.exit(1);
});

// Helper to wrap async actions and handle errors
function wrapAction<T extends unknown[]>(fn: (...args: T) => Promise<void>): (...args: T) => void {
  return (...args: T) => {
    fn(...args).catch((error: unknown) => {
      console.error(chalk.red("\n❌ Command failed"));
      if (error instanceof Error) {
        console.error(chalk.gray(`   ${error.message}`));
      }
      process.exit(1);
    });
  };
}

const program = new Command();

program
  .name("tapevault")
  .description("Download concerts, webcasts and playlists from nugs.net for offline listening")
  .version("0.1.0");

program
  .command("download <urls...>")
  .description("Download releases, videos, artists and playlists (URLs or .txt files of URLs)")
  .option("-f, --format <n>", "Audio format: 1 ALAC, 2 FLAC, 3 MQA, 4 360 Reality Audio, 5 AAC", parseInt)
  .option("-v, --video-format <n>", "Video format: 1 480p, 2 720p, 3 1080p, 4 1440p, 5 4K", parseInt)
  .option("-o, --output <dir>", "Output directory")
  .option("--force-video", "Download the video even when the release has audio tracks")
  .option("--skip-videos", "Skip video downloads")
  .option("--skip-chapters", "Don't embed chapters in videos")
  .option("--tag-audio", "Write title, album and artist tags into audio files")
  .option("--verbose", "Show debug output")
  .action(wrapAction((urls: string[], options: DownloadOptions) => downloadCommand(urls, options)));

program
  .command("cleanup")
  .description("Remove stale resume state left by interrupted downloads")
  .option("--max-age <hours>", "Remove state older than this many hours (default: 24)", parseFloat)
  .action(wrapAction((options: CleanupOptions) => cleanupCommand(options)));

// Config commands
const configCmd = program.command("config").description("Manage configuration");

configCmd.command("show").description("Show all configuration values").action(configShowCommand);

configCmd.command("get <key>").description("Get a configuration value").action(configGetCommand);

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(configSetCommand);

// Parse and run
program.parse();

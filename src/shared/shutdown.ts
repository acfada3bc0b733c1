/**
 * Signal handling for the download command.
 *
 * Transfers are never interrupted mid-copy: the first signal lets the current
 * item finish and stops the batch before the next one. A second signal runs the
 * registered cleanup and exits immediately.
 */
import chalk from "chalk";

export type ShutdownSignal = "SIGINT" | "SIGTERM";

export interface ShutdownManager {
  /** Installs the signal handlers. Call once at command start. */
  setup: () => void;
  /** False once a signal arrived. Passed to the batch queue. */
  shouldContinue: () => boolean;
  /** Adds a callback to the chain run before a forced exit. */
  registerCleanup: (fn: () => void | Promise<void>) => void;
  isShuttingDown: () => boolean;
}

export interface ShutdownOptions {
  /** Subscribes to a signal. Defaults to `process.on`. */
  listen?: ((signal: ShutdownSignal, handler: () => void) => void) | undefined;
  /** Defaults to `process.exit`. */
  exit?: ((code: number) => void) | undefined;
  /** Sink for the notices. Defaults to `console.log`. */
  write?: ((line: string) => void) | undefined;
}

const SIGNALS: readonly ShutdownSignal[] = ["SIGINT", "SIGTERM"];

/**
 * @example
 * ```typescript
 * const shutdown = createShutdownManager();
 * shutdown.setup();
 * shutdown.registerCleanup(() => progressBar?.stop());
 *
 * await queue.process(handler, { shouldContinue: shutdown.shouldContinue });
 * ```
 */
export function createShutdownManager(options: ShutdownOptions = {}): ShutdownManager {
  const listen =
    options.listen ??
    ((signal: ShutdownSignal, handler: () => void) => {
      process.on(signal, handler);
    });
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const write = options.write ?? ((line: string) => console.log(line));

  let shuttingDown = false;
  const cleanups: (() => void | Promise<void>)[] = [];

  const forceExit = async (): Promise<void> => {
    write(chalk.red("\n\n⚠️  Force exit"));
    for (const cleanup of cleanups) {
      try {
        await cleanup();
      } catch (error) {
        write(chalk.gray(`   Cleanup failed: ${String(error)}`));
      }
    }
    exit(1);
  };

  const onSignal = async (signal: ShutdownSignal): Promise<void> => {
    if (shuttingDown) {
      await forceExit();
      return;
    }

    shuttingDown = true;
    write(chalk.yellow(`\n\n⏹️  ${signal} received, finishing the current item...`));
    write(chalk.gray("   Press Ctrl+C again to abort immediately."));
  };

  return {
    setup: () => {
      for (const signal of SIGNALS) {
        listen(signal, () => void onSignal(signal));
      }
    },
    shouldContinue: () => !shuttingDown,
    isShuttingDown: () => shuttingDown,
    registerCleanup: (fn) => {
      cleanups.push(fn);
    },
  };
}

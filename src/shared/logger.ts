import { Chalk, type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

/**
 * Logging handle passed into every component at construction time.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel | undefined;
  colors?: boolean | undefined;
  /** Sink for rendered lines. Defaults to stderr. */
  write?: ((line: string) => void) | undefined;
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === "string") return value;
  return JSON.stringify(value) ?? String(value);
}

export function formatContext(context: LogContext): string {
  return Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
}

function renderLine(chalk: ChalkInstance, level: LogLevel, message: string): string {
  switch (level) {
    case "debug":
      return chalk.gray(message);
    case "info":
      return message;
    case "warn":
      return chalk.yellow(`⚠️  ${message}`);
    case "error":
      return chalk.red(`❌ ${message}`);
  }
}

/**
 * Creates a logger that renders chalk-colored lines.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const chalk: ChalkInstance = options.colors === false ? new Chalk({ level: 0 }) : new Chalk();

  const emit = (entryLevel: LogLevel, message: string, context: LogContext = {}): void => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) return;

    const line = renderLine(chalk, entryLevel, message);
    const rendered = formatContext(context);
    write(rendered ? `${line} ${chalk.gray(rendered)}` : line);
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
  };
}

/**
 * A logger that drops everything.
 */
export function createSilentLogger(): Logger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
  };
}

/**
 * logger.ts - Leveled diagnostic logging
 *
 * What this file does:
 * Provides the debug log that sits next to (not instead of) the terminal UI.
 * The UI tells the user what's happening; the log records details for
 * troubleshooting: requirement snapshots, file paths, LLM responses.
 *
 * There is no global logger. createLogger() builds one from CLI options and
 * the orchestrator passes it down to every phase and provider, so tests can
 * hand in a silent or recording logger without touching process state.
 *
 * Output format (one line per entry):
 *   2025-01-01T00:00:00.000Z INFO  Saved deployment file file=out/x.yaml
 */

import * as fs from "fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Structured fields rendered as key=value after the message. */
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  /** Logging is off unless explicitly enabled. */
  enabled?: boolean;
  /** Minimum level written. Defaults to "info". */
  level?: LogLevel;
  /** Append to this file instead of stderr. */
  file?: string;
  /** Injectable sink for testing. Receives fully formatted lines. */
  write?: (line: string) => void;
  /** Injectable clock for testing. */
  now?: () => Date;
}

/**
 * Type guard for user-supplied level strings (from --log-level).
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Renders a field value the way it should read in a log line.
 * Strings with spaces are quoted; objects become JSON.
 */
function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Formats a single log line. Exported for unit testing.
 */
export function formatLogLine(
  time: Date,
  level: LogLevel,
  message: string,
  fields?: LogFields
): string {
  const parts = [time.toISOString(), level.toUpperCase().padEnd(5), message];
  for (const [key, value] of Object.entries(fields ?? {})) {
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(" ");
}

/**
 * Creates a logger from options.
 *
 * @param options - Enablement, level, destination
 * @returns A Logger; a no-op one when logging is disabled
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  if (!options.enabled) return silentLogger;

  const minLevel = LEVEL_ORDER[options.level ?? "info"];
  const now = options.now ?? (() => new Date());
  const file = options.file;
  const write =
    options.write ??
    (file
      ? (line: string) => fs.appendFileSync(file, line + "\n", "utf8")
      : (line: string) => process.stderr.write(line + "\n"));

  const log = (level: LogLevel) => (message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < minLevel) return;
    write(formatLogLine(now(), level, message, fields));
  };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

/** Discards everything. The default for tests and disabled logging. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

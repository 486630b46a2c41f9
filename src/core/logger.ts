/**
 * Global logger module for diagnostics and warnings.
 *
 * Ensures clean stdout/stderr separation:
 * - All diagnostic output goes to stderr (or the configured sink)
 * - Honors --quiet and --debug flags
 * - Version output on stdout is never polluted
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Receives every emitted line. Defaults to console.error.
 */
export type LogSink = (level: LogLevel, message: string) => void;

interface LoggerState {
  quiet: boolean;
  debug: boolean;
  sink: LogSink;
}

const consoleSink: LogSink = (_level, message) => {
  console.error(message);
};

const state: LoggerState = {
  quiet: false,
  debug: false,
  sink: consoleSink,
};

/**
 * Configure logger with global flags and an optional sink.
 */
export function configureLogger(options: {
  quiet?: boolean;
  debug?: boolean;
  sink?: LogSink;
}): void {
  // --quiet overrides --debug
  if (options.quiet) {
    state.quiet = true;
    state.debug = false;
  } else {
    state.quiet = false;
    state.debug = options.debug ?? false;
  }
  if (options.sink) {
    state.sink = options.sink;
  }
}

/**
 * Get current logger configuration.
 */
export function getLoggerState(): Readonly<{ quiet: boolean; debug: boolean }> {
  return { quiet: state.quiet, debug: state.debug };
}

/**
 * Reset logger to default state (for testing).
 */
export function resetLogger(): void {
  state.quiet = false;
  state.debug = false;
  state.sink = consoleSink;
}

/**
 * Log a warning message.
 * Suppressed by --quiet.
 */
export function warn(message: string): void {
  if (!state.quiet) {
    state.sink("warn", `WARN: ${message}`);
  }
}

/**
 * Log an info message.
 * Suppressed by --quiet.
 */
export function info(message: string): void {
  if (!state.quiet) {
    state.sink("info", message);
  }
}

/**
 * Log a debug message.
 * Only shown when --debug is enabled.
 */
export function debug(message: string): void {
  if (!state.quiet && state.debug) {
    state.sink("debug", `[DEBUG] ${message}`);
  }
}

/**
 * Log an error message.
 * Never suppressed (even with --quiet).
 */
export function error(message: string): void {
  state.sink("error", message);
}

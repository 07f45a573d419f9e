/**
 * treesync — Log sinks.
 *
 * The engine reports through a Log so the CLI can colour it and tests can
 * record it. Each call writes exactly one line, so output from concurrent
 * work units never interleaves mid-line.
 */

import chalk from 'chalk';

export interface Log {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

// ─── Color tokens ────────────────────────────────────────────────────

export const C = {
  dim:     chalk.dim,
  bold:    chalk.bold,
  name:    chalk.cyan,
  path:    chalk.gray,
  success: chalk.green,
  warn:    chalk.yellow,
  error:   chalk.red,
};

export interface ConsoleLogOptions {
  /** Emit debug lines */
  verbose?: boolean;
  /** Write to this function instead of console.error */
  write?: (line: string) => void;
}

/** Console log for the CLI: everything goes to stderr so stdout stays parseable */
export function createConsoleLog(options: ConsoleLogOptions = {}): Log {
  const write = options.write ?? ((line: string) => console.error(line));
  return {
    info: (message) => write(message),
    warn: (message) => write(C.warn(`⚠ ${message}`)),
    error: (message) => write(C.error(`✗ ${message}`)),
    debug: (message) => {
      if (options.verbose) write(C.dim(message));
    },
  };
}

export const silentLog: Log = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export type LogLevel = keyof Log;

export interface LogRecord {
  level: LogLevel;
  message: string;
}

/** Log that keeps every line in memory, in call order */
export function createMemoryLog(): Log & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  const push = (level: LogLevel) => (message: string) => {
    records.push({ level, message });
  };
  return {
    records,
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    debug: push('debug'),
  };
}

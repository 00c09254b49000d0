/**
 * Logger Interface for Library Code
 *
 * Library code (the screen session, views, completion) accepts a Logger via
 * dependency injection. While a session owns the terminal nothing may print
 * to stdout/stderr, so sessions default to the silent logger and the CLI
 * swaps in a file logger when one is configured.
 */

import { appendFileSync } from 'node:fs';

/**
 * Generic logger interface for library code
 *
 * Designed to be compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Console logger for use outside a running session.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};

/**
 * Logger that appends timestamped lines to a file.
 *
 * Writes are synchronous so the log is complete even when the process
 * exits from inside a modal loop.
 *
 * @param path - File to append to (created if missing)
 * @param now - Clock, injectable for tests
 */
export function createFileLogger(path: string, now: () => Date = () => new Date()): Logger {
  const append = (level: string, message: string) => {
    appendFileSync(path, `${now().toISOString()} ${level} ${message}\n`, 'utf-8');
  };

  return {
    warn: (message: string) => append('WARN', message),
    debug: (message: string) => append('DEBUG', message),
  };
}

/**
 * Logger Interface for Library Code
 *
 * Library code (store, pipeline, ranking engine, providers) accepts a Logger
 * through its constructor. The CLI passes its CommandContext, tests pass
 * silentLogger or a mock.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log an informational message */
  info?: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  info: () => {},
  debug: () => {},
};

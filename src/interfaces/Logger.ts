/**
 * @description Logging port used by the stores, the importer and the CLI.
 * Implementations might log to the console or stay silent (tests).
 */
export interface Logger {
  /**
   * Log an info message (general progress updates)
   */
  info(message: string): void;

  warn(message: string): void;

  error(message: string): void;

  /**
   * Log a debug message (only shown in verbose mode)
   */
  debug(message: string): void;
}

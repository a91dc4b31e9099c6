import type { Logger } from '../interfaces';

export interface LoggerOptions {
  /** Show debug messages */
  verbose?: boolean;
}

/**
 * Standard console logger. Notices go to stdout, problems to stderr.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options?: LoggerOptions) {
    this.verbose = options?.verbose ?? false;
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }

  debug(message: string): void {
    if (this.verbose) console.log(message);
  }
}

/**
 * Logger that produces no output. Used for quiet mode or testing.
 */
export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
}

export function createLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}

export function createSilentLogger(): Logger {
  return new SilentLogger();
}

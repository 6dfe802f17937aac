import { Logger, LogLevel } from '@nestjs/common';

/**
 * `false` silences the library, a level list keeps only those levels,
 * `undefined` leaves the standard Nest logger in place.
 */
export type LoggingOptions = false | { level: LogLevel[] };

/**
 * Logger that filters log messages based on configured log levels
 */
class FilteredLogger extends Logger {
  private readonly enabledLevels: Set<LogLevel>;

  constructor(context: string, enabledLevels: LogLevel[]) {
    super(context);
    this.enabledLevels = new Set(enabledLevels);
  }

  log(message: any, ...optionalParams: any[]): void {
    if (this.enabledLevels.has('log')) {
      super.log(message, ...optionalParams);
    }
  }

  error(message: any, ...optionalParams: any[]): void {
    if (this.enabledLevels.has('error')) {
      super.error(message, ...optionalParams);
    }
  }

  warn(message: any, ...optionalParams: any[]): void {
    if (this.enabledLevels.has('warn')) {
      super.warn(message, ...optionalParams);
    }
  }

  debug(message: any, ...optionalParams: any[]): void {
    if (this.enabledLevels.has('debug')) {
      super.debug(message, ...optionalParams);
    }
  }

  verbose(message: any, ...optionalParams: any[]): void {
    if (this.enabledLevels.has('verbose')) {
      super.verbose(message, ...optionalParams);
    }
  }
}

/**
 * No-op logger that discards all log messages
 */
class NoOpLogger extends Logger {
  log(): void {}

  error(): void {}

  warn(): void {}

  debug(): void {}

  verbose(): void {}
}

/**
 * Creates the logger a service should use for the given logging configuration.
 * @param context - Logger context (typically the class name)
 */
export function createLogger(
  context: string,
  logging: LoggingOptions | undefined,
): Logger {
  if (logging === undefined) {
    return new Logger(context);
  }

  if (logging === false) {
    return new NoOpLogger(context);
  }

  return new FilteredLogger(context, logging.level);
}

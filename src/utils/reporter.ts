import type { Logger } from './logger.js';

/** Operator-facing output for an import run. */
export interface Reporter {
  /** Progress line. Silent in quiet mode. */
  info(message: string): void;
  /** A row was skipped. Silent in quiet mode. */
  warn(message: string): void;
  /** Advisory that is always shown, even in quiet mode. */
  advise(message: string): void;
}

export interface ReporterOptions {
  dryRun?: boolean;
  quiet?: boolean;
}

export function createReporter(logger: Logger, options: ReporterOptions = {}): Reporter {
  const prefix = options.dryRun ? '[DRY RUN] ' : '';
  const quiet = options.quiet ?? false;

  return {
    info(message) {
      if (!quiet) logger.info(prefix + message);
    },
    warn(message) {
      if (!quiet) logger.warn(prefix + message);
    },
    advise(message) {
      logger.warn(message);
    },
  };
}

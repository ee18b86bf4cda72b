/**
 * Logger interface for analysis runs.
 * Decouples the core from any particular terminal or CI integration.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Console logger that writes everything to stderr, so stdout stays free
 * for reports (e.g. `--format json`).
 *
 * Debug lines are dropped unless `verbose` is set.
 */
export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const verbose = options.verbose ?? false;
  return {
    info: (message: string) => console.error(`[info] ${message}`),
    warning: (message: string) => console.warn(`[warning] ${message}`),
    error: (message: string) => console.error(`[error] ${message}`),
    debug: (message: string) => {
      if (verbose) console.error(`[debug] ${message}`);
    },
  };
}

/** Logger that discards everything (tests, embedding) */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Logger interface for analysis runs.
 * Keeps the library free of any particular output channel so the CLI can
 * route diagnostics to stderr while rankings go to stdout.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Simple console-based logger.
 *
 * WARNING: writes info to stdout. When stdout carries a ranking,
 * use {@link createStderrLogger} instead.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`[info] ${message}`),
  warning: (message: string) => console.warn(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.debug(`[debug] ${message}`),
};

export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Logger that writes every level to stderr. Debug lines are dropped unless
 * `verbose` is set.
 */
export function createStderrLogger(options: { verbose?: boolean } = {}): Logger {
  const write = (level: string, message: string) => {
    process.stderr.write(`[${level}] ${message}\n`);
  };

  return {
    info: message => write('info', message),
    warning: message => write('warning', message),
    error: message => write('error', message),
    debug: message => {
      if (options.verbose) write('debug', message);
    },
  };
}

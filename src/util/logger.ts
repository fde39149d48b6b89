export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
};

/**
 * Console-backed logger used by the CLI. `debug` lines only appear with --verbose.
 */
export function createConsoleLogger(opts: { verbose?: boolean } = {}): Logger {
  return {
    // eslint-disable-next-line no-console
    info: (m) => console.log(m),
    // eslint-disable-next-line no-console
    warn: (m) => console.warn(m),
    // eslint-disable-next-line no-console
    error: (m) => console.error(m),
    debug: (m) => {
      // eslint-disable-next-line no-console
      if (opts.verbose) console.log(m);
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

/**
 * Diagnostic logging.
 *
 * Everything goes to stderr so stdout stays clean for piping paths and links
 * into other tools. Debug lines only appear with --verbose.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Line sink, defaults to console.error */
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const verbose = options.verbose === true;

  return {
    debug(message) {
      if (verbose) write(message);
    },
    info(message) {
      write(message);
    },
    warn(message) {
      write(`Warning: ${message}`);
    },
    error(message) {
      write(`Error: ${message}`);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ write: () => {} });

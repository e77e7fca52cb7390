/**
 * Minimal leveled logger for the command line surface. Library code never
 * logs; it returns values or throws.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Show debug messages */
  verbose: boolean;
  /** Program name used to prefix errors */
  name: string;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

/**
 * Create a logger that writes info lines to stdout unchanged, and debug and
 * error lines to stderr with a prefix.
 */
export function createLogger(options: LoggerOptions): Logger {
  const stdout = options.stdout ?? ((line: string) => console.log(line));
  const stderr = options.stderr ?? ((line: string) => console.error(line));

  return {
    debug(message) {
      if (options.verbose) stderr(`[debug] ${message}`);
    },
    info(message) {
      stdout(message);
    },
    error(message) {
      stderr(`${options.name}: ${message}`);
    },
  };
}

/**
 * Diagnostic logging.
 * Standard output carries the document, so every log line goes to stderr.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Emit debug and info lines */
  verbose?: boolean;
  /** Line sink, defaults to console.error */
  write?: (line: string) => void;
}

const PREFIX = "[feishu]";

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  return {
    debug(message) {
      if (verbose) write(`${PREFIX} debug: ${message}`);
    },
    info(message) {
      if (verbose) write(`${PREFIX} ${message}`);
    },
    warn(message) {
      write(`${PREFIX} warning: ${message}`);
    },
    error(message) {
      write(`${PREFIX} ${message}`);
    },
  };
}

export const silentLogger: Logger = createLogger({ write: () => {} });

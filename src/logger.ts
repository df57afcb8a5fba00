/**
 * Progress and warning output
 *
 * Everything goes to stderr so that a matrix written to stdout stays clean.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

/**
 * Console-backed logger; `quiet` drops info messages but keeps warnings
 */
export function createConsoleLogger(options: { quiet?: boolean } = {}): Logger {
  return {
    info: (message: string): void => {
      if (options.quiet !== true) {
        console.error(message);
      }
    },
    warn: (message: string): void => {
      console.warn(`Warning: ${message}`);
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
};

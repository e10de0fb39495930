/**
 * Logger interface for library code.
 *
 * Chunkers accept a logger through their options; CLI scripts use the
 * console logger and tests pass the silent one or a spy.
 */
export interface Logger {
  /** Progress messages */
  info: (message: string) => void;
  /** Recoverable problems, such as a fallback being taken */
  warn: (message: string) => void;
  /** Optional verbose output */
  debug?: (message: string) => void;
}

export const consoleLogger: Logger = {
  info: (message: string) => console.log(message),
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.debug(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};

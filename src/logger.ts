/**
 * Logging sink accepted by the session, listener and transport.
 *
 * `console` satisfies this interface and is the default everywhere.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  log(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const defaultLogger: Logger = console;

/**
 * Console logging with `[Component]` prefixes, passed into components as an
 * interface so tests and embedding applications can redirect it.
 */

export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createConsoleLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (message, ...details) =>
      console.log(`${prefix} ${message}`, ...details),
    warn: (message, ...details) =>
      console.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) =>
      console.error(`${prefix} ${message}`, ...details),
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
};

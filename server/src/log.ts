/* eslint-disable no-console */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const PREFIX = "[chess-server]";

/** Console-backed logger; `debug` lines only when enabled. */
export function createConsoleLogger(opts: { debug?: boolean } = {}): Logger {
  const debugEnabled = Boolean(opts.debug);
  return {
    debug: (message, ...details) => {
      if (debugEnabled) console.log(`${PREFIX} [debug] ${message}`, ...details);
    },
    info: (message, ...details) => console.log(`${PREFIX} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${PREFIX} ${message}`, ...details),
    error: (message, ...details) => console.error(`${PREFIX} ${message}`, ...details),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

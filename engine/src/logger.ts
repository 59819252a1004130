export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const PREFIX = "[geoaxis]";

export const consoleLogger: Logger = {
  debug: (message, ...details) => console.debug(`${PREFIX} ${message}`, ...details),
  warn: (message, ...details) => console.warn(`${PREFIX} ${message}`, ...details),
  error: (message, ...details) => console.error(`${PREFIX} ${message}`, ...details),
};

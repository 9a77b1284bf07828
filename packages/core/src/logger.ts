const PREFIX = "[fedikit]";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export const consoleLogger: Logger = {
  debug(message, ...details) {
    console.debug(`${PREFIX} ${message}`, ...details);
  },
  warn(message, ...details) {
    console.warn(`${PREFIX} ${message}`, ...details);
  },
};

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};

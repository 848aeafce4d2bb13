export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const PREFIX = '[rowcast]';

export const defaultLogger: Logger = {
  debug: (msg) => console.debug(`${PREFIX} ${msg}`),
  info: (msg) => console.log(`${PREFIX} ${msg}`),
  warn: (msg) => console.warn(`${PREFIX} ${msg}`),
  error: (msg) => console.error(`${PREFIX} ${msg}`),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

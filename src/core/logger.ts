export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const PREFIX = '[wiregraph]';

export const consoleLogger: Logger = {
  debug: (message, fields) => console.debug(PREFIX, message, fields ?? {}),
  info: (message, fields) => console.info(PREFIX, message, fields ?? {}),
  warn: (message, fields) => console.warn(PREFIX, message, fields ?? {}),
  error: (message, fields) => console.error(PREFIX, message, fields ?? {}),
};

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/** Short form of an id for log lines. */
export function shortId(id: string): string {
  return id.slice(0, 8);
}

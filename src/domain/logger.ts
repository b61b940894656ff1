export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = Record<LogLevel, (message: string, ...details: unknown[]) => void>;

const PREFIX = '[chess-core]';

export const consoleLogger: Logger = {
  debug: (message, ...details) => console.debug(`${PREFIX} ${message}`, ...details),
  info: (message, ...details) => console.log(`${PREFIX} ${message}`, ...details),
  warn: (message, ...details) => console.warn(`${PREFIX} ${message}`, ...details),
  error: (message, ...details) => console.error(`${PREFIX} ${message}`, ...details)
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

let current: Logger = consoleLogger;

export function getLogger(): Logger {
  return current;
}

/** Replace the process-wide logger. Returns the previous one so callers can restore it. */
export function setLogger(logger: Logger): Logger {
  const prev = current;
  current = logger;
  return prev;
}

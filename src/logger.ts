export interface LoggerBackend {
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
}

const PREFIX = "[memory-tiers]";

const consoleBackend: LoggerBackend = {
  info: (msg, ...args) => console.info(msg, ...args),
  warn: (msg, ...args) => console.warn(msg, ...args),
  error: (msg, ...args) => console.error(msg, ...args),
  debug: (msg, ...args) => console.debug(msg, ...args),
};

let backend: LoggerBackend = consoleBackend;
let debugEnabled = false;

/**
 * Route package logging to a host logger. Safe to call more than once
 * (e.g. again after config is parsed to flip the debug flag).
 */
export function initLogger(next: LoggerBackend | undefined, debug: boolean): void {
  backend = next ?? consoleBackend;
  debugEnabled = debug;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export const log = {
  debug(msg: string, ...args: unknown[]): void {
    if (!debugEnabled) return;
    backend.debug(`${PREFIX} ${msg}`, ...args);
  },
  info(msg: string, ...args: unknown[]): void {
    backend.info(`${PREFIX} ${msg}`, ...args);
  },
  warn(msg: string, ...args: unknown[]): void {
    backend.warn(`${PREFIX} ${msg}`, ...args);
  },
  error(msg: string, ...args: unknown[]): void {
    backend.error(`${PREFIX} ${msg}`, ...args);
  },
};

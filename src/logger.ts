export interface LoggerBackend {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

const PREFIX = "[context-engine]";

const consoleBackend: LoggerBackend = {
  debug: (msg, ...args) => console.debug(msg, ...args),
  info: (msg, ...args) => console.info(msg, ...args),
  warn: (msg, ...args) => console.warn(msg, ...args),
  error: (msg, ...args) => console.error(msg, ...args),
};

let backend: LoggerBackend = consoleBackend;
let debugEnabled = false;

/**
 * Install the sink every `log.*` call writes to. Called once at startup and
 * again after config is parsed, since the debug flag lives in config.
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

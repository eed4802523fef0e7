export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

let threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: Exclude<LogLevel, 'silent'>, msg: string, meta?: object): void {
  if (LEVELS[level] < LEVELS[threshold]) return;
  const line = JSON.stringify({
    level,
    message: msg,
    ...meta,
    timestamp: Date.now(),
  });
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, error?: unknown, meta?: object): void;
  child(bindings: object): Logger;
}

function createLogger(bindings: object): Logger {
  return {
    debug: (msg, meta) => write('debug', msg, { ...bindings, ...meta }),
    info: (msg, meta) => write('info', msg, { ...bindings, ...meta }),
    warn: (msg, meta) => write('warn', msg, { ...bindings, ...meta }),
    error: (msg, error, meta) =>
      write('error', msg, {
        ...bindings,
        ...meta,
        error: error instanceof Error ? error.message : String(error),
      }),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
}

export const logger: Logger = createLogger({});

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

type LogFn = (msg: string, data?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child: (defaults: Record<string, unknown>) => Logger;
}

function createLogger(options: LoggerOptions = {}, defaults: Record<string, unknown> = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const jsonMode = options.json ?? false;

  function log(level: LogLevel, message: string, data?: Record<string, unknown>) {
    if (LOG_LEVELS[level] < minLevel) return;

    const merged = { ...defaults, ...data };
    const hasData = Object.keys(merged).length > 0;

    if (jsonMode) {
      const entry = { level, message, timestamp: new Date().toISOString(), ...merged };
      process.stderr.write(JSON.stringify(entry) + '\n');
    } else {
      const prefix = level === 'error' ? '\x1b[31m' // red
        : level === 'warn' ? '\x1b[33m' // yellow
        : level === 'debug' ? '\x1b[90m' // grey
        : '';
      const reset = prefix ? '\x1b[0m' : '';
      const dataStr = hasData ? ` ${JSON.stringify(merged)}` : '';
      process.stderr.write(`${prefix}[${level}]${reset} ${message}${dataStr}\n`);
    }
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    // Children read the current global options so --verbose reaches request-scoped loggers
    child: (childDefaults) => createLogger(currentOptions, { ...defaults, ...childDefaults }),
  };
}

let currentOptions: LoggerOptions = {};

/** Global logger instance; configure via setLoggerOptions() */
export let logger = createLogger();

export function setLoggerOptions(options: LoggerOptions): void {
  currentOptions = options;
  logger = createLogger(options);
}

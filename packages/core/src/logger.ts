/**
 * Logger for probewire
 *
 * Output goes to stderr by default so the host program's stdout stays clean.
 */

import { LOG_LEVEL_ENV_VAR } from './constants.js';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogData = {
  [key: string]: unknown;
};

export type Logger = {
  level: LogLevel;
  error(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  debug(obj: unknown, msg?: string): void;
  trace(obj: unknown, msg?: string): void;
  child(prefix: string): Logger;
};

/**
 * Log levels with numeric values for comparison
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Check if a log level should be output
 */
export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

/**
 * Logger configuration options
 */
export type LoggerOptions = {
  level?: LogLevel;
  prefix?: string;
  json?: boolean;
  output?: (message: string) => void;
};

export const stderrOutput = (message: string): void => {
  process.stderr.write(`${message}\n`);
};

/**
 * Level from the environment, falling back to `warn`
 */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env[LOG_LEVEL_ENV_VAR];
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/** One log call, before rendering */
type LogRecord = {
  time: string;
  level: LogLevel;
  scope: string;
  msg?: string;
  data?: unknown;
};

type Render = (record: LogRecord) => string;

// `log(obj, msg)` carries data; `log('text')` is a bare message
function toRecord(level: LogLevel, scope: string, obj: unknown, msg?: string): LogRecord {
  const time = new Date().toISOString();
  if (msg !== undefined) return { time, level, scope, msg, data: obj };
  if (typeof obj === 'string') return { time, level, scope, msg: obj };
  return { time, level, scope, data: obj };
}

const renderText: Render = ({ time, level, scope, msg, data }) => {
  const stamp = `[${time}] [${level.toUpperCase()}]`;
  const head = scope ? `${stamp} ${scope}` : stamp;
  if (msg === undefined) return `${head} ${JSON.stringify(data)}`;
  return data === undefined ? `${head} ${msg}` : `${head} ${msg} ${JSON.stringify(data)}`;
};

const renderJson: Render = ({ time, level, scope, msg, data }) =>
  JSON.stringify({
    time,
    level,
    ...(scope ? { prefix: scope } : {}),
    ...(msg === undefined ? {} : { msg }),
    ...(data === undefined ? {} : { data })
  });

/**
 * Create a logger. Children share the level and output and append
 * `[name]` to the scope.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { json = false, output = stderrOutput } = options;
  const level = options.level ?? defaultLogLevel();
  const render = json ? renderJson : renderText;

  const scoped = (scope: string): Logger => {
    const at =
      (messageLevel: LogLevel) =>
      (obj: unknown, msg?: string): void => {
        if (shouldLog(level, messageLevel)) {
          output(render(toRecord(messageLevel, scope, obj, msg)));
        }
      };
    return {
      level,
      error: at('error'),
      warn: at('warn'),
      info: at('info'),
      debug: at('debug'),
      trace: at('trace'),
      child: (name: string) => scoped(`${scope}[${name}]`)
    };
  };

  return scoped(options.prefix ?? '');
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

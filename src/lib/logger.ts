import type { LogLevel } from '../types/index.js';

/**
 * Structured console logging.
 *
 * One JSON object per line, filtered by LOG_LEVEL.
 */

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

let currentLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function write(level: Exclude<LogLevel, 'silent'>, component: string, message: string, fields?: LogFields): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
    return;
  }

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...fields,
  });

  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function createLogger(component: string): Logger {
  return {
    debug: (message, fields) => write('debug', component, message, fields),
    info: (message, fields) => write('info', component, message, fields),
    warn: (message, fields) => write('warn', component, message, fields),
    error: (message, fields) => write('error', component, message, fields),
  };
}

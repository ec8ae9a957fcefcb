/**
 * @file log.ts
 * @description Level-filtered logging with module tags.
 *
 * Messages go to the console as `[Module] message` and are also kept in a
 * bounded history that tests can inspect.
 */

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export interface LogEntry {
  time: number;
  level: Exclude<LogLevel, 'silent'>;
  module: string;
  message: string;
  data?: unknown;
}

const MAX_HISTORY = 500;

let currentLevel: LogLevel = 'warn';
const history: LogEntry[] = [];

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function getLogHistory(): readonly LogEntry[] {
  return history;
}

export function clearLogHistory(): void {
  history.length = 0;
}

function emit(level: Exclude<LogLevel, 'silent'>, module: string, message: string, data?: unknown): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

  history.push({ time: Date.now(), level, module, message, data });
  if (history.length > MAX_HISTORY) history.shift();

  const formatted = `[${module}] ${message}`;
  const sink = level === 'error' ? console.error
    : level === 'warn' ? console.warn
      : level === 'debug' ? console.debug
        : console.log;
  if (data !== undefined) {
    sink(formatted, data);
  } else {
    sink(formatted);
  }
}

export const log = {
  debug(module: string, message: string, data?: unknown): void {
    emit('debug', module, message, data);
  },
  info(module: string, message: string, data?: unknown): void {
    emit('info', module, message, data);
  },
  warn(module: string, message: string, data?: unknown): void {
    emit('warn', module, message, data);
  },
  error(module: string, message: string, data?: unknown): void {
    emit('error', module, message, data);
  },
};

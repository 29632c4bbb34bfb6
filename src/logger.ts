/**
 * Log-level logger for gradfetch, with optional scopes per subsystem.
 *
 * Usage:
 *   import { createLogger } from './logger.js';
 *   const log = createLogger('recolor');
 *   log.debug('strategy', alignment.mode);   // [gradfetch:debug:recolor] strategy "horizontal"
 *
 * Log levels (increasing verbosity):
 *   silent → error → warn → info → debug
 *
 * Control via:
 *   - setLogLevel('debug') from code
 *   - GRADFETCH_LOG=<level> env var, or GRADFETCH_DEBUG=1 (sets 'debug')
 *   - --verbose CLI flag (sets 'info'), --debug CLI flag (sets 'debug')
 *
 * Everything goes to stderr so recolored output on stdout stays clean.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

let currentLevel: LogLevel = 'silent';

/** Set the global log level. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/** Get the current log level. */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

/** Parse a level name, case-insensitively. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] <= LEVELS[currentLevel];
}

function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (typeof a === 'string') return a;
      if (a instanceof Error) return `${a.name}: ${a.message}`;
      return JSON.stringify(a);
    })
    .join(' ');
}

export interface Logger {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

/** Create a logger whose lines carry `scope` after the level tag. */
export function createLogger(scope?: string): Logger {
  const tag = (level: Exclude<LogLevel, 'silent'>): string =>
    scope ? `[gradfetch:${level}:${scope}]` : `[gradfetch:${level}]`;

  return {
    error(...args: unknown[]): void {
      if (shouldLog('error')) console.error(`${tag('error')} ${formatArgs(args)}`);
    },
    warn(...args: unknown[]): void {
      if (shouldLog('warn')) console.error(`${tag('warn')} ${formatArgs(args)}`);
    },
    info(...args: unknown[]): void {
      if (shouldLog('info')) console.error(`${tag('info')} ${formatArgs(args)}`);
    },
    debug(...args: unknown[]): void {
      if (shouldLog('debug')) console.error(`${tag('debug')} ${formatArgs(args)}`);
    },
  };
}

// Auto-configure from environment
const envLevel = process.env.GRADFETCH_LOG ? parseLogLevel(process.env.GRADFETCH_LOG) : undefined;
if (envLevel) {
  setLogLevel(envLevel);
} else if (process.env.GRADFETCH_DEBUG === '1' || process.env.GRADFETCH_DEBUG === 'true') {
  setLogLevel('debug');
}

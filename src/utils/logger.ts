/**
 * Level-filtered console logger
 * The active level is read from the engine settings on every call.
 */

import { LogLevel } from '../types.js';
import { getConfig } from './config.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type EmitLevel = Exclude<LogLevel, 'silent'>;

function pickConsole(level: EmitLevel): (...args: unknown[]) => void {
  switch (level) {
    case 'debug': return console.debug;
    case 'info': return console.info;
    case 'warn': return console.warn;
    case 'error': return console.error;
  }
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function isLevelEnabled(level: EmitLevel): boolean {
  return LEVELS[level] >= LEVELS[getConfig().logLevel];
}

/**
 * Create a logger whose lines are prefixed with `[scope]`
 */
export function createLogger(scope: string): Logger {
  const emit = (level: EmitLevel, message: string, context?: Record<string, unknown>): void => {
    if (!isLevelEnabled(level)) return;
    const write = pickConsole(level);
    if (context && Object.keys(context).length > 0) {
      write(`[${scope}] ${message}`, context);
    } else {
      write(`[${scope}] ${message}`);
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

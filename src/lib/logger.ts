/**
 * Console Logger
 * Level-filtered, timestamped and tagged with the component scope.
 */

import type { LogLevel } from './config.js';

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  child: (scope: string) => Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a logger for a component
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];

  function prefix(tag: string): string {
    return `[${tag}] [${new Date().toISOString()}] [${scope}]`;
  }

  return {
    debug: (...args: unknown[]) => {
      if (threshold <= LEVEL_ORDER.debug) {
        console.log(prefix('DEBUG'), ...args);
      }
    },
    info: (...args: unknown[]) => {
      if (threshold <= LEVEL_ORDER.info) {
        console.log(prefix('INFO'), ...args);
      }
    },
    warn: (...args: unknown[]) => {
      if (threshold <= LEVEL_ORDER.warn) {
        console.warn(prefix('WARN'), ...args);
      }
    },
    error: (...args: unknown[]) => {
      console.error(prefix('ERROR'), ...args);
    },
    child: (childScope: string) => createLogger(`${scope}:${childScope}`, level),
  };
}

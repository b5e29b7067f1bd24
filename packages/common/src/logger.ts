import pino, { type Logger } from 'pino';

import type { LogLevel } from './env.js';

export type { Logger };

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/** JSON logs on stderr; stdout belongs to command output and stdio frames. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({ name: options.name ?? 'refactor-gate', level: options.level ?? 'info' }, pino.destination(2));
}

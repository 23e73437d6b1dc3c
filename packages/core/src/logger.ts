import pino from 'pino';
import type { Logger } from 'pino';
import { loadConfig } from './config.js';

export type { Logger };

export function createLogger(level: string = loadConfig().logLevel): Logger {
  return pino({ name: 'opgraph', level });
}

/** Shared engine logger; entry points accept a `logger` option to replace it */
export const log = createLogger();

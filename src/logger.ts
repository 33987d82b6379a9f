import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './types/config.js';

// stdout belongs to the handed-off process; everything we log goes to stderr.
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino(
    { name: 'container-entrypoint', level },
    pino.destination({ dest: 2, sync: true }),
  );
}

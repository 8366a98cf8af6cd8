import pino from 'pino';
import type { LogLevel } from '../types/config.types.js';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level: LogLevel;
  /**
   * File descriptor to write to. Defaults to stderr so CLI output on stdout stays clean.
   * Writes are synchronous: the CLI calls process.exit() right after its last log line.
   */
  fd?: number;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      name: 'listing-search',
      level: options.level,
      redact: ['req.headers["x-service-token"]'],
    },
    pino.destination({ fd: options.fd ?? 2, sync: true }),
  );
}

/** Logger that discards everything, for tests and embedded use. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

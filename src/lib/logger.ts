/**
 * Logger factory
 *
 * pino writing JSON to stderr; stdout is reserved for command output.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';
import { config } from '@/config/index';

export interface LoggerOptions {
  name: string;
  level?: LevelWithSilent;
  /** Alternate destination, used by tests to capture lines */
  destination?: pino.DestinationStream;
}

const REDACTED_PATHS = [
  'password',
  '*.password',
  'ssh.password',
  'token',
  'certificateKey',
  'credential.token',
  'credential.certificateKey',
];

export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      name: options.name,
      level: options.level ?? config.logLevel,
      redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
      base: { pid: process.pid },
    },
    options.destination ?? pino.destination(2),
  );
}

/**
 * Logger that discards everything; for library callers that pass no logger.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Root pino logger for the CLI.
 *
 * Logs go to stderr so they never mix with command output on stdout.
 * Pretty output is used for --verbose runs and in development.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  /** Log level (default: CLOUD_UPLOAD_LOG_LEVEL or "warn") */
  level?: string;
  /** Human-readable output via pino-pretty */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env['CLOUD_UPLOAD_LOG_LEVEL'] ?? 'warn';
  const pretty = options.pretty ?? process.env['NODE_ENV'] === 'development';

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}

/**
 * Structured logging for the SDK and CLI.
 *
 * Logs go to stderr as JSON lines so that commands writing an export to
 * stdout stay pipeable.
 */

import pino, { Logger } from 'pino';
import { DEFAULT_LOG_LEVEL } from './constants';

export type { Logger };

export function createLogger(options?: { level?: string; name?: string }): Logger {
  return pino(
    {
      name: options?.name ?? 'genie-spaces',
      level: options?.level || process.env.GENIE_LOG_LEVEL || DEFAULT_LOG_LEVEL,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

export const logger = createLogger();

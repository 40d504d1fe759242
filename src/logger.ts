import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

/**
 * Logs go to stderr so the summary table printed on stdout stays clean.
 */
export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino(
    {
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    },
    pino.destination(2),
  );
}

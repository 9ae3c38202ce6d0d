import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  bindings?: Record<string, unknown>;
}

/**
 * JSON logger on stderr. Stdout is reserved for the PASS/FAIL/SKIP marker
 * lines, so piping the output through pino-pretty never interleaves with them.
 */
export function makeLogger(options: LoggerOptions = {}): Logger {
  const isVitest = process.env.VITEST === 'true';
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';

  return pino(
    {
      level,
      enabled: !isVitest,
      base: { ...options.bindings, app: 'liveqa-smoke' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

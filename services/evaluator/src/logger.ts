/**
 * Level-filtered console logger for the CLI.
 *
 * Library packages log through an injected EngineLogger with their own
 * "[Component]" prefixes; this only decides which lines are written and in
 * which shape. JSON mode writes one object per line.
 */

import { format } from 'node:util';
import type { EngineLogger, LogLevel } from '@concursal/domain/logger';
import { LOG_LEVELS } from '@concursal/domain/logger';

type LogMethod = keyof EngineLogger;

export interface ConsoleLoggerOptions {
  level: LogLevel;
  json?: boolean;
  /** Destination; the CLI passes a console bound to stderr */
  sink?: EngineLogger;
  now?: () => Date;
}

export function createConsoleLogger(options: ConsoleLoggerOptions): EngineLogger {
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());
  const threshold = LOG_LEVELS.indexOf(options.level);

  const write = (method: LogMethod) => (...args: unknown[]) => {
    if (LOG_LEVELS.indexOf(method) < threshold) return;
    const message = format(...args);
    if (options.json) {
      sink[method](JSON.stringify({ level: method, time: now().toISOString(), message }));
    } else {
      sink[method](message);
    }
  };

  const logger: EngineLogger = {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
  return logger;
}

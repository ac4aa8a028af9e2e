/**
 * Logger contract accepted by library code. console satisfies it.
 */
export type EngineLogger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

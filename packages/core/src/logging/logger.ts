import type { LogLevel } from '@herald/shared';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Line-oriented stderr logger: `[scope] level: message`. Lines below `level`
 * are dropped.
 */
export function createLogger(
  scope: string,
  level: LogLevel = 'info',
  write: (line: string) => void = (line) => process.stderr.write(line),
): Logger {
  const emit = (lineLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[lineLevel] < LEVEL_ORDER[level]) return;
    write(`[${scope}] ${lineLevel}: ${message}\n`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message, err) =>
      emit('error', err === undefined ? message : `${message}: ${describeError(err)}`),
  };
}

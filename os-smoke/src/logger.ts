import pino, { type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Resolve a LOG_LEVEL value to a pino level, falling back to "warn"
 * for unset or unknown values.
 */
export function resolveLogLevel(raw: string | undefined): LevelWithSilent {
  const value = raw?.trim().toLowerCase();
  return LEVELS.find(level => level === value) ?? 'warn';
}

/**
 * Diagnostics go to stderr; stdout carries only the smoke run's fixed lines.
 */
export const logger = pino(
  { name: 'os-smoke', level: resolveLogLevel(process.env['LOG_LEVEL']) },
  pino.destination(2)
);

import { LogLevel } from '@nestjs/common';

const LEVELS: readonly LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

/**
 * Turns a minimum level ("debug", "WARN", "info") into the list of levels Nest should print.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? 'log').trim().toLowerCase();
  // "info" is the common spelling elsewhere
  const minimum = normalized === 'info' ? 'log' : normalized;
  const index = LEVELS.findIndex(candidate => candidate === minimum);
  return LEVELS.slice(index === -1 ? LEVELS.indexOf('log') : index);
}

import { LogLevel } from '@nestjs/common';

/** Threshold names accepted in LOG_LEVEL, most severe first */
export const LOG_LEVEL_NAMES = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

/**
 * Nest enables log levels individually; a threshold such as `log` enables
 * itself and every more severe level.
 */
export function resolveLogLevels(threshold: LogLevelName): LogLevel[] {
  const upTo = LOG_LEVEL_NAMES.indexOf(threshold);
  return ['fatal', ...LOG_LEVEL_NAMES.slice(0, upTo + 1)];
}

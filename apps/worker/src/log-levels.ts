import type { LogLevel } from '@nestjs/common';
import { envSchema } from '@libs/core';
import type { Env } from '@libs/core';

const LOG_LEVELS: Record<Env['LOG_LEVEL'], LogLevel[]> = {
  fatal: ['fatal'],
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  trace: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

/** Nest logger levels enabled by a `LOG_LEVEL` value; unset means `info`. */
export const resolveLogLevels = (value: unknown): LogLevel[] =>
  LOG_LEVELS[envSchema.shape.LOG_LEVEL.parse(value)];

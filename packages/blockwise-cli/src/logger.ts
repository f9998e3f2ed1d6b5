import pino from 'pino';
import type { Logger } from 'blockwise-core';
import { LogLevelSchema, type Config, type LogLevel } from './types.js';

export function resolveLogLevel(config: Config = {}): LogLevel {
  const fromEnv = LogLevelSchema.safeParse(process.env.BLOCKWISE_LOG);
  if (fromEnv.success) return fromEnv.data;
  return config.logLevel ?? 'warn';
}

/** Root logger for a CLI invocation. Stdout carries command output, so logs go to stderr. */
export function createCliLogger(config: Config = {}): Logger {
  return pino(
    { name: 'blockwise', level: resolveLogLevel(config) },
    pino.destination({ dest: 2, sync: true })
  );
}

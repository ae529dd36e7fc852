/**
 * Root logger factory.
 *
 * Components never create loggers of their own: they receive one and bind
 * `child({ component })`. Tasks get `child({ task })` from the scheduler.
 *
 * Environment:
 *   BUILDRIG_LOG_LEVEL = trace|debug|info|warn|error (overrides the option)
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  /** Minimum level (default: info) */
  level?: LevelWithSilent;
  /** Logger name, emitted on every line */
  name?: string;
}

function isLevel(value: string): value is LevelWithSilent {
  return (LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LevelWithSilent | undefined {
  const raw = process.env['BUILDRIG_LOG_LEVEL']?.toLowerCase();
  return raw !== undefined && isLevel(raw) ? raw : undefined;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'buildrig',
    level: levelFromEnv() ?? options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

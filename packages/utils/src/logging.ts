// packages/utils/src/logging.ts
import { pino } from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export function isLogLevel(v: unknown): v is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === v);
}

/** Level from N3TX_LOG_LEVEL; the library stays silent unless asked. */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const v = String(env.N3TX_LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(v) ? v : 'silent';
}

export function makeLogger(name: string, level: LevelWithSilent = defaultLogLevel()): Logger {
  return pino({ name, level });
}

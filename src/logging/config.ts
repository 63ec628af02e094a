import type pino from 'pino';
import { z } from 'zod';

export type LogFormat = 'json' | 'pretty';

export interface LoggingConfig {
  level: pino.LevelWithSilent;
  /** 'stdout', 'stderr', or a file path */
  destination: string;
  format: LogFormat;
}

const levelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
const formatSchema = z.enum(['json', 'pretty']);

function isTruthyFlag(value: string | undefined): boolean {
  const flag = value?.trim().toLowerCase();
  return flag === '1' || flag === 'true';
}

/**
 * Logging settings come straight from the environment rather than the zod
 * config module so the logger exists before configuration is validated.
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const level = levelSchema.safeParse(env.LOG_LEVEL?.trim().toLowerCase());

  const rawFormat = env.LOG_FORMAT?.trim().toLowerCase();
  let format: LogFormat = isTruthyFlag(env.LOG_PRETTY) ? 'pretty' : 'json';
  if (rawFormat) {
    const parsed = formatSchema.safeParse(rawFormat);
    if (!parsed.success) {
      throw new Error(`LOG_FORMAT must be "json" or "pretty", got "${env.LOG_FORMAT}"`);
    }
    format = parsed.data;
  }

  // stdout belongs to CLI output (tables, next-slot lines)
  const destination = env.LOG_DESTINATION?.trim() || 'stderr';

  return {
    level: level.success ? level.data : env.NODE_ENV === 'test' ? 'warn' : 'info',
    destination,
    format,
  };
}

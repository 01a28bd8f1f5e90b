/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

const levelSchema = z.enum(['debug', 'info', 'warn', 'error']).catch('info');

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = env.NODE_ENV !== 'production';

  return {
    level: levelSchema.parse(env.LOG_LEVEL),
    pretty: env.LOG_PRETTY === 'true' || (isDev && env.LOG_PRETTY !== 'false'),
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number(env.LOG_ROTATE_DAYS || 14),
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,cookie,x-api-key,key,token,password,apiKey,api_key,secret')
      .split(',').map(f => f.trim()),
  };
}

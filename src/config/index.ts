/**
 * NewsPulse — Configuration
 *
 * Reads settings from the environment (populated from .env by dotenv at
 * process start) and validates them. Values are immutable for the life of
 * the process.
 */

import { z } from 'zod';
import { ConfigError } from '../lib/errors';
import type { LogLevel } from '../lib/logger';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

export const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    REFRESH_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
    MAX_ITEMS: z.coerce.number().int().positive().default(500),
    DEFAULT_QUERY_LIMIT: z.coerce.number().int().positive().default(100),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    MAX_ITEMS_PER_SOURCE: optionalString.pipe(z.coerce.number().int().positive().optional()),
    FEED_SOURCES_FILE: optionalString,
    USER_AGENT: z.string().trim().min(1).default('NewsPulse/1.0'),
    LOG_LEVEL: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(z.enum(LOG_LEVELS))
      .default('info'),
  })
  .refine(env => env.DEFAULT_QUERY_LIMIT <= env.MAX_ITEMS, {
    message: 'DEFAULT_QUERY_LIMIT must not exceed MAX_ITEMS',
    path: ['DEFAULT_QUERY_LIMIT'],
  });

export interface AppConfig {
  port: number;
  refreshIntervalMs: number;
  maxItems: number;
  defaultQueryLimit: number;
  fetchTimeoutMs: number;
  maxItemsPerSource?: number;
  sourcesFile?: string;
  userAgent: string;
  logLevel: LogLevel;
}

/**
 * Build the application config from an environment map.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    refreshIntervalMs: Math.round(values.REFRESH_INTERVAL_MINUTES * 60_000),
    maxItems: values.MAX_ITEMS,
    defaultQueryLimit: values.DEFAULT_QUERY_LIMIT,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    maxItemsPerSource: values.MAX_ITEMS_PER_SOURCE,
    sourcesFile: values.FEED_SOURCES_FILE,
    userAgent: values.USER_AGENT,
    logLevel: values.LOG_LEVEL,
  };
}

import { LogLevel } from '@nestjs/common';
import { z } from 'zod';
import { ConfigError } from '../common/errors';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'] as const;

export type TrackerLogLevel = (typeof LOG_LEVELS)[number];

/**
 * Environment variables the tracker understands. Everything is optional;
 * missing values fall back to the defaults in tracker.config.ts.
 */
const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
  MARKETPLACE_SEARCH_URL: z.string().url().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${fields}`);
  }
  return parsed.data;
}

/**
 * Nest enables levels individually; a threshold includes every more severe level.
 */
export function logLevelsFor(level: TrackerLogLevel): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}

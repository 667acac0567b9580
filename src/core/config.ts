import { z } from 'zod';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { ConfigError } from './errors.js';

/**
 * Runtime configuration, read from environment variables once per process.
 */

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const envSchema = z.object({
  SEC_USER_AGENT: z.string().trim().min(1).default('filing-metrics admin@example.com'),
  FILING_METRICS_CACHE_DIR: z.string().trim().min(1).default(join(homedir(), '.filing-metrics')),
  FILING_METRICS_YEARS: z.coerce.number().int().min(1).max(30).default(5),
  FILING_METRICS_RATE_LIMIT: z.coerce.number().positive().max(10).default(10),
  PORT: z.coerce.number().int().min(1).max(65535).default(3005),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export type LogLevel = typeof LOG_LEVELS[number];

export interface AppConfig {
  userAgent: string;
  cacheDir: string;
  trailingYears: number;
  requestsPerSecond: number;
  port: number;
  logLevel: LogLevel;
}

/** Parse configuration from an environment map. Empty strings count as unset. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    userAgent: e.SEC_USER_AGENT,
    cacheDir: e.FILING_METRICS_CACHE_DIR,
    trailingYears: e.FILING_METRICS_YEARS,
    requestsPerSecond: e.FILING_METRICS_RATE_LIMIT,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
}

let current: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!current) current = loadConfig();
  return current;
}

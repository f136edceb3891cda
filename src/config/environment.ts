/**
 * Environment configuration for the ingestion worker
 * Loads and validates required environment variables
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface EnvironmentConfig {
  supabase: {
    url: string;
    key: string;
  };
  ingestion: {
    feedsTable: string;
    articlesTable: string;
    intervalSeconds: number;
    fetchTimeoutMs: number;
    insertConcurrency: number;
    abortCycleOnFetchError: boolean;
    userAgent: string;
  };
  logging: {
    level: LogLevel;
  };
}

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; FeedIngestor/0.1)';

const positiveInt = (name: string, fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a positive integer, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const flag = z
  .string()
  .optional()
  .transform(value => value !== undefined && ['true', '1', 'yes'].includes(value.trim().toLowerCase()));

const optionalText = (fallback: string) =>
  z
    .string()
    .optional()
    .transform(value => (value && value.trim() !== '' ? value.trim() : fallback));

const envSchema = z.object({
  FEEDS_TABLE: optionalText('feed'),
  ARTICLES_TABLE: optionalText('article'),
  INGEST_INTERVAL_SECONDS: positiveInt('INGEST_INTERVAL_SECONDS', 300),
  INGEST_FETCH_TIMEOUT_MS: positiveInt('INGEST_FETCH_TIMEOUT_MS', 10000),
  INGEST_INSERT_CONCURRENCY: positiveInt('INGEST_INSERT_CONCURRENCY', 4),
  INGEST_ABORT_CYCLE_ON_FETCH_ERROR: flag,
  INGEST_USER_AGENT: optionalText(DEFAULT_USER_AGENT),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform(value => (value && value.trim() !== '' ? value.trim().toLowerCase() : 'info'))
    .pipe(z.enum(LOG_LEVELS))
});

/**
 * Load and validate environment configuration
 * @throws Error if required environment variables are missing or malformed
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  // NEXT_PUBLIC_/SERVICE_ROLE names let the worker share a Supabase project's existing .env
  const supabaseUrl = env.SUPABASE_URL || env.NEXT_PUBLIC_SUPABASE_URL;
  const supabaseKey = env.SUPABASE_KEY || env.SUPABASE_SERVICE_ROLE_KEY;

  const requiredVars = [
    { name: 'SUPABASE_URL (or NEXT_PUBLIC_SUPABASE_URL)', value: supabaseUrl },
    { name: 'SUPABASE_KEY (or SUPABASE_SERVICE_ROLE_KEY)', value: supabaseKey }
  ];

  const missing = requiredVars.filter(varObj => !varObj.value);
  if (missing.length > 0 || !supabaseUrl || !supabaseKey) {
    throw new Error(`Missing required environment variables: ${missing.map(v => v.name).join(', ')}`);
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }
  const vars = parsed.data;

  return {
    supabase: {
      url: supabaseUrl,
      key: supabaseKey
    },
    ingestion: {
      feedsTable: vars.FEEDS_TABLE,
      articlesTable: vars.ARTICLES_TABLE,
      intervalSeconds: vars.INGEST_INTERVAL_SECONDS,
      fetchTimeoutMs: vars.INGEST_FETCH_TIMEOUT_MS,
      insertConcurrency: vars.INGEST_INSERT_CONCURRENCY,
      abortCycleOnFetchError: vars.INGEST_ABORT_CYCLE_ON_FETCH_ERROR,
      userAgent: vars.INGEST_USER_AGENT
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}

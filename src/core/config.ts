/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting (database file, API keys, HTTP retry budget, Places defaults)
 * is read here and nowhere else. `loadConfig()` runs once at process start,
 * validates the environment with a Zod schema, and returns an immutable
 * `AppConfig` that the entry point hands to `buildContainer()`. Nothing in
 * the app reads process.env directly and there is no module-level config
 * object: tests build their own config from a plain env record.
 *
 * Invalid input throws a ConfigurationError listing every bad key, so the
 * entry points can print it and exit non-zero before any work starts.
 */
import 'dotenv/config';

import { ConfigurationError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

/** Empty strings in .env files mean "not set" for optional secrets. */
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /** Storage engine. The local SQLite file is the default cache. */
  DB_CLIENT: z.enum(['better-sqlite3', 'pg']).default('better-sqlite3'),
  /** SQLite file path; ':memory:' keeps the cache in-process. */
  DB_PATH: z.string().min(1).default('territory.db'),
  /** PostgreSQL connection URL, used only when DB_CLIENT=pg. */
  DATABASE_URL: z.string().min(1).default('postgres://postgres:@localhost:5432/territory'),
  DB_SSL: z.stringbool().default(false),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),

  GOOGLE_MAPS_API_KEY: optionalSecret,
  PLACES_REGION_CODE: z.string().length(2).default('CA'),
  PLACES_LANGUAGE_CODE: z.string().min(2).default('en'),
  PLACES_PAGE_SIZE: z.coerce.number().int().min(1).max(20).default(20),
  PLACES_MAX_PAGES: z.coerce.number().int().min(1).max(10).default(3),
  PLACES_PAGE_TOKEN_DELAY_MS: z.coerce.number().int().min(0).default(2000),

  OPENAI_API_KEY: optionalSecret,
  OPENAI_MODEL: z.string().min(1).default('gpt-4.1-mini'),
  OPENAI_MAX_OUTPUT_TOKENS: z.coerce.number().int().min(50).default(250),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),

  HTTP_TIMEOUT_MS: z.coerce.number().int().min(100).default(30_000),
  HTTP_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(5),
  HTTP_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  HTTP_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(20_000),

  HOMEPAGE_TIMEOUT_MS: z.coerce.number().int().min(100).default(20_000),
  HOMEPAGE_MAX_CHARS: z.coerce.number().int().min(100).default(10_000),

  DETAILS_LIMIT: z.coerce.number().int().min(0).default(500),
  CLASSIFY_LIMIT: z.coerce.number().int().min(0).default(200),
  CLASSIFY_SCAN_LIMIT: z.coerce.number().int().min(1).default(50_000),

  EXPORT_PATH: z.string().min(1).default('data/exports/ranked.csv'),
});

export function loadConfig(env: Record<string, string | undefined> = process.env) {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${details}`);
  }

  const e = parsed.data;

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    isDev: e.NODE_ENV === 'development',
    isProd: e.NODE_ENV === 'production',

    log: {
      level: e.LOG_LEVEL,
    },

    database: {
      client: e.DB_CLIENT,
      path: e.DB_PATH,
      url: e.DATABASE_URL,
      ssl: e.DB_SSL,
      pool: {
        min: e.DB_POOL_MIN,
        max: e.DB_POOL_MAX,
      },
    },

    places: {
      apiKey: e.GOOGLE_MAPS_API_KEY,
      regionCode: e.PLACES_REGION_CODE,
      languageCode: e.PLACES_LANGUAGE_CODE,
      pageSize: e.PLACES_PAGE_SIZE,
      maxPages: e.PLACES_MAX_PAGES,
      pageTokenDelayMs: e.PLACES_PAGE_TOKEN_DELAY_MS,
    },

    openai: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      maxOutputTokens: e.OPENAI_MAX_OUTPUT_TOKENS,
      timeoutMs: e.OPENAI_TIMEOUT_MS,
    },

    http: {
      timeoutMs: e.HTTP_TIMEOUT_MS,
      retryAttempts: e.HTTP_RETRY_ATTEMPTS,
      retryBaseDelayMs: e.HTTP_RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: e.HTTP_RETRY_MAX_DELAY_MS,
    },

    homepage: {
      timeoutMs: e.HOMEPAGE_TIMEOUT_MS,
      maxChars: e.HOMEPAGE_MAX_CHARS,
    },

    /** Per-run spend caps: count limits on metered calls, not deadlines. */
    pipeline: {
      detailsLimit: e.DETAILS_LIMIT,
      classifyLimit: e.CLASSIFY_LIMIT,
      classifyScanLimit: e.CLASSIFY_SCAN_LIMIT,
    },

    export: {
      path: e.EXPORT_PATH,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

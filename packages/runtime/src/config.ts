// Engine configuration
//
// Read once from the environment at startup. Every variable is validated up
// front so a misconfigured instance fails before it mints a single id.

import { z } from 'zod';
import { DEFAULT_SNOWFLAKE_EPOCH_MS, MAX_GENERATOR_ID } from '@arbor/protocol';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

export type EngineConfig = {
  /** Absent when the caller supplies its own repositories */
  database?: {
    url: string;
    maxConnections: number;
  };

  snowflake: {
    /** Must be unique among all running instances */
    generatorId: number;
    epochMs: number;
    clockSkewToleranceMs: number;
  };

  storage: {
    bucket: string;
    region: string;
    endpoint?: string;
    forcePathStyle: boolean;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
    /** Lifetime of pre-signed URLs */
    urlTtlSeconds: number;
  };

  logLevel: LogLevel;

  /** Page size for lazy child listings */
  listPageSize: number;
};

const EnvSchema = z
  .object({
    DATABASE_URL: z.string().url().optional(),
    DATABASE_MAX_CONNECTIONS: z.coerce.number().int().min(1).default(10),
    SNOWFLAKE_GENERATOR_ID: z.coerce.number().int().min(0).max(MAX_GENERATOR_ID),
    SNOWFLAKE_EPOCH_MS: z.coerce.number().int().min(0).default(DEFAULT_SNOWFLAKE_EPOCH_MS),
    SNOWFLAKE_CLOCK_SKEW_TOLERANCE_MS: z.coerce.number().int().min(0).default(5),
    STORAGE_BUCKET: z.string().min(1),
    STORAGE_REGION: z.string().min(1).default('us-east-1'),
    STORAGE_ENDPOINT: z.string().url().optional(),
    STORAGE_FORCE_PATH_STYLE: z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true'),
    STORAGE_ACCESS_KEY_ID: z.string().optional(),
    STORAGE_SECRET_ACCESS_KEY: z.string().optional(),
    STORAGE_URL_TTL_SECONDS: z.coerce.number().int().min(1).max(3600).default(300),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LIST_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
  })
  .refine(
    (env) => (env.STORAGE_ACCESS_KEY_ID === undefined) === (env.STORAGE_SECRET_ACCESS_KEY === undefined),
    {
      message: 'STORAGE_ACCESS_KEY_ID and STORAGE_SECRET_ACCESS_KEY must be set together',
      path: ['STORAGE_ACCESS_KEY_ID'],
    }
  );

/**
 * Parse engine configuration from environment variables.
 *
 * Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const credentials =
    values.STORAGE_ACCESS_KEY_ID !== undefined && values.STORAGE_SECRET_ACCESS_KEY !== undefined
      ? {
          accessKeyId: values.STORAGE_ACCESS_KEY_ID,
          secretAccessKey: values.STORAGE_SECRET_ACCESS_KEY,
        }
      : undefined;

  return Object.freeze({
    database: values.DATABASE_URL
      ? { url: values.DATABASE_URL, maxConnections: values.DATABASE_MAX_CONNECTIONS }
      : undefined,
    snowflake: {
      generatorId: values.SNOWFLAKE_GENERATOR_ID,
      epochMs: values.SNOWFLAKE_EPOCH_MS,
      clockSkewToleranceMs: values.SNOWFLAKE_CLOCK_SKEW_TOLERANCE_MS,
    },
    storage: {
      bucket: values.STORAGE_BUCKET,
      region: values.STORAGE_REGION,
      endpoint: values.STORAGE_ENDPOINT,
      forcePathStyle: values.STORAGE_FORCE_PATH_STYLE,
      credentials,
      urlTtlSeconds: values.STORAGE_URL_TTL_SECONDS,
    },
    logLevel: values.LOG_LEVEL,
    listPageSize: values.LIST_PAGE_SIZE,
  });
}

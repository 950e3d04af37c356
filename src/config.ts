import dotenv from 'dotenv';
import { z } from 'zod';
import type { PoolSettings } from './database/types.js';
import { ConfigurationError } from './utils/errors.js';

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform(value => value === 'true' || value === '1');

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  SCHEMA_LEDGER_MIGRATIONS_DIR: z.string().min(1).optional(),
  SCHEMA_LEDGER_POOL_MIN: positiveInt(5),
  SCHEMA_LEDGER_POOL_MAX: positiveInt(20),
  SCHEMA_LEDGER_STATEMENT_TIMEOUT: positiveInt(30),
  SCHEMA_LEDGER_DEBUG: flag
});

export interface SchemaLedgerConfig {
  databaseUrl?: string;
  migrationsDir?: string;
  pool: Omit<PoolSettings, 'connectionString'>;
  debug: boolean;
}

export interface ConfigOverrides {
  databaseUrl?: string;
  migrationsDir?: string;
  debug?: boolean;
}

let envLoaded = false;

/**
 * Load configuration from the environment (and `.env`, once per process).
 * Explicit overrides, typically CLI options, win over the environment.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): SchemaLedgerConfig {
  if (env === process.env && !envLoaded) {
    dotenv.config();
    envLoaded = true;
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }

  const values = parsed.data;
  if (values.SCHEMA_LEDGER_POOL_MIN > values.SCHEMA_LEDGER_POOL_MAX) {
    throw new ConfigurationError(
      `SCHEMA_LEDGER_POOL_MIN (${values.SCHEMA_LEDGER_POOL_MIN}) exceeds SCHEMA_LEDGER_POOL_MAX (${values.SCHEMA_LEDGER_POOL_MAX})`
    );
  }

  return {
    databaseUrl: overrides.databaseUrl ?? values.DATABASE_URL,
    migrationsDir: overrides.migrationsDir ?? values.SCHEMA_LEDGER_MIGRATIONS_DIR,
    pool: {
      minConnections: values.SCHEMA_LEDGER_POOL_MIN,
      maxConnections: values.SCHEMA_LEDGER_POOL_MAX,
      statementTimeout: values.SCHEMA_LEDGER_STATEMENT_TIMEOUT
    },
    debug: overrides.debug ?? values.SCHEMA_LEDGER_DEBUG
  };
}

/**
 * Pool settings for database commands; DATABASE_URL is required here
 */
export function requirePoolSettings(config: SchemaLedgerConfig): PoolSettings {
  if (!config.databaseUrl) {
    throw new ConfigurationError('DATABASE_URL is not set (use --database-url or the DATABASE_URL environment variable)');
  }
  return { connectionString: config.databaseUrl, ...config.pool };
}

export * from './migrations/index.js';
export { PostgresExecutor } from './database/postgres.js';
export type { PoolFactory, QueryablePool } from './database/postgres.js';
export type { DatabaseExecutor, PoolSettings, QueryParam, Row } from './database/types.js';
export { loadConfig, requirePoolSettings } from './config.js';
export type { SchemaLedgerConfig, ConfigOverrides } from './config.js';
export * from './utils/errors.js';
export { logger, Logger, LogLevel } from './utils/logger.js';

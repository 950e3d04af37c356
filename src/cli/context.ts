import type { Command } from 'commander';
import ora from 'ora';
import { loadConfig, requirePoolSettings } from '../config.js';
import type { SchemaLedgerConfig } from '../config.js';
import { PostgresExecutor } from '../database/postgres.js';
import type { DatabaseExecutor, PoolSettings } from '../database/types.js';
import { createMigrationManager, createMigrationSource, MigrationRegistry } from '../migrations/index.js';
import type { MigrationManager } from '../migrations/index.js';
import { logger } from '../utils/logger.js';

export type GlobalOptions = {
  dir?: string;
  databaseUrl?: string;
  debug?: boolean;
};

/** A connected executor and the way to release it */
export interface ExecutorHandle {
  db: DatabaseExecutor;
  close(): Promise<void>;
}

export type ExecutorFactory = (settings: PoolSettings) => Promise<ExecutorHandle>;

export const connectPostgres: ExecutorFactory = async (settings) => {
  const executor = new PostgresExecutor(settings);
  await executor.initialize();
  return { db: executor, close: () => executor.close() };
};

export async function resolveConfig(command: Command): Promise<SchemaLedgerConfig> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const config = loadConfig({
    databaseUrl: options.databaseUrl,
    migrationsDir: options.dir,
    debug: options.debug ? true : undefined
  });

  if (config.debug && !logger.isDebugEnabled()) {
    const sessionDir = await logger.enableDebugMode();
    if (sessionDir) {
      logger.info(`Debug logs: ${sessionDir}`);
    }
  }

  return config;
}

/**
 * Registry for commands that only look at migration sources
 */
export async function openRegistry(command: Command): Promise<{ registry: MigrationRegistry; config: SchemaLedgerConfig }> {
  const config = await resolveConfig(command);
  const registry = new MigrationRegistry(createMigrationSource({ migrationsDir: config.migrationsDir }));
  return { registry, config };
}

/**
 * Connect, hand a manager to `fn`, and always release the connection
 */
export async function withManager<T>(
  command: Command,
  connect: ExecutorFactory,
  fn: (manager: MigrationManager) => Promise<T>
): Promise<T> {
  const config = await resolveConfig(command);
  const settings = requirePoolSettings(config);

  const spinner = ora('Connecting to database...').start();
  let handle: ExecutorHandle;
  try {
    handle = await connect(settings);
    spinner.stop();
  } catch (error: unknown) {
    spinner.fail('Database connection failed');
    throw error;
  }

  try {
    const manager = createMigrationManager({ db: handle.db, migrationsDir: config.migrationsDir });
    return await fn(manager);
  } finally {
    await handle.close();
  }
}

/**
 * Wrap a command action: log failures and set a non-zero exit code
 */
export async function runAction(label: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error: unknown) {
    logger.error(label, error);
    process.exitCode = 1;
  }
}

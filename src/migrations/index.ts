/**
 * Migration system public API
 *
 * Migrations are tracked in the schema_migrations table. By default they come
 * from the manifest in ./scripts/index.ts; pass `migrationsDir` to load
 * compiled modules from a directory instead.
 */

import type { DatabaseExecutor } from '../database/types.js';
import { MigrationLedger } from './ledger.js';
import { MigrationManager } from './manager.js';
import { MigrationRegistry } from './registry.js';
import { DirectorySource, ManifestSource } from './sources.js';
import type { MigrationManifest, MigrationSource } from './sources.js';
import { builtinManifest } from './scripts/index.js';

export { MigrationManager } from './manager.js';
export { MigrationRegistry } from './registry.js';
export { MigrationLedger, LEDGER_TABLE } from './ledger.js';
export { ManifestSource, DirectorySource } from './sources.js';
export type { MigrationSource, MigrationManifest } from './sources.js';
export {
  validateMigrationName,
  parseMigrationVersion,
  parseMigrationDescription,
  generateMigrationFilename,
  MIGRATION_NAME_PATTERN,
  MIGRATION_FILE_PATTERN,
  RUNTIME_MIGRATION_FILE_PATTERN
} from './naming.js';
export type { MigrationFileExtension } from './naming.js';
export type {
  MigrationModule,
  MigrationOperation,
  MigrationDirection,
  LoadedMigration,
  LedgerRecord,
  MigrationStatus
} from './types.js';
export { builtinManifest } from './scripts/index.js';

export interface MigrationManagerOptions {
  db: DatabaseExecutor;
  /** Directory of migration modules; takes precedence over `manifest` */
  migrationsDir?: string;
  manifest?: MigrationManifest;
  /** Fully custom source; takes precedence over both */
  source?: MigrationSource;
}

export function createMigrationSource(options: Omit<MigrationManagerOptions, 'db'>): MigrationSource {
  if (options.source) {
    return options.source;
  }
  if (options.migrationsDir) {
    return new DirectorySource(options.migrationsDir);
  }
  return new ManifestSource(options.manifest ?? builtinManifest);
}

/**
 * Build a manager for one process or test context
 */
export function createMigrationManager(options: MigrationManagerOptions): MigrationManager {
  const registry = new MigrationRegistry(createMigrationSource(options));
  return new MigrationManager(options.db, registry, new MigrationLedger(options.db));
}

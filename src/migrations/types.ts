/**
 * Migration system types
 */

import type { DatabaseExecutor } from '../database/types.js';

export type MigrationDirection = 'up' | 'down';

export type MigrationOperation = (db: DatabaseExecutor) => Promise<void>;

/**
 * Contract of a migration module (`NNN_description.ts`)
 * Both functions perform one direction of the schema change and throw on failure.
 */
export interface MigrationModule {
  up: MigrationOperation;
  down: MigrationOperation;
}

/**
 * A migration resolved from its source.
 * Operations the module does not export are absent; the manager reports
 * them when that direction is requested.
 */
export interface LoadedMigration {
  /** `{version}_{description}`, e.g. `001_create_agent_memory` */
  name: string;
  /** Zero-padded ordinal, e.g. `001` */
  version: string;
  description: string;
  up?: MigrationOperation;
  down?: MigrationOperation;
}

/**
 * Row of the schema_migrations table
 */
export interface LedgerRecord {
  /** Applied migration name */
  version: string;
  appliedAt: Date;
}

export interface MigrationStatus {
  /** Last applied migration, null on a fresh database */
  current: string | null;
  applied: LedgerRecord[];
  /** Discovered migrations not yet in the ledger, in run order */
  pending: string[];
}

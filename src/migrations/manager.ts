import type { DatabaseExecutor } from '../database/types.js';
import type { LedgerRecord, MigrationDirection, MigrationStatus } from './types.js';
import { MigrationLedger } from './ledger.js';
import { MigrationRegistry } from './registry.js';
import {
  InvalidMigrationFormatError,
  MigrationExecutionError,
  MigrationFileNotFoundError,
  MigrationNotFoundError
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Migration manager
 *
 * Applies pending migrations in version order and rolls back single versions.
 * Every run is fail-fast: the first error aborts it and the ledger keeps
 * exactly the migrations that completed.
 *
 * A migration and its ledger write are not wrapped in one transaction, so a
 * migration that fails halfway may leave schema changes behind without a
 * ledger record.
 */
export class MigrationManager {
  constructor(
    private readonly db: DatabaseExecutor,
    private readonly registry: MigrationRegistry,
    private readonly ledger: MigrationLedger = new MigrationLedger(db)
  ) {}

  async ensureMigrationTable(): Promise<void> {
    await this.ledger.ensureTable();
  }

  async getAppliedMigrations(): Promise<LedgerRecord[]> {
    return this.ledger.listApplied();
  }

  async isMigrationApplied(version: string): Promise<boolean> {
    return this.ledger.isApplied(version);
  }

  async discoverMigrationFiles(): Promise<string[]> {
    return this.registry.discover();
  }

  getMigrationName(location: string): string {
    return this.registry.nameOf(location);
  }

  /**
   * Run one migration in the given direction and update the ledger:
   * record after `up`, remove the record after `down`.
   */
  async runMigration(location: string, direction: MigrationDirection = 'up'): Promise<void> {
    if (!await this.registry.exists(location)) {
      throw new MigrationFileNotFoundError(location);
    }

    const name = this.registry.nameOf(location);
    logger.debug(`[MigrationManager] Starting migration: ${name} (${direction})`);

    try {
      const migration = await this.registry.load(location);
      const operation = migration[direction];

      if (!operation) {
        throw new InvalidMigrationFormatError(direction);
      }

      await operation(this.db);

      if (direction === 'up') {
        await this.ledger.record(name);
      } else {
        await this.ledger.unrecord(name);
      }

      logger.debug(`[MigrationManager] Migration ${name} executed successfully (${direction})`);
    } catch (error: unknown) {
      throw new MigrationExecutionError(name, error);
    }
  }

  /**
   * Apply every pending migration in version order
   * @returns Names applied during this call
   */
  async applyAllMigrations(): Promise<string[]> {
    await this.ensureMigrationTable();

    const locations = await this.registry.discover();
    const applied: string[] = [];

    for (const location of locations) {
      const name = this.registry.nameOf(location);

      if (await this.ledger.isApplied(name)) {
        logger.debug(`[MigrationManager] Migration already applied: ${name}`);
        continue;
      }

      await this.runMigration(location, 'up');
      applied.push(name);
      logger.success(`Applied migration: ${name}`);
    }

    logger.debug(
      `[MigrationManager] Migration run complete: ${applied.length} applied, ${locations.length - applied.length} skipped`
    );
    return applied;
  }

  /**
   * Roll back one applied migration.
   * Rolling back a version that is not applied, including on a database
   * without a ledger table, only logs a warning.
   *
   * @returns Whether a rollback ran
   */
  async rollbackMigration(version: string): Promise<boolean> {
    if (!await this.ledger.exists() || !await this.ledger.isApplied(version)) {
      logger.warn(`Migration ${version} is not applied`);
      return false;
    }

    const locations = await this.registry.discover();
    const target = locations.find(location => this.registry.nameOf(location) === version);

    if (!target) {
      throw new MigrationNotFoundError(version);
    }

    await this.runMigration(target, 'down');
    logger.success(`Rolled back migration: ${version}`);
    return true;
  }

  /**
   * Applied and pending migrations. Read-only: a database without a ledger
   * table reports every migration as pending.
   */
  async getStatus(): Promise<MigrationStatus> {
    const applied = await this.ledger.exists() ? await this.ledger.listApplied() : [];
    const appliedNames = new Set(applied.map(record => record.version));
    const locations = await this.registry.discover();
    const pending = locations
      .map(location => this.registry.nameOf(location))
      .filter(name => !appliedNames.has(name));

    const last = applied[applied.length - 1];
    return {
      current: last ? last.version : null,
      applied,
      pending
    };
  }

  async hasPending(): Promise<boolean> {
    const { pending } = await this.getStatus();
    return pending.length > 0;
  }
}

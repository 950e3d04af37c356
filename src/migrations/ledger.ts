import type { DatabaseExecutor, Row } from '../database/types.js';
import type { LedgerRecord } from './types.js';
import { logger } from '../utils/logger.js';

export const LEDGER_TABLE = 'schema_migrations';

/**
 * Migration ledger
 * Tracks which migrations have been applied in the schema_migrations table
 */
export class MigrationLedger {
  constructor(private readonly db: DatabaseExecutor) {}

  /**
   * Create the ledger table if missing. Safe to call on every startup.
   */
  async ensureTable(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS ${LEDGER_TABLE} (
        version VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);
    logger.debug('[MigrationLedger] Migration table ensured');
  }

  /**
   * Whether the ledger table exists, without creating it
   */
  async exists(): Promise<boolean> {
    const present = await this.db.fetchval(`SELECT to_regclass('${LEDGER_TABLE}') IS NOT NULL`);
    return present === true;
  }

  /**
   * Applied migrations, ascending by version
   */
  async listApplied(): Promise<LedgerRecord[]> {
    const rows = await this.db.fetch(
      `SELECT version, applied_at FROM ${LEDGER_TABLE} ORDER BY version`
    );
    logger.debug(`[MigrationLedger] Loaded ledger: ${rows.length} migration(s) recorded`);
    return rows.map(toLedgerRecord);
  }

  async isApplied(version: string): Promise<boolean> {
    const applied = await this.db.fetchval(
      `SELECT EXISTS (SELECT 1 FROM ${LEDGER_TABLE} WHERE version = $1)`,
      version
    );
    return applied === true;
  }

  /**
   * Record a migration as applied.
   * A second record of the same version fails on the primary key.
   */
  async record(version: string): Promise<void> {
    await this.db.execute(`INSERT INTO ${LEDGER_TABLE} (version) VALUES ($1)`, version);
    logger.debug(`[MigrationLedger] Migration ${version} recorded`);
  }

  /**
   * Remove a migration record. Nothing happens when it is absent.
   */
  async unrecord(version: string): Promise<void> {
    await this.db.execute(`DELETE FROM ${LEDGER_TABLE} WHERE version = $1`, version);
    logger.debug(`[MigrationLedger] Migration ${version} record removed`);
  }
}

function toLedgerRecord(row: Row): LedgerRecord {
  const { version, applied_at: appliedAt } = row;
  if (typeof version !== 'string') {
    throw new TypeError(`Unexpected ${LEDGER_TABLE}.version value: ${String(version)}`);
  }
  if (appliedAt instanceof Date) {
    return { version, appliedAt };
  }
  if (typeof appliedAt === 'string' || typeof appliedAt === 'number') {
    return { version, appliedAt: new Date(appliedAt) };
  }
  throw new TypeError(`Unexpected ${LEDGER_TABLE}.applied_at value for ${version}`);
}

import type { DatabaseExecutor } from '../../database/types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Migration 002: tasks table
 *
 * UUID key, status/priority columns with CHECK constraints, JSONB metadata
 * and a trigger keeping updated_at current.
 */

const INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status)',
  'CREATE INDEX IF NOT EXISTS idx_tasks_priority ON tasks(priority)',
  'CREATE INDEX IF NOT EXISTS idx_tasks_agent_id ON tasks(agent_id) WHERE agent_id IS NOT NULL',
  'CREATE INDEX IF NOT EXISTS idx_tasks_channel_id ON tasks(channel_id) WHERE channel_id IS NOT NULL',
  'CREATE INDEX IF NOT EXISTS idx_tasks_created_at ON tasks(created_at)',
  'CREATE INDEX IF NOT EXISTS idx_tasks_updated_at ON tasks(updated_at)',
  'CREATE INDEX IF NOT EXISTS idx_tasks_status_priority ON tasks(status, priority)',
  'CREATE INDEX IF NOT EXISTS idx_tasks_agent_status ON tasks(agent_id, status) WHERE agent_id IS NOT NULL',
  'CREATE INDEX IF NOT EXISTS idx_tasks_channel_status ON tasks(channel_id, status) WHERE channel_id IS NOT NULL',
  'CREATE INDEX IF NOT EXISTS idx_tasks_metadata ON tasks USING gin(metadata)'
];

const CONSTRAINTS: Array<[name: string, check: string]> = [
  ['check_tasks_status', "status IN ('pending', 'in_progress', 'completed', 'failed', 'cancelled')"],
  ['check_tasks_priority', "priority IN ('low', 'medium', 'high', 'critical')"],
  ['check_tasks_title_length', 'LENGTH(title) >= 1 AND LENGTH(title) <= 200'],
  ['check_tasks_description_length', 'LENGTH(description) <= 2000'],
  ['check_tasks_agent_id_length', 'agent_id IS NULL OR LENGTH(agent_id) <= 100'],
  ['check_tasks_channel_id_format', "channel_id IS NULL OR channel_id ~ '^[0-9]{17,19}$'"]
];

export async function up(db: DatabaseExecutor): Promise<void> {
  await db.execute(`
    CREATE TABLE IF NOT EXISTS tasks (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      title VARCHAR(200) NOT NULL,
      description TEXT NOT NULL,
      status VARCHAR(20) NOT NULL DEFAULT 'pending',
      priority VARCHAR(20) NOT NULL DEFAULT 'medium',
      agent_id VARCHAR(100),
      channel_id VARCHAR(19),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      metadata JSONB NOT NULL DEFAULT '{}'::jsonb
    )
  `);

  for (const statement of INDEXES) {
    await db.execute(statement);
  }
  logger.debug(`[002_create_tasks_table] ${INDEXES.length} indexes created`);

  await db.execute(`
    CREATE OR REPLACE FUNCTION update_tasks_updated_at()
    RETURNS TRIGGER AS $$
    BEGIN
      NEW.updated_at = NOW();
      RETURN NEW;
    END;
    $$ LANGUAGE plpgsql
  `);
  await db.execute(`
    CREATE TRIGGER trigger_tasks_updated_at
      BEFORE UPDATE ON tasks
      FOR EACH ROW
      EXECUTE FUNCTION update_tasks_updated_at()
  `);

  for (const [name, check] of CONSTRAINTS) {
    try {
      await db.execute(`ALTER TABLE tasks ADD CONSTRAINT ${name} CHECK (${check})`);
    } catch (error: unknown) {
      if (!getErrorMessage(error).includes('already exists')) {
        throw error;
      }
      logger.debug(`[002_create_tasks_table] Constraint ${name} already exists, skipping`);
    }
  }

  logger.debug('[002_create_tasks_table] tasks table ready');
}

export async function down(db: DatabaseExecutor): Promise<void> {
  await db.execute('DROP TRIGGER IF EXISTS trigger_tasks_updated_at ON tasks');
  await db.execute('DROP FUNCTION IF EXISTS update_tasks_updated_at()');
  await db.execute('DROP TABLE IF EXISTS tasks CASCADE');
  logger.debug('[002_create_tasks_table] tasks table dropped');
}

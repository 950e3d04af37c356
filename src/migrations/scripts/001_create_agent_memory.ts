import type { DatabaseExecutor } from '../../database/types.js';
import { logger } from '../../utils/logger.js';

/**
 * Migration 001: agent_memory table with pgvector embeddings
 *
 * 1536-dimension embedding column, IVFFlat cosine index, GIN index on
 * metadata and a descending index on created_at.
 */

export async function up(db: DatabaseExecutor): Promise<void> {
  await db.execute('CREATE EXTENSION IF NOT EXISTS vector');
  logger.debug('[001_create_agent_memory] pgvector extension enabled');

  await db.execute(`
    CREATE TABLE agent_memory (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      content TEXT NOT NULL,
      embedding vector(1536),
      metadata JSONB,
      created_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);

  await db.execute(`
    CREATE INDEX idx_agent_memory_embedding
      ON agent_memory
      USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
  `);
  await db.execute('CREATE INDEX idx_agent_memory_metadata ON agent_memory USING gin (metadata)');
  await db.execute('CREATE INDEX idx_agent_memory_created_at ON agent_memory (created_at DESC)');

  logger.debug('[001_create_agent_memory] agent_memory table and indexes created');
}

export async function down(db: DatabaseExecutor): Promise<void> {
  // Indexes go with the table; the extension stays for other users
  await db.execute('DROP TABLE IF EXISTS agent_memory');
  logger.debug('[001_create_agent_memory] agent_memory table dropped');
}

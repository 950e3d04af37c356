/**
 * Migration Context Helper
 *
 * Builds a fresh manager over an in-memory executor before each test and
 * drops it afterwards, so no state leaks between tests.
 *
 * Usage:
 *   const ctx = setupMigrationContext(() => ({ '001_a.ts': { up, down } }));
 *
 *   it('applies', async () => {
 *     await ctx.manager.applyAllMigrations();
 *   });
 */

import { afterEach, beforeEach } from 'vitest';
import { InMemoryExecutor } from './in-memory-executor.js';
import { createMigrationManager } from '../../src/migrations/index.js';
import type { MigrationManager, MigrationManifest } from '../../src/migrations/index.js';

export interface MigrationContext {
  readonly db: InMemoryExecutor;
  readonly manager: MigrationManager;
}

export function setupMigrationContext(manifest: () => MigrationManifest): MigrationContext {
  let current: MigrationContext | null = null;

  beforeEach(() => {
    const db = new InMemoryExecutor();
    current = { db, manager: createMigrationManager({ db, manifest: manifest() }) };
  });

  afterEach(() => {
    current = null;
  });

  const active = (): MigrationContext => {
    if (!current) {
      throw new Error('Migration context used outside a test');
    }
    return current;
  };

  return {
    get db() {
      return active().db;
    },
    get manager() {
      return active().manager;
    }
  };
}

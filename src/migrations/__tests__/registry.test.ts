/**
 * Migration Registry Tests
 *
 * Discovery, naming and loading over both manifest and directory sources
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MigrationRegistry } from '../registry.js';
import { DirectorySource, ManifestSource } from '../sources.js';
import { MigrationLoadError } from '../../utils/errors.js';
import { TempWorkspace } from '../../../tests/helpers/temp-workspace.js';
import { InMemoryExecutor } from '../../../tests/helpers/in-memory-executor.js';

vi.mock('../../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

describe('MigrationRegistry', () => {
  describe('with a directory source', () => {
    let workspace: TempWorkspace;
    let registry: MigrationRegistry;

    beforeEach(() => {
      workspace = new TempWorkspace();
      workspace.writeMigration('migrations/010_c.mjs', { up: "await db.execute('SELECT 10');", down: '' });
      workspace.writeMigration('migrations/002_b.mjs', { up: "await db.execute('SELECT 2');", down: '' });
      workspace.writeMigration('migrations/001_a.mjs', { up: "await db.execute('CREATE TABLE a (id INT)');" });
      workspace.writeFile('migrations/README.md', '# notes\n');
      workspace.writeFile('migrations/index.ts', 'export {};\n');
      workspace.writeFile('migrations/_shared.mjs', 'export const x = 1;\n');
      workspace.writeFile('migrations/003_types.d.ts', 'export {};\n');
      workspace.writeFile('migrations/005_uncompiled.ts', 'export async function up(): Promise<void> {}\n');
      registry = new MigrationRegistry(new DirectorySource(workspace.resolve('migrations')));
    });

    afterEach(() => {
      workspace.cleanup();
    });

    it('should discover migration files in version order', async () => {
      const discovered = await registry.discover();

      expect(discovered).toEqual([
        workspace.resolve('migrations/001_a.mjs'),
        workspace.resolve('migrations/002_b.mjs'),
        workspace.resolve('migrations/010_c.mjs')
      ]);
    });

    it('should leave out TypeScript sources that Node cannot import', async () => {
      const discovered = await registry.discover();

      expect(discovered).not.toContain(workspace.resolve('migrations/005_uncompiled.ts'));
      expect(discovered).toHaveLength(3);
    });

    it('should return the same sequence on repeated discovery', async () => {
      const first = await registry.discover();
      const second = await registry.discover();

      expect(second).toEqual(first);
    });

    it('should return an empty list for a missing directory', async () => {
      const missing = new MigrationRegistry(new DirectorySource(workspace.resolve('never-created')));

      expect(await missing.discover()).toEqual([]);
    });

    it('should derive names by stripping directory and extension', () => {
      expect(registry.nameOf(workspace.resolve('migrations/002_b.mjs'))).toBe('002_b');
      expect(registry.nameOf('C:\\deploy\\migrations\\007_add_roles.js')).toBe('007_add_roles');
    });

    it('should report whether a location exists', async () => {
      expect(await registry.exists(workspace.resolve('migrations/001_a.mjs'))).toBe(true);
      expect(await registry.exists(workspace.resolve('migrations/404_gone.mjs'))).toBe(false);
    });

    it('should load a migration module with its operations', async () => {
      const migration = await registry.load(workspace.resolve('migrations/001_a.mjs'));

      expect(migration.name).toBe('001_a');
      expect(migration.version).toBe('001');
      expect(migration.description).toBe('a');
      expect(migration.down).toBeUndefined();

      const db = new InMemoryExecutor();
      await migration.up?.(db);
      expect(db.statements).toEqual(['CREATE TABLE a (id INT)']);
    });

    it('should wrap import failures in MigrationLoadError', async () => {
      const broken = workspace.writeFile('migrations/004_broken.mjs', 'export async function up( {\n');

      await expect(registry.load(broken)).rejects.toThrow(MigrationLoadError);
    });

    it('should reject locations whose name has no description', async () => {
      const unnamed = workspace.writeMigration('migrations/042_.mjs', { up: '', down: '' });

      await expect(registry.load(unnamed)).rejects.toThrow(
        `Failed to load migration ${unnamed}: Invalid migration name format: 042_`
      );
    });

    it('should reject locations whose name has no version', async () => {
      const unversioned = workspace.writeMigration('migrations/abc_x.mjs', { up: '', down: '' });

      await expect(registry.load(unversioned)).rejects.toThrow(
        `Failed to load migration ${unversioned}: Invalid migration name format: abc_x`
      );
    });
  });

  describe('with a manifest source', () => {
    const up = vi.fn(async () => undefined);
    const down = vi.fn(async () => undefined);

    const registry = new MigrationRegistry(new ManifestSource({
      '002_add_index.ts': { up, down },
      '001_init.ts': { up },
      'notes.ts': { up }
    }));

    it('should discover manifest entries in version order', async () => {
      expect(await registry.discover()).toEqual(['001_init.ts', '002_add_index.ts']);
      expect(registry.origin).toBe('manifest');
    });

    it('should only report manifest entries as existing', async () => {
      expect(await registry.exists('001_init.ts')).toBe(true);
      expect(await registry.exists('/somewhere/else/001_init.ts')).toBe(true);
      expect(await registry.exists('003_missing.ts')).toBe(false);
    });

    it('should call through to the module operations', async () => {
      const migration = await registry.load('002_add_index.ts');
      const db = new InMemoryExecutor();

      await migration.down?.(db);

      expect(down).toHaveBeenCalledWith(db);
      expect(up).not.toHaveBeenCalled();
    });

    it('should fail to load locations missing from the manifest', async () => {
      await expect(registry.load('003_missing.ts')).rejects.toThrow(
        'Failed to load migration 003_missing.ts: No manifest entry for 003_missing.ts'
      );
    });
  });
});

import type { LoadedMigration, MigrationOperation } from './types.js';
import type { MigrationSource } from './sources.js';
import { parseMigrationDescription, parseMigrationVersion } from './naming.js';
import { MigrationLoadError, getErrorMessage } from '../utils/errors.js';
import { getFilename, getStem } from '../utils/paths.js';
import { logger } from '../utils/logger.js';

/**
 * Migration registry
 * Lists the migrations a source provides, in version order, and loads them
 */
export class MigrationRegistry {
  constructor(private readonly source: MigrationSource) {}

  get origin(): string {
    return this.source.origin;
  }

  /**
   * Migration locations sorted by file name.
   * The 3-digit prefix makes that the same as version order.
   */
  async discover(): Promise<string[]> {
    const entries = await this.source.list();
    const migrations = entries
      .filter(entry => isMigrationFile(getFilename(entry), this.source.filePattern))
      .sort((a, b) => compareFilenames(getFilename(a), getFilename(b)));

    logger.debug(`[MigrationRegistry] Discovered ${migrations.length} migration(s) in ${this.source.origin}`);
    return migrations;
  }

  /**
   * Migration name of a location: basename without extension
   */
  nameOf(location: string): string {
    return getStem(location);
  }

  async exists(location: string): Promise<boolean> {
    return this.source.exists(location);
  }

  /**
   * Resolve a location into a migration.
   * Missing `up`/`down` exports are left for the caller to report.
   */
  async load(location: string): Promise<LoadedMigration> {
    const name = this.nameOf(location);

    let version: string;
    let description: string;
    try {
      version = parseMigrationVersion(name);
      description = parseMigrationDescription(name);
    } catch (error: unknown) {
      throw new MigrationLoadError(location, getErrorMessage(error), error);
    }

    let loaded: unknown;
    try {
      loaded = await this.source.import(location);
    } catch (error: unknown) {
      throw new MigrationLoadError(location, getErrorMessage(error), error);
    }

    if (typeof loaded !== 'object' || loaded === null) {
      throw new MigrationLoadError(location, 'module did not resolve to an object');
    }

    logger.debug(`[MigrationRegistry] Loaded migration ${name}`);

    return {
      name,
      version,
      description,
      up: pickOperation(loaded, 'up'),
      down: pickOperation(loaded, 'down')
    };
  }
}

function isMigrationFile(filename: string, pattern: RegExp): boolean {
  if (filename.endsWith('.d.ts')) {
    return false;
  }
  return pattern.test(filename);
}

function compareFilenames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function pickOperation(loaded: object, key: 'up' | 'down'): MigrationOperation | undefined {
  const candidate: unknown = Reflect.get(loaded, key);
  if (typeof candidate !== 'function') {
    return undefined;
  }
  return async (db) => {
    await Reflect.apply(candidate, loaded, [db]);
  };
}

import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';
import type { MigrationModule } from './types.js';
import { MIGRATION_FILE_PATTERN, RUNTIME_MIGRATION_FILE_PATTERN } from './naming.js';
import { getFilename } from '../utils/paths.js';

/**
 * Where migration modules come from.
 * Locations are file names or paths whose basename is `NNN_description.ext`.
 */
export interface MigrationSource {
  /** Human-readable origin, used in log messages */
  readonly origin: string;

  /** File names this source can load */
  readonly filePattern: RegExp;

  /** Every entry the source holds; filtering is the registry's job */
  list(): Promise<string[]>;

  exists(location: string): Promise<boolean>;

  /** Resolve the module behind a location */
  import(location: string): Promise<unknown>;
}

/**
 * Build-time manifest: file name → statically imported module
 */
export type MigrationManifest = Readonly<Record<string, Partial<MigrationModule>>>;

/**
 * Source backed by a manifest compiled into the package.
 * No code is loaded at run time beyond what the manifest imports.
 */
export class ManifestSource implements MigrationSource {
  readonly origin = 'manifest';
  readonly filePattern = MIGRATION_FILE_PATTERN;

  constructor(private readonly manifest: MigrationManifest) {}

  async list(): Promise<string[]> {
    return Object.keys(this.manifest);
  }

  async exists(location: string): Promise<boolean> {
    return Object.hasOwn(this.manifest, getFilename(location));
  }

  async import(location: string): Promise<unknown> {
    const filename = getFilename(location);
    if (!Object.hasOwn(this.manifest, filename)) {
      throw new Error(`No manifest entry for ${filename}`);
    }
    return this.manifest[filename];
  }
}

/**
 * Source that scans a directory of JavaScript migration modules and loads
 * them with dynamic import. `.ts` files are not listed: Node cannot import
 * them without a compiler. A missing directory holds no migrations.
 */
export class DirectorySource implements MigrationSource {
  readonly directory: string;
  readonly filePattern = RUNTIME_MIGRATION_FILE_PATTERN;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  get origin(): string {
    return this.directory;
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error: unknown) {
      if (isMissingPath(error)) {
        return [];
      }
      throw error;
    }
    return entries.map(entry => path.join(this.directory, entry));
  }

  async exists(location: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolve(location));
      return stats.isFile();
    } catch (error: unknown) {
      if (isMissingPath(error)) {
        return false;
      }
      throw error;
    }
  }

  async import(location: string): Promise<unknown> {
    return import(pathToFileURL(this.resolve(location)).href);
  }

  private resolve(location: string): string {
    return path.isAbsolute(location) ? location : path.join(this.directory, location);
  }
}

function isMissingPath(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

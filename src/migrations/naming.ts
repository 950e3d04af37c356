import { InvalidMigrationNameError } from '../utils/errors.js';

/** `NNN_description`, description limited to letters and underscores */
export const MIGRATION_NAME_PATTERN = /^\d{3}_[a-zA-Z_]+$/;

/** Manifest entries: a 3-digit prefix and a module extension */
export const MIGRATION_FILE_PATTERN = /^\d{3}_.*\.(ts|js|mjs|cjs)$/;

/** Files a directory source can import at run time without a compiler */
export const RUNTIME_MIGRATION_FILE_PATTERN = /^\d{3}_.*\.(js|mjs|cjs)$/;

export type MigrationFileExtension = 'ts' | 'js' | 'mjs' | 'cjs';

export const VERSION_WIDTH = 3;

const MAX_VERSION = 10 ** VERSION_WIDTH - 1;

export function validateMigrationName(name: string): boolean {
  if (!name) {
    return false;
  }
  return MIGRATION_NAME_PATTERN.test(name);
}

/**
 * Extract the version prefix from a migration name.
 * A description must follow the separator.
 *
 * @example
 * parseMigrationVersion('042_add_feature') // => '042'
 */
export function parseMigrationVersion(name: string): string {
  const separator = name.indexOf('_');
  if (separator === -1) {
    throw new InvalidMigrationNameError(name);
  }

  const version = name.slice(0, separator);
  if (version.length !== VERSION_WIDTH || !/^\d+$/.test(version) || separator === name.length - 1) {
    throw new InvalidMigrationNameError(name);
  }

  return version;
}

/**
 * Description part of a migration name (everything after the version)
 */
export function parseMigrationDescription(name: string): string {
  const version = parseMigrationVersion(name);
  return name.slice(version.length + 1);
}

export function formatVersion(ordinal: number): string {
  return String(ordinal).padStart(VERSION_WIDTH, '0');
}

/**
 * File name for a new migration, numbered after the highest existing version
 *
 * @param description - Slug of letters and underscores
 * @param existing - Names or file names already present
 *
 * @example
 * generateMigrationFilename('add_index', ['001_init.mjs', '002_users.mjs']) // => '003_add_index.mjs'
 */
export function generateMigrationFilename(
  description: string,
  existing: string[] = [],
  extension: MigrationFileExtension = 'mjs'
): string {
  let highest = 0;
  for (const entry of existing) {
    const prefix = /^(\d{3})_/.exec(entry);
    if (prefix?.[1]) {
      highest = Math.max(highest, Number(prefix[1]));
    }
  }

  if (highest >= MAX_VERSION) {
    throw new InvalidMigrationNameError(`${formatVersion(highest + 1)}_${description}`);
  }

  const name = `${formatVersion(highest + 1)}_${description}`;
  if (!validateMigrationName(name)) {
    throw new InvalidMigrationNameError(name);
  }

  return `${name}.${extension}`;
}

/**
 * Path Utilities
 *
 * - Migration file name handling (basename without extension)
 * - schema-ledger home directory resolution
 * - ESM module path utilities
 */

import path from 'path';
import { homedir } from 'os';
import { fileURLToPath } from 'url';

/**
 * Normalize path separators to forward slashes for cross-platform consistency
 *
 * @example
 * normalizePathSeparators('C:\\migrations\\001_init.ts')
 * // Returns: 'C:/migrations/001_init.ts'
 */
export function normalizePathSeparators(filePath: string): string {
  return filePath.replaceAll('\\', '/');
}

/**
 * Get the last path segment, whichever separator the path uses
 *
 * @example
 * getFilename('C:\\migrations\\001_init.ts') // => '001_init.ts'
 * getFilename('/srv/migrations/001_init.ts') // => '001_init.ts'
 */
export function getFilename(filePath: string): string {
  const parts = normalizePathSeparators(filePath).split('/');
  return parts[parts.length - 1] ?? '';
}

/**
 * Strip directory and extension from a path.
 * Declaration files lose the whole `.d.ts` suffix.
 *
 * @example
 * getStem('/srv/migrations/042_add_feature.ts') // => '042_add_feature'
 */
export function getStem(filePath: string): string {
  const filename = getFilename(filePath);
  if (filename.endsWith('.d.ts')) {
    return filename.slice(0, -'.d.ts'.length);
  }
  const dot = filename.lastIndexOf('.');
  return dot > 0 ? filename.slice(0, dot) : filename;
}

/**
 * Get schema-ledger home directory
 *
 * Respects SCHEMA_LEDGER_HOME for custom locations and test isolation,
 * otherwise `~/.schema-ledger`.
 */
export function getSchemaLedgerHome(): string {
  if (process.env.SCHEMA_LEDGER_HOME) {
    return process.env.SCHEMA_LEDGER_HOME;
  }

  return path.join(homedir(), '.schema-ledger');
}

/**
 * Get the directory name of the current module (ESM equivalent of __dirname)
 *
 * @param importMetaUrl - Pass import.meta.url from the calling module
 *
 * @example
 * const __dirname = getDirname(import.meta.url);
 */
export function getDirname(importMetaUrl: string): string {
  return path.dirname(fileURLToPath(importMetaUrl));
}

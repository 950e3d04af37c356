export class SchemaLedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaLedgerError';
  }
}

export class ConfigurationError extends SchemaLedgerError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MigrationFileNotFoundError extends SchemaLedgerError {
  constructor(location: string) {
    super(`Migration file not found: ${location}`);
    this.name = 'MigrationFileNotFoundError';
  }
}

export class InvalidMigrationFormatError extends SchemaLedgerError {
  constructor(direction: string) {
    super(`Invalid migration format: missing '${direction}' function`);
    this.name = 'InvalidMigrationFormatError';
  }
}

export class MigrationNotFoundError extends SchemaLedgerError {
  constructor(version: string) {
    super(`Migration file not found for version: ${version}`);
    this.name = 'MigrationNotFoundError';
  }
}

export class MigrationLoadError extends SchemaLedgerError {
  constructor(location: string, reason: string, cause?: unknown) {
    super(`Failed to load migration ${location}: ${reason}`, { cause });
    this.name = 'MigrationLoadError';
  }
}

export class InvalidMigrationNameError extends SchemaLedgerError {
  constructor(name: string) {
    super(`Invalid migration name format: ${name}`);
    this.name = 'InvalidMigrationNameError';
  }
}

/**
 * Raised for any failure while a migration runs, including the ledger update
 * that follows it. The original error is kept as `cause`.
 */
export class MigrationExecutionError extends SchemaLedgerError {
  readonly migration: string;

  constructor(migration: string, cause: unknown) {
    super(`Migration execution failed: ${getErrorMessage(cause)}`, { cause });
    this.name = 'MigrationExecutionError';
    this.migration = migration;
  }
}

export class DatabaseError extends SchemaLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatabaseError';
  }
}

export class DatabaseNotInitializedError extends DatabaseError {
  constructor() {
    super('Database not initialized. Call initialize() first.');
    this.name = 'DatabaseNotInitializedError';
  }
}

export class QueryError extends DatabaseError {
  readonly code?: string;

  constructor(message: string, cause: unknown, code?: string) {
    super(message, { cause });
    this.name = 'QueryError';
    this.code = code;
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

import { describe, it, expect } from 'vitest';
import {
  SchemaLedgerError,
  MigrationExecutionError,
  MigrationNotFoundError,
  MigrationLoadError,
  QueryError,
  DatabaseError,
  getErrorMessage
} from '../errors.js';

describe('errors', () => {
  it('should keep the original error as cause of an execution failure', () => {
    const cause = new Error('deadlock detected');
    const error = new MigrationExecutionError('003_add_index', cause);

    expect(error.message).toBe('Migration execution failed: deadlock detected');
    expect(error.cause).toBe(cause);
    expect(error.migration).toBe('003_add_index');
    expect(error.name).toBe('MigrationExecutionError');
    expect(error).toBeInstanceOf(SchemaLedgerError);
  });

  it('should describe non-Error causes', () => {
    expect(new MigrationExecutionError('001_a', 'socket hang up').message).toBe(
      'Migration execution failed: socket hang up'
    );
  });

  it('should name the missing version', () => {
    expect(new MigrationNotFoundError('007_gone').message).toBe('Migration file not found for version: 007_gone');
  });

  it('should include location and reason in load errors', () => {
    const error = new MigrationLoadError('/srv/migrations/001_a.js', 'Unexpected token');

    expect(error.message).toBe('Failed to load migration /srv/migrations/001_a.js: Unexpected token');
  });

  it('should classify query errors as database errors', () => {
    const error = new QueryError('PostgreSQL error: boom', new Error('boom'), '23505');

    expect(error).toBeInstanceOf(DatabaseError);
    expect(error.code).toBe('23505');
  });

  describe('getErrorMessage', () => {
    it('should use the message of Error instances', () => {
      expect(getErrorMessage(new TypeError('bad type'))).toBe('bad type');
    });

    it('should stringify anything else', () => {
      expect(getErrorMessage(42)).toBe('42');
      expect(getErrorMessage(undefined)).toBe('undefined');
    });
  });
});

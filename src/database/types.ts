/**
 * Database executor contract
 *
 * Everything the migration engine needs from a database. Implementations
 * throw on failure instead of returning sentinel values.
 */

/** A value bound to a `$n` placeholder */
export type QueryParam = string | number | boolean | Date | Buffer | null;

export type Row = Record<string, unknown>;

export interface DatabaseExecutor {
  /** Run a statement, resolving to the driver's command tag (e.g. `INSERT 0 1`) */
  execute(statement: string, ...params: QueryParam[]): Promise<string>;

  /** Run a query and return every row */
  fetch(query: string, ...params: QueryParam[]): Promise<Row[]>;

  /** First column of the first row, or null when no row came back */
  fetchval(query: string, ...params: QueryParam[]): Promise<unknown>;
}

export interface PoolSettings {
  connectionString: string;
  minConnections: number;
  maxConnections: number;
  /** Statement timeout in seconds */
  statementTimeout: number;
}

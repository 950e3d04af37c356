import pg from 'pg';
import type { Pool, PoolConfig, QueryResult } from 'pg';
import type { DatabaseExecutor, PoolSettings, QueryParam, Row } from './types.js';
import { DatabaseNotInitializedError, QueryError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** The slice of `pg.Pool` the executor relies on */
export interface QueryablePool {
  query(text: string, values?: QueryParam[]): Promise<QueryResult>;
  end(): Promise<void>;
}

export type PoolFactory = (config: PoolConfig) => QueryablePool;

const defaultPoolFactory: PoolFactory = (config) => {
  const pool: Pool = new pg.Pool(config);
  pool.on('error', (error) => {
    logger.error('[PostgresExecutor] Idle client error', error);
  });
  return pool;
};

function postgresCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * PostgreSQL executor backed by a `pg` connection pool
 *
 * `initialize()` must be called before any query; `close()` releases the pool.
 */
export class PostgresExecutor implements DatabaseExecutor {
  private pool: QueryablePool | null = null;

  constructor(
    private readonly settings: PoolSettings,
    private readonly poolFactory: PoolFactory = defaultPoolFactory
  ) {}

  async initialize(): Promise<void> {
    if (this.pool) return;

    logger.debug(
      `[PostgresExecutor] Creating pool (min=${this.settings.minConnections}, max=${this.settings.maxConnections})`
    );

    const pool = this.poolFactory({
      connectionString: this.settings.connectionString,
      min: this.settings.minConnections,
      max: this.settings.maxConnections,
      statement_timeout: this.settings.statementTimeout * 1000
    });

    try {
      await pool.query('SELECT 1');
    } catch (error: unknown) {
      await pool.end();
      throw new QueryError(`Database initialization failed: ${getErrorMessage(error)}`, error, postgresCode(error));
    }

    this.pool = pool;
    logger.debug('[PostgresExecutor] Pool initialized');
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = null;
    await pool.end();
    logger.debug('[PostgresExecutor] Pool closed');
  }

  isInitialized(): boolean {
    return this.pool !== null;
  }

  async execute(statement: string, ...params: QueryParam[]): Promise<string> {
    const result = await this.query(statement, params);
    if (result.rowCount === null) {
      return result.command;
    }
    // INSERT tags carry the legacy OID column, always 0
    return result.command === 'INSERT'
      ? `INSERT 0 ${result.rowCount}`
      : `${result.command} ${result.rowCount}`;
  }

  async fetch(query: string, ...params: QueryParam[]): Promise<Row[]> {
    const result = await this.query(query, params);
    return result.rows;
  }

  async fetchval(query: string, ...params: QueryParam[]): Promise<unknown> {
    const result = await this.query(query, params);
    const first = result.rows[0];
    const column = result.fields[0];
    if (!first || !column) return null;
    return first[column.name] ?? null;
  }

  private async query(text: string, params: QueryParam[]): Promise<QueryResult<Row>> {
    if (!this.pool) {
      throw new DatabaseNotInitializedError();
    }

    logger.debug(`[PostgresExecutor] Executing: ${text.trim().slice(0, 100)}`);

    try {
      const result: QueryResult<Row> = await this.pool.query(text, params);
      return result;
    } catch (error: unknown) {
      const code = postgresCode(error);
      const prefix = code === '42601' ? 'SQL syntax error' : 'PostgreSQL error';
      throw new QueryError(`${prefix}: ${getErrorMessage(error)}`, error, code);
    }
  }
}

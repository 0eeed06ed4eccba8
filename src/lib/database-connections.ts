// Database Connection Utility
// Destination (PostgreSQL) pool with transaction contexts, and source (SQL Server) pool factory

import { Pool, PoolClient, PoolConfig } from 'pg';
import * as sql from 'mssql';
import { DestinationDatabaseConfig, SourceDatabaseConfig } from './environment-config';
import { getLogger } from './error-handler';

export type SqlRow = Record<string, unknown>;

export interface QueryResult {
  rows: SqlRow[];
  rowCount: number;
  command: string;
}

/**
 * Minimal statement executor. Implemented by pg clients through PgExecutor and
 * by in-process stand-ins in tests.
 */
export interface SqlExecutor {
  query(text: string, params?: unknown[]): Promise<QueryResult>;
}

export interface TransactionContext {
  executor: SqlExecutor;
  rollback: () => Promise<void>;
  commit: () => Promise<void>;
}

/**
 * Anything able to open a destination transaction. The load orchestrator owns
 * the context it gets back until it commits or rolls back.
 */
export interface TransactionalDatabase {
  beginTransaction(): Promise<TransactionContext>;
}

/**
 * Adapts a checked-out pg client to SqlExecutor
 */
export class PgExecutor implements SqlExecutor {
  constructor(private readonly client: PoolClient) {}

  async query(text: string, params?: unknown[]): Promise<QueryResult> {
    const result = await this.client.query<SqlRow>(text, params);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? 0,
      command: result.command
    };
  }
}

export class DestinationConnectionManager implements TransactionalDatabase {
  private pool: Pool | null = null;

  constructor(private readonly config: DestinationDatabaseConfig) {}

  /**
   * Get or create the connection pool
   */
  getPool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    const poolConfig: PoolConfig = {
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
      max: this.config.max || 5,
      idleTimeoutMillis: this.config.idleTimeoutMillis || 10000,
      connectionTimeoutMillis: this.config.connectionTimeoutMillis || 30000,
      ssl: this.config.ssl ? { rejectUnauthorized: false } : false
    };

    const pool = new Pool(poolConfig);

    pool.on('error', (err) => {
      getLogger().error('Destination database pool error', err);
    });

    this.pool = pool;
    return pool;
  }

  /**
   * Check out one client and open a transaction on it. The client is released
   * once commit or rollback has run.
   */
  async beginTransaction(): Promise<TransactionContext> {
    const client = await this.getPool().connect();

    try {
      await client.query('BEGIN');
    } catch (error) {
      client.release(asError(error));
      throw error;
    }

    // A client whose COMMIT or ROLLBACK failed is destroyed, not returned to the pool
    let released = false;
    const finish = async (statement: 'COMMIT' | 'ROLLBACK'): Promise<void> => {
      if (released) {
        return;
      }
      try {
        await client.query(statement);
      } catch (error) {
        released = true;
        client.release(asError(error));
        throw error;
      }
      released = true;
      client.release();
    };

    return {
      executor: new PgExecutor(client),
      rollback: () => finish('ROLLBACK'),
      commit: () => finish('COMMIT')
    };
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
    }
  }
}

/**
 * Translate source configuration into an mssql pool configuration
 */
export function toMssqlConfig(config: SourceDatabaseConfig): sql.config {
  return {
    server: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    requestTimeout: config.requestTimeoutMillis,
    options: {
      encrypt: config.encrypt,
      trustServerCertificate: config.trustServerCertificate,
    },
  };
}

/**
 * Open a dedicated SQL Server pool. Callers close it when done.
 */
export async function connectSource(config: SourceDatabaseConfig): Promise<sql.ConnectionPool> {
  const pool = new sql.ConnectionPool(toMssqlConfig(config));
  return pool.connect();
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

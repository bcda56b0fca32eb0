/**
 * PostgreSQL Database Client
 *
 * Thin wrapper over a pg Pool. The client is created once at process start
 * and handed to everything that needs the database; nothing imports a shared
 * connection. Callers must close() it on every exit path.
 *
 * Note: query() returns rows directly, not QueryResult.
 */

import { Pool, type QueryResultRow } from 'pg';
import type { Config } from '../config';
import { logger } from '../config/logger';

/**
 * Minimal query surface used by repositories and routes.
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<T[]>;
}

export class DatabaseClient implements Queryable {
  private readonly pool: Pool;
  private closed = false;

  constructor(private readonly options: Config['database']) {
    this.pool = new Pool({
      host: options.host,
      port: options.port,
      database: options.database,
      user: options.user,
      password: options.password,
      ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
      max: options.maxConnections,
    });

    this.pool.on('error', (error) => {
      logger.error('DatabaseClient: Idle client error', { error: error.message });
    });
  }

  /**
   * Open a connection to verify credentials and reachability.
   */
  async connect(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
    logger.info('DatabaseClient: Connected', {
      host: this.options.host,
      port: this.options.port,
      database: this.options.database,
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<T[]> {
    const result = await this.pool.query<T>(sql, params);
    return result.rows;
  }

  /**
   * Close all connections. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.pool.end();
    logger.info('DatabaseClient: Connections closed');
  }
}

export function createDatabaseClient(options: Config['database']): DatabaseClient {
  return new DatabaseClient(options);
}

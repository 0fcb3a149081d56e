import { Pool, QueryResult, QueryResultRow } from 'pg';
import { DatabaseConfig } from '../types/config.types';
import { logger } from '../utils/logger';

/**
 * PostgreSQL connection pool for the credential database
 */
export class Database {
  private pool: Pool;
  private isConnected: boolean = false;

  constructor(options: DatabaseConfig, pool?: Pool) {
    this.pool =
      pool ??
      new Pool({
        connectionString: options.connectionString,
        host: options.host,
        port: options.port,
        database: options.database,
        user: options.user,
        password: options.password,
        ssl: options.ssl ? { rejectUnauthorized: false } : false,
        max: options.max,
        idleTimeoutMillis: options.idleTimeoutMillis,
        connectionTimeoutMillis: options.connectionTimeoutMillis,
      });

    // Handle pool errors
    this.pool.on('error', (err) => {
      logger.error('Unexpected database pool error:', { error: err.message });
    });

    // Handle successful connection
    this.pool.on('connect', () => {
      if (!this.isConnected) {
        logger.info('Database pool connected successfully');
        this.isConnected = true;
      }
    });
  }

  /**
   * Execute a query with parameters
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const start = Date.now();

    try {
      const result = await this.pool.query<T>(text, params);
      const duration = Date.now() - start;

      logger.debug('Query executed', {
        query: text.substring(0, 100), // Log first 100 chars
        duration: `${duration}ms`,
        rows: result.rowCount,
      });

      return result;
    } catch (error) {
      logger.error('Database query error:', {
        query: text.substring(0, 100),
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  /**
   * Test database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.query<{ now: Date }>('SELECT NOW() as now');
      logger.info('Database connection test successful:', {
        timestamp: result.rows[0]?.now,
      });
      return true;
    } catch (error) {
      logger.error('Database connection test failed:', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Close all connections in the pool
   */
  async close(): Promise<void> {
    try {
      await this.pool.end();
      this.isConnected = false;
      logger.info('Database pool closed');
    } catch (error) {
      logger.error('Error closing database pool:', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

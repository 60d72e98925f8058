import pg from 'pg';
import dotenv from 'dotenv';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const { Pool } = pg;
const logger = createLogger('DatabaseConfig');

/**
 * PostgreSQL Database Configuration
 *
 * Connection pool for the consolidated-record store. The engine only ever
 * inserts records and reads version numbers; it never updates or deletes.
 */
export class DatabaseConfig {
  private static pool: pg.Pool | null = null;

  /**
   * Get or create the PostgreSQL connection pool
   */
  static getPool(): pg.Pool {
    if (!this.pool) {
      this.pool = new Pool({
        host: process.env.PGHOST,
        port: parseInt(process.env.PGPORT || '5432', 10),
        user: process.env.PGUSER,
        password: process.env.PGPASSWORD,
        database: process.env.PGDATABASE || process.env.POSTGRES_DB,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 30000,
      });

      logger.info('Database pool initialized', {
        user: process.env.PGUSER,
        host: process.env.PGHOST,
        port: process.env.PGPORT,
        database: process.env.PGDATABASE,
      });
    }

    return this.pool;
  }

  /**
   * Test database connection
   */
  static async testConnection(): Promise<boolean> {
    try {
      const result = await this.getPool().query<{ now: Date }>('SELECT NOW() as now');
      logger.info('Database connection successful', { now: result.rows[0]?.now });
      return true;
    } catch (error) {
      logger.error('Database connection failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Close the connection pool
   * Should be called when shutting down the application
   */
  static async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      logger.info('Database pool closed');
    }
  }
}

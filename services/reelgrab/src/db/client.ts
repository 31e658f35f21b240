import {
  Pool,
  type PoolConfig,
  type QueryResultRow,
} from 'pg';
import type { AppConfig } from '../config.js';

export interface Queryable {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

export interface Database extends Queryable {
  withTransaction<T>(handler: (tx: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

function buildPoolConfig(config: AppConfig): PoolConfig {
  if (config.databaseUrl) {
    return {
      connectionString: config.databaseUrl,
      ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined,
    };
  }

  if (config.dbHost && config.dbUser && config.dbName) {
    return {
      host: config.dbHost,
      port: config.dbPort,
      user: config.dbUser,
      password: config.dbPassword || undefined,
      database: config.dbName,
      ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined,
    };
  }

  throw new Error('DATABASE_NOT_CONFIGURED');
}

/**
 * Wraps a pg pool. Tests pass an in-process pool with the same surface.
 */
export function createDatabase(pool: Pool): Database {
  return {
    async query<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
      const result = await pool.query<T>(text, params);
      return result.rows;
    },

    async withTransaction<T>(handler: (tx: Queryable) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      const tx: Queryable = {
        async query<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<R[]> {
          const result = await client.query<R>(text, params);
          return result.rows;
        },
      };
      try {
        await client.query('BEGIN');
        const result = await handler(tx);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

export function connectDatabase(config: AppConfig): Database {
  return createDatabase(new Pool(buildPoolConfig(config)));
}

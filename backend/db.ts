import { Pool } from 'pg';

import type { AppConfig } from './config';
import { StoreError } from './errors';

/*
  The slice of a database client the API needs. Rows come back untyped and are
  validated by the caller against the zod row schemas.
*/
export interface QueryRunner {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(config: AppConfig): Pool {
  const ssl = config.DATABASE_SSL ? { rejectUnauthorized: false } : false;

  return new Pool(
    config.DATABASE_URL
      ? {
          connectionString: config.DATABASE_URL,
          ssl
        }
      : {
          host: config.PGHOST,
          database: config.PGDATABASE,
          user: config.PGUSER,
          password: config.PGPASSWORD,
          port: config.PGPORT,
          ssl
        }
  );
}

/**
 * Adapts a pg pool (or anything with the same `query`) to a QueryRunner whose
 * failures all surface as StoreError.
 */
export function createStore(client: QueryRunner): QueryRunner {
  return {
    async query(text, values) {
      try {
        return await client.query(text, values);
      } catch (error) {
        throw new StoreError('Database query failed', error);
      }
    }
  };
}

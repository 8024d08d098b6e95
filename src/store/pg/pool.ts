// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { Pool } from 'pg';

export type QueryResult = { rows: unknown[] };
export type QueryFn = (sql: string, values: unknown[]) => Promise<QueryResult>;

/** The slice of `pg.Pool` the store needs. */
export interface Queryable {
  query(sql: string, values?: unknown[]): Promise<QueryResult>;
}

export interface PgPoolOptions {
  connectionString: string;
  max?: number;
  connectionTimeoutMillis?: number;
}

export function readDatabaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const connectionString = env.DATABASE_URL?.trim();
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }
  return connectionString;
}

export function createPgPool(options: PgPoolOptions): Pool {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 5000
  });
  pool.on('error', (error) => {
    console.error('[pg] idle client error', { message: error.message });
  });
  return pool;
}

export function createPoolQuery(pool: Queryable): QueryFn {
  return async (sql, values) => {
    const result = await pool.query(sql, values);
    return { rows: result.rows };
  };
}

export async function pingDatabase(pool: Queryable): Promise<{ reachable: boolean; error: string | null }> {
  try {
    await pool.query('select 1;');
    return { reachable: true, error: null };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Database check failed';
    return { reachable: false, error: message };
  }
}

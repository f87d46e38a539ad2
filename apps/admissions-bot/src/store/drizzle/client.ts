import pg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';

export interface PgConnection {
  pool: pg.Pool;
  db: NodePgDatabase;
}

export function createPgConnection(connectionString: string): PgConnection {
  const pool = new pg.Pool({ connectionString });
  return { pool, db: drizzle(pool) };
}

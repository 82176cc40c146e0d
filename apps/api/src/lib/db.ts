import pg from 'pg';
import type { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';

export interface Database {
  db: NodePgDatabase;
  pool: Pool;
}

export function createDatabase(connectionString: string): Database {
  const pool = new pg.Pool({ connectionString });
  const db = drizzle(pool);
  return { db, pool };
}

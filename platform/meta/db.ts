import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import type { Pool } from "pg";
import * as schema from "@shared/schema";

export type MetaDatabase = NodePgDatabase<typeof schema>;

export type DatabaseHandle = {
  db: MetaDatabase;
  pool: Pool;
  close(): Promise<void>;
};

/** Opens a pool for the caller to own. Nothing here holds a process-wide connection. */
export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new pg.Pool({ connectionString });
  const db = drizzle(pool, { schema });
  return {
    db,
    pool,
    close: () => pool.end(),
  };
}

/** Checks out one connection for a unit of work and always releases it. */
export async function withClient<T>(pool: Pool, work: (db: MetaDatabase) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await work(drizzle(client, { schema }));
  } finally {
    client.release();
  }
}

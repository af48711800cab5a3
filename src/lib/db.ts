import { Pool, QueryResult, QueryResultRow } from "pg";
import { getConfig } from "@/lib/config";

/**
 * Minimal query surface the data modules depend on. `Pool`, `PoolClient`
 * and test fakes all satisfy it.
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: unknown[]
  ): Promise<Pick<QueryResult<T>, "rows" | "rowCount">>;
}

// Singleton pool for hot reload safety in development
const globalForDb = globalThis as unknown as {
  pool: Pool | undefined;
};

function getPool(): Pool {
  if (!globalForDb.pool) {
    const connectionString = getConfig().databaseUrl;
    if (!connectionString) {
      throw new Error("DATABASE_URL environment variable is not set");
    }
    globalForDb.pool = new Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });
  }
  return globalForDb.pool;
}

/**
 * Execute a query against the shared pool
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  sql: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return getPool().query<T>(sql, params);
}

/**
 * Close the shared pool. Scripts call this before exiting.
 */
export async function closePool(): Promise<void> {
  if (globalForDb.pool) {
    await globalForDb.pool.end();
    globalForDb.pool = undefined;
  }
}

export const db: Queryable = { query };

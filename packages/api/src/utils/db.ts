import postgres from 'postgres';
import type { Config } from '../config';

/**
 * PostgreSQL connection pool.
 *
 * Shared by the pgvector index (chunk_embeddings) and the document store
 * (chunks). Both are read-only on the request path. Schema: sql/schema.sql.
 */

export type Sql = postgres.Sql;

export function createSql(databaseConfig: Config['database']): Sql {
  return postgres({
    host: databaseConfig.host,
    port: databaseConfig.port,
    database: databaseConfig.database,
    user: databaseConfig.user,
    password: databaseConfig.password,
    max: databaseConfig.poolMax,
    idle_timeout: 20,
    connect_timeout: 10,
  });
}

/**
 * Health check: verify database connectivity.
 */
export async function checkDatabaseHealth(sql: Sql): Promise<void> {
  await sql`SELECT 1`;
}

/**
 * Await a query, cancelling it on the backend if `signal` aborts first.
 */
export async function runCancellable<TRow extends readonly postgres.MaybeRow[]>(
  query: postgres.PendingQuery<TRow>,
  signal: AbortSignal
): Promise<postgres.RowList<TRow>> {
  const onAbort = () => query.cancel();
  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener('abort', onAbort, { once: true });
  }
  try {
    return await query;
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

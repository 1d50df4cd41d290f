import { Pool, QueryResult, QueryResultRow } from "pg";
import { config } from "../../shared/config";
import { structuredLogger } from "../../core/logger/structuredLogger";

/**
 * The part of pg's Pool the repositories use; lets tests pass a fake
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

export function createDatabasePool(
  connectionString: string = config.databaseUrl,
): Pool {
  const pool = new Pool({
    connectionString,
    max: config.databasePoolSize,
  });

  pool.on("error", (err: Error) =>
    structuredLogger.error("Idle database client error", err, {
      module: "database",
      action: "pool",
    }),
  );

  return pool;
}

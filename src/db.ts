import { Pool, type PoolClient } from "pg";
import { getDatabaseUrl } from "./config";
import { logError } from "./observability/logger";

export type Queryable = Pick<PoolClient, "query">;

export type TransactionClient = Queryable & { release: () => void };

export type Database = Queryable & {
  connect: () => Promise<TransactionClient>;
};

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({ connectionString: getDatabaseUrl() });
    pool.on("error", (err) => {
      logError("db_pool_error", { error: err.message });
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) {
    return;
  }
  const current = pool;
  pool = null;
  await current.end();
}

export async function withTransaction<T>(
  db: Database,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await db.connect();
  try {
    await client.query("begin");
    const result = await fn(client);
    await client.query("commit");
    return result;
  } catch (err) {
    await client.query("rollback");
    throw err;
  } finally {
    client.release();
  }
}

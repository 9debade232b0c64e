// src/db/createPool.ts
import { createPool as createMysqlPool, type Pool } from "mysql2/promise";
import { getLogger } from "../logger/logger";
import type { DatabaseConnectionData } from "./DatabaseConnectionData";
import { getDatabaseName } from "./databaseName";

/** `mysql://{user}:{password}@{host}/{database}`; credentials are percent-encoded. */
export function buildConnectionString(
  data: Pick<DatabaseConnectionData, "user" | "password" | "host">,
  databaseName: string
): string {
  const user = encodeURIComponent(data.user);
  const password = encodeURIComponent(data.password);
  return `mysql://${user}:${password}@${data.host}/${databaseName}`;
}

/**
 * Open a MySQL pool against the process-wide database name.
 * Fails if the name was never set, or if the first connection can't be made.
 */
export async function createPool(data: DatabaseConnectionData): Promise<Pool> {
  const database = getDatabaseName();
  const log = getLogger().child({
    component: "mysql",
    host: data.host,
    database,
  });
  log.debug("creating MySQL connection pool");

  const pool = createMysqlPool(buildConnectionString(data, database));
  try {
    const conn = await pool.getConnection();
    conn.release();
  } catch (err) {
    log.error(
      { error: err instanceof Error ? err.message : String(err) },
      "MySQL connection failed"
    );
    await pool.end();
    throw err;
  }

  log.info("MySQL pool ready");
  return pool;
}

// examples/databaseConnection.ts
//
// Run: DB_NAME=pricing tsx examples/databaseConnection.ts

import "dotenv/config";
import type { Pool, RowDataPacket } from "mysql2/promise";
import {
  AssetBundle,
  asyncHandler,
  createHttpServer,
  createPool,
  fetchDatabaseConnectionData,
  getLogger,
  initLogger,
  loadConfig,
  setDatabaseName,
} from "../src";

interface UserRow extends RowDataPacket {
  id: number;
  name: string;
}

async function main(): Promise<void> {
  const cfg = loadConfig();
  initLogger(cfg.serviceName);

  setDatabaseName(process.env.DB_NAME ?? "pricing");
  const credentials = await fetchDatabaseConnectionData();
  const pool: Pool = await createPool(credentials);

  createHttpServer({
    configure: (app) => {
      app.get(
        "/api/users",
        asyncHandler(async (_req, res) => {
          const [rows] = await pool.query<UserRow[]>(
            "SELECT id, name FROM users LIMIT 10"
          );
          res.json(rows.map((u) => ({ id: u.id, name: u.name })));
        })
      );
      app.get(
        "/api/health",
        asyncHandler(async (_req, res) => {
          try {
            await pool.query("SELECT 1");
            res.json({ status: "healthy", database: "connected" });
          } catch (err) {
            getLogger().warn({ error: String(err) }, "health query failed");
            res
              .status(503)
              .json({ status: "unhealthy", database: "disconnected" });
          }
        })
      );
    },
    assets: AssetBundle.empty(),
    port: 8080,
  });
}

main().catch((err: unknown) => {
  getLogger().fatal({ error: String(err) }, "startup failed");
  process.exit(1);
});

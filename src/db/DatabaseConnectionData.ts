// src/db/DatabaseConnectionData.ts
/**
 * Purpose:
 * - Credentials for the relational database (plus the FileMaker
 *   sub-credentials and auth hash that ride along in the same document).
 *
 * Sources:
 * - production:  HTTP GET of DB_CONFIG_URL.
 * - development: local JSON file (DB_CONFIG_FILE). When the file is absent a
 *   blank template is written and the call fails once so the developer can
 *   fill it in.
 */

import axios from "axios";
import fs from "node:fs/promises";
import https from "node:https";
import path from "node:path";
import { z } from "zod";
import { loadConfig, type RuntimeMode } from "../config/config";
import { getLogger } from "../logger/logger";

export const FilemakerCredentialsSchema = z.object({
  username: z.string(),
  password: z.string(),
});

export const DatabaseConnectionDataSchema = z.object({
  host: z.string(),
  user: z.string(),
  password: z.string(),
  filemaker: FilemakerCredentialsSchema,
  hash: z.string(),
});

export type FilemakerCredentials = z.infer<typeof FilemakerCredentialsSchema>;
export type DatabaseConnectionData = z.infer<
  typeof DatabaseConnectionDataSchema
>;

export const EMPTY_CONNECTION_DATA: DatabaseConnectionData = Object.freeze({
  host: "",
  user: "",
  password: "",
  filemaker: Object.freeze({ username: "", password: "" }),
  hash: "",
});

export interface FetchConnectionDataOptions {
  mode?: RuntimeMode;
  /** Remote endpoint (production). */
  url?: string;
  /** Local file (development). */
  file?: string;
  /** Accept self-signed certificates on the remote endpoint. */
  insecureTls?: boolean;
}

export async function fetchDatabaseConnectionData(
  opts: FetchConnectionDataOptions = {}
): Promise<DatabaseConnectionData> {
  const cfg = loadConfig();
  const mode = opts.mode ?? cfg.mode;

  if (mode === "development") {
    return loadLocalDatabaseConnectionData(opts.file ?? cfg.dbConfigFile);
  }

  const url = opts.url ?? cfg.dbConfigUrl;
  if (!url) {
    throw new Error(
      "DB_CONFIG_URL_MISSING: set DB_CONFIG_URL to the credential endpoint."
    );
  }
  return fetchRemoteDatabaseConnectionData(
    url,
    opts.insecureTls ?? cfg.dbConfigInsecureTls
  );
}

export async function fetchRemoteDatabaseConnectionData(
  url: string,
  insecureTls = false
): Promise<DatabaseConnectionData> {
  const log = getLogger().child({ component: "DatabaseConnectionData" });
  log.debug({ url }, "fetching database credentials");

  const res = await axios.get<unknown>(url, {
    timeout: 10_000,
    responseType: "json",
    httpsAgent: insecureTls
      ? new https.Agent({ rejectUnauthorized: false })
      : undefined,
  });
  return DatabaseConnectionDataSchema.parse(res.data);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadLocalDatabaseConnectionData(
  file: string
): Promise<DatabaseConnectionData> {
  const abs = path.resolve(file);
  let raw: string;
  try {
    raw = await fs.readFile(abs, "utf8");
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(
      abs,
      JSON.stringify(EMPTY_CONNECTION_DATA, null, 2) + "\n",
      "utf8"
    );
    getLogger().warn({ file: abs }, "created blank database credential file");
    throw new Error(
      `DB_CONFIG_CREATED: "${abs}" did not exist; a blank template was written. Fill it in and restart.`
    );
  }

  const parsed: unknown = JSON.parse(raw);
  return DatabaseConnectionDataSchema.parse(parsed);
}

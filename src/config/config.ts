// src/config/config.ts
/**
 * Purpose:
 * - Typed runtime configuration for every service built on the kit.
 * - Single place that reads process.env; everything else takes a config.
 *
 * Notes:
 * - No dotenv loading here. Entrypoints load .env before importing the kit.
 * - Production mode is NODE_ENV=production; anything else is development.
 */

import { z } from "zod";

export type RuntimeMode = "production" | "development";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const boolFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  NODE_ENV: z.string().trim().default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  SERVICE_NAME: z.string().trim().min(1).default("service-kit"),
  DB_CONFIG_URL: z.string().trim().url().optional(),
  DB_CONFIG_FILE: z.string().trim().min(1).default("dev-server.json"),
  DB_CONFIG_INSECURE_TLS: boolFlag.default("false"),
  FRONTEND_DEV_SERVER_URL: z
    .string()
    .trim()
    .url()
    .default("http://localhost:5173"),
});

export interface ServiceKitConfig {
  mode: RuntimeMode;
  logLevel: LogLevel;
  serviceName: string;
  dbConfigUrl?: string;
  dbConfigFile: string;
  dbConfigInsecureTls: boolean;
  frontendDevServerUrl: string;
}

type EnvSource = Record<string, string | undefined>;

/** Treat blank values as unset so `FOO=` in a .env file falls back to the default. */
function withoutBlanks(env: EnvSource): EnvSource {
  const out: EnvSource = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") out[k] = v;
  }
  return out;
}

export function loadConfig(env: EnvSource = process.env): ServiceKitConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") ?? "env";
    throw new Error(`CONFIG_INVALID: ${key}: ${issue?.message ?? "invalid"}`);
  }
  const e = parsed.data;
  const cfg: ServiceKitConfig = {
    mode: e.NODE_ENV === "production" ? "production" : "development",
    logLevel: e.LOG_LEVEL,
    serviceName: e.SERVICE_NAME,
    dbConfigUrl: e.DB_CONFIG_URL,
    dbConfigFile: e.DB_CONFIG_FILE,
    dbConfigInsecureTls: e.DB_CONFIG_INSECURE_TLS,
    frontendDevServerUrl: e.FRONTEND_DEV_SERVER_URL,
  };
  return Object.freeze(cfg);
}

export function runtimeMode(env: EnvSource = process.env): RuntimeMode {
  return (env.NODE_ENV ?? "").trim() === "production"
    ? "production"
    : "development";
}

export function isDevelopment(env: EnvSource = process.env): boolean {
  return runtimeMode(env) === "development";
}

export function isLogLevel(v: string): v is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(v);
}

// src/logger/logger.ts
/**
 * Shared root logger (pino).
 *
 * Each service SHOULD call `initLogger(serviceName)` at bootstrap, before any
 * request logger is created. Call `getLogger()` at use sites rather than
 * capturing the logger at import time: `initLogger` replaces the root.
 */

import pino, { type Logger, type LoggerOptions, stdTimeFunctions } from "pino";
import { isLogLevel, loadConfig, type LogLevel } from "../config/config";

let ROOT: Logger | null = null;

function baseOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: ["req.headers.authorization", "req.headers.cookie"],
    },
  };
}

/** Initialize the root logger for this running service. */
export function initLogger(serviceName: string, level?: LogLevel): Logger {
  const name = String(serviceName || "").trim();
  if (!name) throw new Error("initLogger requires serviceName");
  const lvl = level ?? loadConfig().logLevel;
  ROOT = pino({ ...baseOptions(lvl), base: { service: name } });
  return ROOT;
}

export function getLogger(): Logger {
  if (!ROOT) {
    const cfg = loadConfig();
    ROOT = pino({
      ...baseOptions(cfg.logLevel),
      base: { service: cfg.serviceName },
    });
  }
  return ROOT;
}

/** Set level dynamically (e.g., in tests). */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) throw new Error(`Invalid LOG_LEVEL: "${level}"`);
  getLogger().level = level;
}

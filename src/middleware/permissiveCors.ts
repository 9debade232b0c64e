// src/middleware/permissiveCors.ts
/**
 * Permissive CORS: every response (errors included) carries
 *   Access-Control-Allow-Origin: *
 *   Access-Control-Allow-Headers: *
 *
 * `cors` answers preflight OPTIONS itself (204) but only stamps
 * Allow-Headers on preflights, so the second handler covers the rest.
 */

import cors from "cors";
import type { RequestHandler } from "express";

export function permissiveCors(): RequestHandler[] {
  return [
    cors({ origin: "*", allowedHeaders: "*" }),
    (_req, res, next) => {
      res.setHeader("Access-Control-Allow-Headers", "*");
      next();
    },
  ];
}

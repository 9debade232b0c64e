// src/middleware/jsonBody.ts
/**
 * JSON body parser with a hard size cap.
 *
 * Any parser failure (body too large, malformed JSON, bad charset) is
 * answered here with `400 {"error": "<parser message>"}` rather than being
 * forwarded to the error funnel.
 */

import express, { type RequestHandler } from "express";
import { getLogger } from "../logger/logger";

export const JSON_BODY_LIMIT = 4096;

export function jsonBody(limit: number = JSON_BODY_LIMIT): RequestHandler {
  const parse = express.json({ limit });

  return (req, res, next) => {
    parse(req, res, (err?: unknown) => {
      if (err === undefined || err === null) return next();

      const message = err instanceof Error ? err.message : String(err);
      getLogger().error(
        { method: req.method, path: req.originalUrl, error: message },
        "Failed to parse JSON"
      );
      res.status(400).json({ error: message });
    });
  };
}

// src/middleware/httpLogger.ts
/**
 * Structured request logs via pino-http.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Reuses an inbound request id if present; only mints a UUID if missing.
 *   The id is always echoed back as `x-request-id`.
 */

import pinoHttp, { type HttpLogger } from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { getLogger } from "../logger/logger";

function firstHeader(v: string | string[] | undefined): string | undefined {
  const s = Array.isArray(v) ? v[0] : v;
  return s && s.trim() ? s.trim() : undefined;
}

export function makeHttpLogger(serviceName: string): HttpLogger {
  const logger = getLogger().child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req, res) => {
      const id =
        firstHeader(req.headers["x-request-id"]) ??
        firstHeader(req.headers["x-correlation-id"]) ??
        randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      if (res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === "/favicon.ico",
    },

    serializers: {
      req(req: { id: unknown; method: string; url: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode: number }) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}

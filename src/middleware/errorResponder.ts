// src/middleware/errorResponder.ts
/**
 * Purpose:
 * - Express-only final error funnel. Every error reaching it is converted
 *   with `AppError.from` and answered with the JSON envelope.
 *
 * Invariants:
 * - `stacktrace` is in the body iff `includeStack` (development) is on.
 * - 5xx logs at error, 4xx at warn.
 */

import type { ErrorRequestHandler } from "express";
import { AppError } from "../errors/AppError";
import { getLogger } from "../logger/logger";
import { isDevelopment } from "../config/config";

export interface ErrorResponderOptions {
  /** Defaults to development mode. */
  includeStack?: boolean;
}

export function errorResponder(
  opts: ErrorResponderOptions = {}
): ErrorRequestHandler {
  const includeStack = opts.includeStack ?? isDevelopment();

  return (err, req, res, next) => {
    if (res.headersSent) return next(err);

    const appErr = AppError.from(err);
    const status = appErr.statusCode;
    const ctx = {
      kind: appErr.kind,
      status,
      method: req.method,
      path: req.originalUrl,
    };
    if (status >= 500) getLogger().error(ctx, appErr.message);
    else getLogger().warn(ctx, appErr.message);

    res.status(status).json(appErr.toResponseBody(includeStack));
  };
}

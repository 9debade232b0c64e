// src/assets/mountAssetRoutes.ts
/**
 * Purpose:
 * - Mount the frontend behind the caller's API routes.
 *
 * Modes:
 * - production:  GET /assets/<path> serves `assets/<path>` from the bundle;
 *                every other unmatched request gets the bundle's index.html.
 * - development: every unmatched request is proxied to the frontend dev
 *                server (http-proxy), so hot reload keeps working.
 *
 * Notes:
 * - Mount AFTER the caller's routes and BEFORE errorResponder.
 */

import type { Express, Request, RequestHandler } from "express";
import httpProxy from "http-proxy";
import type { IncomingMessage } from "node:http";
import type { RuntimeMode } from "../config/config";
import { AppError } from "../errors/AppError";
import { getLogger } from "../logger/logger";
import { asyncHandler } from "../middleware/asyncHandler";
import type { AssetBundle } from "./AssetBundle";
import { mimeForPath } from "./mime";

export interface MountAssetRoutesOptions {
  assets: AssetBundle;
  mode: RuntimeMode;
  /** Dev-server origin used in development mode. */
  devServerUrl: string;
}

export function mountAssetRoutes(
  app: Express,
  opts: MountAssetRoutesOptions
): void {
  if (opts.mode === "production") {
    app.get("/assets/*", serveAsset(opts.assets));
    app.use(serveIndex(opts.assets));
  } else {
    app.use(devServerProxy(opts.devServerUrl));
  }
}

export function serveAsset(assets: AssetBundle): RequestHandler {
  return asyncHandler(async (req: Request, res) => {
    const rel: string = req.params[0] ?? "";
    const file = assets.getFile(`assets/${rel}`);
    if (!file) throw AppError.assetNotFound(rel);
    res.type(mimeForPath(file.path)).send(file.contents);
  });
}

export function serveIndex(assets: AssetBundle): RequestHandler {
  return asyncHandler(async (_req, res) => {
    const file = assets.getFile("index.html");
    if (!file) throw AppError.assetNotFound("index.html");
    res.type("text/html").send(file.contents);
  });
}

/**
 * Body-parsed requests lose their stream; re-send what the parser consumed.
 * body-parser flags a consumed request with `_body`, even when the parsed
 * value is empty (`{}`, `[]`).
 */
function parsedBody(
  req: IncomingMessage
): { data: string | Buffer; json: boolean } | undefined {
  if (!("_body" in req) || req._body !== true || !("body" in req)) {
    return undefined;
  }
  const body = req.body;
  if (Buffer.isBuffer(body) || typeof body === "string") {
    return { data: body, json: false };
  }
  return { data: JSON.stringify(body), json: true };
}

export function devServerProxy(target: string): RequestHandler {
  const log = getLogger().child({ component: "devServerProxy", target });
  const proxy = httpProxy.createProxyServer({ target, changeOrigin: true });

  proxy.on("proxyReq", (proxyReq, req) => {
    if (!req.method || ["GET", "HEAD"].includes(req.method)) return;
    const parsed = parsedBody(req);
    if (!parsed) return;
    if (parsed.json) proxyReq.setHeader("Content-Type", "application/json");
    proxyReq.setHeader(
      "Content-Length",
      String(Buffer.byteLength(parsed.data))
    );
    proxyReq.removeHeader("transfer-encoding");
    proxyReq.write(parsed.data);
  });

  return (req, res) => {
    proxy.web(req, res, {}, (err) => {
      log.error(
        { error: err.message, url: req.originalUrl },
        "dev server proxy failed"
      );
      if (res.headersSent) {
        res.end();
        return;
      }
      res.status(502).json({
        message: `Bad Gateway: ${err.message}`,
        status: 502,
      });
    });
  };
}

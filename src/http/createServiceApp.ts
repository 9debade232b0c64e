// src/http/createServiceApp.ts
/**
 * Purpose:
 * - Assemble the standard stack for a service:
 *   http logger → permissive CORS → JSON body (4 KiB cap) → caller routes →
 *   frontend assets (bundle or dev proxy) → error responder.
 *
 * Notes:
 * - The caller owns its route prefix; `configure` receives the app itself.
 * - No listen() here: see startHttpServer / createHttpServer.
 */

import express, { type Express } from "express";
import { loadConfig, type RuntimeMode } from "../config/config";
import { AssetBundle } from "../assets/AssetBundle";
import { mountAssetRoutes } from "../assets/mountAssetRoutes";
import { makeHttpLogger } from "../middleware/httpLogger";
import { permissiveCors } from "../middleware/permissiveCors";
import { jsonBody, JSON_BODY_LIMIT } from "../middleware/jsonBody";
import { errorResponder } from "../middleware/errorResponder";

export type ConfigureRoutes = (app: Express) => void;

export interface CreateServiceAppOptions {
  /** Mounts the service's routes. */
  configure: ConfigureRoutes;
  /** Frontend bundle served in production. */
  assets?: AssetBundle;
  /** Defaults to NODE_ENV-derived mode. */
  mode?: RuntimeMode;
  /** Frontend dev server; defaults to FRONTEND_DEV_SERVER_URL. */
  devServerUrl?: string;
  /** Service slug for logs; defaults to SERVICE_NAME. */
  serviceName?: string;
  /** JSON body cap in bytes. */
  jsonLimit?: number;
}

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const cfg = loadConfig();
  const mode = opts.mode ?? cfg.mode;
  const serviceName = opts.serviceName ?? cfg.serviceName;

  const app = express();
  app.disable("x-powered-by");

  app.use(makeHttpLogger(serviceName));
  app.use(permissiveCors());
  app.use(jsonBody(opts.jsonLimit ?? JSON_BODY_LIMIT));

  opts.configure(app);

  mountAssetRoutes(app, {
    assets: opts.assets ?? AssetBundle.empty(),
    mode,
    devServerUrl: opts.devServerUrl ?? cfg.frontendDevServerUrl,
  });

  app.use(errorResponder({ includeStack: mode === "development" }));

  return app;
}

// examples/createServer.ts
//
// Run: NODE_ENV=production ASSET_DIR=./wwwroot tsx examples/createServer.ts

import "dotenv/config";
import path from "node:path";
import type { Request, Response } from "express";
import {
  AppError,
  AssetBundle,
  createHttpServer,
  initLogger,
  loadConfig,
} from "../src";

const cfg = loadConfig();
initLogger(cfg.serviceName);

function hello(_req: Request, res: Response) {
  res.send("Hello, world!");
}

function echo(req: Request, res: Response) {
  res.send(`You said: ${req.params.message}`);
}

function healthCheck(_req: Request, res: Response) {
  res.json({ status: "ok" });
}

function fail() {
  throw AppError.internal(new Error("something broke"));
}

const assets =
  cfg.mode === "production"
    ? AssetBundle.fromDirectory(
        process.env.ASSET_DIR ?? path.resolve(__dirname, "../wwwroot")
      )
    : AssetBundle.empty();

createHttpServer({
  configure: (app) => {
    app.get("/api/hello", hello);
    app.get("/api/echo/:message", echo);
    app.get("/api/health", healthCheck);
    app.get("/api/error", fail);
  },
  assets,
  port: 8080,
});

// src/http/startHttpServer.ts
/**
 * Purpose:
 * - Bind an app on all interfaces, log where it landed (port 0 in tests),
 *   and shut down cleanly on SIGINT/SIGTERM.
 *
 * Notes:
 * - Uses `process.once` so repeated calls don't multiply handlers.
 * - Keep-alive + header timeout hardening (headersTimeout > keepAliveTimeout).
 */

import type { Express } from "express";
import type { Server } from "node:http";
import { getLogger } from "../logger/logger";

export const DEFAULT_HOST = "0.0.0.0";

export interface StartHttpServerOptions {
  app: Express;
  /** 0 picks an ephemeral port. */
  port: number;
  host?: string;
  /** Install SIGINT/SIGTERM handlers (off in tests). */
  handleSignals?: boolean;
}

export interface StartedServer {
  server: Server;
  /** Resolves with the bound port once listening; rejects on bind failure. */
  listening: Promise<number>;
  stop: () => Promise<void>;
}

export function startHttpServer(opts: StartHttpServerOptions): StartedServer {
  const { app, port } = opts;
  const host = opts.host ?? DEFAULT_HOST;
  const log = getLogger().child({ component: "startHttpServer" });

  const server = app.listen(port, host);
  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  const listening = new Promise<number>((resolve, reject) => {
    server.once("listening", () => {
      const addr = server.address();
      const boundPort =
        addr !== null && typeof addr === "object" ? addr.port : port;
      log.info({ host, port: boundPort, pid: process.pid }, "service listening");
      resolve(boundPort);
    });
    server.once("error", (err) => {
      log.error({ error: err.message, host, port }, "http server error");
      reject(err);
    });
  });
  // The failure is logged above; callers that never await `listening`
  // must not take the process down with an unhandled rejection.
  void listening.catch(() => undefined);

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  if (opts.handleSignals ?? true) {
    const shutdown = (signal: string) => {
      log.info({ signal }, "shutting down service");
      stop().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ error: String(err) }, "shutdown failed");
          process.exit(1);
        }
      );
      // Fail-safe in case close hangs
      setTimeout(() => process.exit(1), 10_000).unref();
    };
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
  }

  return { server, listening, stop };
}

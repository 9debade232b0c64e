// src/http/createHttpServer.ts
/**
 * Purpose:
 * - One call to run a service: build the standard app and bind it on
 *   0.0.0.0:<port> across a fixed pool of cluster workers.
 *
 * Roles:
 * - primary (workers > 1): forks the pool and re-forks workers that die
 *   unexpectedly. A worker that dies before it ever listened is not
 *   replaced (a bind failure would only repeat). It never builds the app.
 * - worker (or workers === 1): builds the app and listens. Workers share
 *   the port through the cluster module.
 *
 * Notes:
 * - A cluster worker whose server fails to bind exits with code 1.
 * - Every worker re-runs the entrypoint, so `configure` must be safe to run
 *   once per process.
 */

import cluster, { type Worker } from "node:cluster";
import type { Express } from "express";
import type { Server } from "node:http";
import { getLogger } from "../logger/logger";
import {
  createServiceApp,
  type CreateServiceAppOptions,
} from "./createServiceApp";
import { startHttpServer } from "./startHttpServer";

export const DEFAULT_WORKER_COUNT = 4;

export interface CreateHttpServerOptions extends CreateServiceAppOptions {
  port: number;
  /** Cluster size; 1 runs in-process without forking. */
  workers?: number;
  host?: string;
  handleSignals?: boolean;
}

export type HttpServerHandle =
  | {
      role: "primary";
      /** Live workers; re-read after a re-fork. */
      readonly workers: Worker[];
      stop: () => Promise<void>;
    }
  | {
      role: "worker";
      app: Express;
      server: Server;
      listening: Promise<number>;
      stop: () => Promise<void>;
    };

export function createHttpServer(
  opts: CreateHttpServerOptions
): HttpServerHandle {
  const workers = opts.workers ?? DEFAULT_WORKER_COUNT;
  if (!Number.isInteger(workers) || workers < 1) {
    throw new Error(`WORKERS_INVALID: expected a positive integer, got ${workers}`);
  }

  if (workers > 1 && cluster.isPrimary) {
    return runPrimary(workers, opts.handleSignals ?? true);
  }

  const app = createServiceApp(opts);
  const started = startHttpServer({
    app,
    port: opts.port,
    host: opts.host,
    handleSignals: opts.handleSignals,
  });
  if (cluster.isWorker) {
    void started.listening.catch(() => process.exit(1));
  }
  return { role: "worker", app, ...started };
}

function runPrimary(
  count: number,
  handleSignals: boolean
): HttpServerHandle {
  const log = getLogger().child({ component: "cluster", pid: process.pid });
  const workers = new Map<number, Worker>();
  const listened = new Set<number>();
  let shuttingDown = false;

  const fork = (): Worker => {
    const w = cluster.fork();
    workers.set(w.id, w);
    log.info({ workerId: w.id }, "worker forked");
    return w;
  };

  for (let i = 0; i < count; i++) fork();

  cluster.on("listening", (worker) => {
    listened.add(worker.id);
  });

  cluster.on("exit", (worker, code, signal) => {
    workers.delete(worker.id);
    const everListened = listened.delete(worker.id);
    if (shuttingDown) return;
    if (!everListened) {
      log.error(
        { workerId: worker.id, code, signal },
        "worker exited before listening; not re-forking"
      );
      return;
    }
    log.warn({ workerId: worker.id, code, signal }, "worker exited; re-forking");
    fork();
  });

  const stop = () =>
    new Promise<void>((resolve) => {
      shuttingDown = true;
      if (workers.size === 0) return resolve();
      cluster.disconnect(() => resolve());
    });

  if (handleSignals) {
    const shutdown = (signal: string) => {
      log.info({ signal }, "shutting down cluster");
      void stop().then(() => process.exit(0));
      setTimeout(() => process.exit(1), 10_000).unref();
    };
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
  }

  return {
    role: "primary",
    get workers() {
      return [...workers.values()];
    },
    stop,
  };
}

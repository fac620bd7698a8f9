/**
 * Express app factory.
 *
 * Usage:
 *   const { app, log, start } = createService({ name: "manager", port: 8080, ... });
 *   registerAgentRoutes(app, manager);
 *   start();
 */

import express, { type Application, type NextFunction, type Request, type Response } from "express";
import compression from "compression";
import helmet from "helmet";
import { applyCors } from "./cors.js";
import { errorMessage } from "./errors.js";
import { isRecord } from "./json.js";
import { createLogger, flushLogs, type Logger } from "./logger.js";
import type { Server } from "http";

export interface ServiceOpts {
  /** Logger / service name */
  name: string;
  /** Display name in health responses */
  displayName: string;
  port: number;
  host?: string;
  corsOrigins?: readonly string[];
  /** JSON body limit (default "64kb"; system prompts can be long) */
  bodyLimit?: string;
  /** Extra health data to merge into GET /health response */
  healthExtra?: () => Record<string, unknown>;
  /** Runs on SIGTERM/SIGINT before the HTTP server closes */
  onShutdown?: () => Promise<void>;
  /** Upper bound for the whole shutdown sequence (default 30s) */
  shutdownTimeoutMs?: number;
}

export interface ServiceInstance {
  app: Application;
  log: Logger;
  start: () => Server;
}

export function createService(opts: ServiceOpts): ServiceInstance {
  const app = express();

  // Security headers
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(compression());
  applyCors(app, opts.corsOrigins ?? []);
  app.use(express.json({ limit: opts.bodyLimit ?? "64kb" }));

  const log = createLogger(opts.name);

  // body-parser failures surface here, before any route runs
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const type = isRecord(err) ? err["type"] : undefined;
    if (type === "entity.parse.failed") {
      res.status(400).json({ success: false, error: "Malformed JSON body", code: "VALIDATION_ERROR" });
      return;
    }
    if (type === "entity.too.large") {
      res.status(413).json({ success: false, error: "Request body too large", code: "VALIDATION_ERROR" });
      return;
    }
    next(err);
  });

  app.get("/health", (_req, res) => {
    res.json({
      service: opts.displayName,
      timestamp: new Date().toISOString(),
      status: "ok",
      port: opts.port,
      ...opts.healthExtra?.(),
    });
  });

  let shutdownCalled = false;

  function start(): Server {
    const host = opts.host ?? "0.0.0.0";
    const server = app.listen(opts.port, host, () => {
      log.info(`listening on http://${host}:${opts.port}`);
    });

    server.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        log.error(`port ${opts.port} already in use, exiting`, { code: err.code });
      } else {
        log.error(`server error: ${err.message}`, { code: err.code });
      }
      flushLogs();
      process.exit(1);
    });

    // Graceful shutdown (idempotent)
    const shutdown = (signal: string) => {
      if (shutdownCalled) return;
      shutdownCalled = true;
      log.info(`${signal} received, shutting down gracefully`);

      setTimeout(() => {
        log.warn("graceful shutdown timed out, forcing exit");
        flushLogs();
        process.exit(1);
      }, opts.shutdownTimeoutMs ?? 30_000).unref();

      const cleanup = opts.onShutdown?.() ?? Promise.resolve();
      void cleanup
        .catch((err: unknown) => {
          log.error(`shutdown hook failed: ${errorMessage(err)}`);
        })
        .finally(() => {
          server.close(() => {
            log.info("server closed");
            flushLogs();
            process.exit(0);
          });
        });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));

    process.on("uncaughtException", (err) => {
      log.error(`uncaught exception: ${err.message}`, { stack: err.stack });
      shutdown("uncaughtException");
    });

    process.on("unhandledRejection", (reason) => {
      log.error(`unhandled rejection: ${errorMessage(reason)}`);
    });

    return server;
  }

  return { app, log, start };
}

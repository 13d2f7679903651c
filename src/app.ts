import { Hono } from "hono";
import { cors } from "hono/cors";
import { env } from "./config/env.js";
import { formatErrorResponse } from "./middleware/error-handler.js";
import { createRateLimitMiddleware } from "./middleware/rate-limit.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { createV1Router } from "./routes/v1.js";
import type { ExcitationEngine } from "./services/excitation-engine.js";
import type { ExcitationStore } from "./services/excitation-store.js";
import type { RecentNotificationLog } from "./services/notifier.js";
import type { ScannerService } from "./services/scanner-service.js";
import { logger } from "./utils/logger.js";

interface CreateAppOptions {
  engine: ExcitationEngine;
  store: ExcitationStore;
  notifications: RecentNotificationLog;
  scanner?: ScannerService;
  rateLimitWindowMs?: number;
  rateLimitMax?: number;
}

export function createApp(options: CreateAppOptions): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const requestId = c.res.headers.get("x-request-id") ?? c.req.header("x-request-id");
    logger.info("request", {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });
  app.use(
    "*",
    cors({
      origin: env.CORS_ORIGIN,
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "X-Request-Id"],
    }),
  );

  app.use(
    "/api/*",
    createRateLimitMiddleware({
      windowMs: options.rateLimitWindowMs ?? env.RATE_LIMIT_WINDOW_MS,
      max: options.rateLimitMax ?? env.RATE_LIMIT_MAX,
      scope: "api",
    }),
  );

  app.get("/healthz", async (c) => {
    const store = await options.store.health();
    const status = store.ready ? "ok" : "degraded";
    const statusCode = store.ready ? 200 : 503;
    return c.json(
      {
        code: statusCode,
        message: status,
        data: {
          status,
          store,
          threshold: options.engine.threshold,
          scanner: options.scanner?.status(),
        },
      },
      statusCode,
    );
  });

  app.route(
    "/api/v1",
    createV1Router({
      engine: options.engine,
      notifications: options.notifications,
      scanner: options.scanner,
    }),
  );

  app.notFound((c) => {
    return c.json(
      {
        code: 404,
        message: "Not Found",
      },
      404,
    );
  });

  app.onError((error, c) => formatErrorResponse(error, c));

  return app;
}

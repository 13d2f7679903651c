import { Hono } from "hono";
import type { ExcitationEngine } from "../services/excitation-engine.js";
import type { RecentNotificationLog } from "../services/notifier.js";
import type { ScannerService } from "../services/scanner-service.js";
import { createKeyRouter } from "./keys.js";
import { createListingRouter } from "./listings.js";
import { createNotificationRouter } from "./notifications.js";
import { createScannerRouter } from "./scanner.js";

interface V1RouterDeps {
  engine: ExcitationEngine;
  notifications: RecentNotificationLog;
  scanner?: ScannerService;
}

export function createV1Router(deps: V1RouterDeps): Hono {
  const app = new Hono();

  app.route("/keys", createKeyRouter(deps.engine));
  app.route("/listings", createListingRouter(deps.engine));
  app.route("/notifications", createNotificationRouter(deps.notifications));

  if (deps.scanner) {
    app.route("/scanner", createScannerRouter(deps.scanner));
  }

  return app;
}

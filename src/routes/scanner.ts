import { Hono } from "hono";
import { AppError } from "../middleware/error-handler.js";
import type { ScannerService } from "../services/scanner-service.js";

export function createScannerRouter(scanner: ScannerService): Hono {
  const app = new Hono();

  app.get("/", (c) => c.json({ code: 200, message: "ok", data: scanner.status() }, 200));

  app.post("/run", async (c) => {
    const summary = await scanner.runCycle("manual", { throwOnError: true });
    if (!summary) throw new AppError("Scan cycle already running", 409);
    return c.json({ code: 200, message: "ok", data: summary }, 200);
  });

  return app;
}

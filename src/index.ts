import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { resolveEngineConfig } from "./config/engine-config.js";
import { env } from "./config/env.js";
import { ExcitationEngine, epochSecondsNow } from "./services/excitation-engine.js";
import { FileBackedExcitationStore, type ExcitationStore } from "./services/excitation-store.js";
import { LogNotificationSink, RecentNotificationLog } from "./services/notifier.js";
import { RedisExcitationStore, connectRedis } from "./services/redis-excitation-store.js";
import { readSourceDefinitions } from "./services/scanner-config.js";
import { ScannerService } from "./services/scanner-service.js";
import { createListingSource } from "./services/sources/index.js";
import { errorMessage, logger } from "./utils/logger.js";

function createStore(): ExcitationStore {
  if (env.USE_REDIS && env.REDIS_URL) {
    return new RedisExcitationStore({ client: connectRedis(env.REDIS_URL), prefix: env.REDIS_PREFIX });
  }
  return new FileBackedExcitationStore(env.STATE_PATH);
}

async function main(): Promise<void> {
  const store = createStore();
  await store.load();

  const engine = new ExcitationEngine({ store, config: resolveEngineConfig(env) });
  const notifications = new RecentNotificationLog(env.RECENT_NOTIFICATIONS_LIMIT);
  const definitions = await readSourceDefinitions(env.SOURCES_CONFIG_PATH);
  const sources = definitions
    .filter((definition) => definition.enabled)
    .map((definition) =>
      createListingSource(definition, { timeoutMs: env.REQUEST_TIMEOUT_MS, nowFn: epochSecondsNow }),
    );

  const scanner = new ScannerService({
    engine,
    store,
    sources,
    sinks: [new LogNotificationSink(), notifications],
    pollIntervalSeconds: env.POLL_INTERVAL_SECONDS,
  });

  const app = createApp({ engine, store, notifications, scanner });

  const server = serve(
    {
      fetch: app.fetch,
      port: env.PORT,
    },
    () => {
      logger.info("server_started", {
        port: env.PORT,
        env: env.NODE_ENV,
        sources: sources.map((source) => source.id),
        threshold: engine.threshold,
      });
      scanner.start();
    },
  );

  server.on("error", (error) => {
    logger.error("server_start_failed", {
      port: env.PORT,
      env: env.NODE_ENV,
      error: errorMessage(error),
    });
  });

  const shutdown = (signal: string) => {
    logger.info("server_stopping", { signal });
    scanner.stop();
    server.close();
    store
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("store_close_failed", { error: errorMessage(error) });
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error("fatal", { error: errorMessage(error) });
  process.exit(1);
});

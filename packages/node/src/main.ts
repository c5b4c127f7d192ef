/**
 * @ordergrid/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { createEventPublisher, loadConfig, toAuthConfig } from "./config.js";
import { createApp } from "./app.js";
import { pinoLogFn } from "./middleware/logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const auth = toAuthConfig(config);
  if (auth !== undefined) {
    logger.info(
      { apiKeyCount: auth.apiKeys.size, jwtEnabled: auth.jwtSecret !== undefined },
      "Auth configured",
    );
  } else {
    logger.warn("No API keys or JWT secret configured, running in unsecured mode");
  }

  const { app, service } = createApp({
    serviceConfig: {
      logger,
      publisher: createEventPublisher(config, logger.child({ component: "events" })),
      taskConcurrency: config.TASK_CONCURRENCY,
      phaseDelayMs: config.TASK_PHASE_DELAY_MS,
    },
    logFn: pinoLogFn(logger),
    onUnexpectedError: (err, c) => {
      logger.error(
        { err, requestId: c.get("requestId"), path: c.req.path },
        "Unhandled error",
      );
    },
    auth,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      eventsWebhook: config.EVENTS_WEBHOOK_URL ?? null,
    },
    "OrderGrid node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});

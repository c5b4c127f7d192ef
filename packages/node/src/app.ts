/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { OrderService } from "./services/order-service.js";
import type { OrderServiceConfig } from "./services/order-service.js";
import { createErrorEnvelope } from "./types/error.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createOrderRoutes } from "./routes/orders.js";
import { createPaymentRoutes } from "./routes/payments.js";
import { createOrderDetailRoutes } from "./routes/order-details.js";
import { createTaskRoutes } from "./routes/tasks.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: OrderServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Called for errors answered with a 500 */
  readonly onUnexpectedError?: ((err: Error, c: Context<AppEnv>) => void) | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: OrderService;
}

/**
 * Resource collections; everything under them requires auth when
 * auth is enabled.
 */
const PROTECTED_PREFIXES = ["/orders", "/payments", "/order-details", "/tasks"] as const;

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new OrderService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound((c) =>
    c.json(
      createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
      404,
    ),
  );

  // ─── Public Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── Resource Routes ────────────────────────────────────────────
  if (options.auth !== undefined) {
    const auth = authMiddleware(options.auth);
    for (const prefix of PROTECTED_PREFIXES) {
      app.use(prefix, auth);
      app.use(`${prefix}/*`, auth);
    }
  }

  app.route("/orders", createOrderRoutes());
  app.route("/payments", createPaymentRoutes());
  app.route("/order-details", createOrderDetailRoutes());
  app.route("/tasks", createTaskRoutes());

  return { app, service };
}

/**
 * Service info and health check routes.
 *
 * GET /        Service name, version and the collections it serves
 * GET /health  Liveness probe (always 200 if server is running)
 * GET /ready   Readiness probe (503 once shutdown has begun)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { OrderService } from "../services/order-service.js";

export const SERVICE_VERSION = "0.1.0";

export const ENTITY_COLLECTIONS = ["orders", "payments", "order-details"] as const;

export function createHealthRoutes(service: OrderService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({
      message: "Welcome to the Order Management API.",
      version: SERVICE_VERSION,
      entities: ENTITY_COLLECTIONS,
    });
  });

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}

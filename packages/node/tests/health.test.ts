/**
 * Tests for service info and health check endpoints.
 *
 * Verifies:
 * - GET / describes the service
 * - GET /health returns 200 with status "ok"
 * - GET /ready reflects whether the service is accepting work
 * - Unknown routes answer with the error envelope
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "./setup.js";

describe("GET /", () => {
  it("returns the service description", async () => {
    const { app } = createTestApp();
    const res = await app.request("/");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: "Welcome to the Order Management API.",
      version: "0.1.0",
      entities: ["orders", "payments", "order-details"],
    });
  });
});

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });
});

describe("GET /ready", () => {
  it("returns 200 while the service is running", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string };
    expect(body.status).toBe("ready");
  });

  it("returns 503 after shutdown has begun", async () => {
    const { app, service } = createTestApp();
    await service.stop();

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as { status: string };
    expect(body.status).toBe("not_ready");
  });
});

describe("unknown routes", () => {
  it("returns 404 with the error envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/customers");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "No route for GET /customers" },
    });
  });
});

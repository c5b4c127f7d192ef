/**
 * Test helpers for @ordergrid/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import pino from "pino";
import type { EventPublisher } from "@ordergrid/events";
import { simulatedPhases } from "@ordergrid/orders";
import type { ProcessingPhase } from "@ordergrid/orders";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import type { AuthConfig } from "../src/middleware/auth.js";
import type { RequestLogEntry } from "../src/middleware/logger.js";

export const USER_ID = "660e8400-e29b-41d4-a716-446655440001";
export const ORDER_ID = "550e8400-e29b-41d4-a716-446655440000";
export const PROD_ID = "770e8400-e29b-41d4-a716-446655440002";
export const UNKNOWN_ID = "00000000-0000-4000-8000-000000000000";

export interface TestAppOptions {
  readonly publisher?: EventPublisher | undefined;
  readonly phases?: readonly ProcessingPhase[] | undefined;
  readonly taskConcurrency?: number | undefined;
  readonly auth?: AuthConfig | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

/**
 * Processing phases that finish without waiting.
 */
export function instantPhases(): readonly ProcessingPhase[] {
  return simulatedPhases({ sleep: async () => undefined });
}

/**
 * Create a test app with default configuration.
 *
 * Uses silent logging and processing phases without delays.
 */
export function createTestApp(options: TestAppOptions = {}): AppInstance {
  return createApp({
    serviceConfig: {
      logger: pino({ level: "silent" }),
      publisher: options.publisher,
      phases: options.phases ?? instantPhases(),
      taskConcurrency: options.taskConcurrency,
    },
    logFn: options.logFn,
    auth: options.auth,
  });
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface Deferred {
  readonly promise: Promise<void>;
  resolve(): void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function orderBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { user_id: USER_ID, total_price: 1999.98, ...overrides };
}

/**
 * Shared test helpers for @ordergrid/orders.
 */

import pino from "pino";
import type { Logger } from "pino";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Logger that keeps every emitted line as parsed JSON.
 */
export function captureLogger(): { logger: Logger; lines: () => unknown[] } {
  const chunks: string[] = [];
  const logger = pino(
    { level: "debug", base: null, timestamp: false },
    {
      write: (msg: string) => {
        chunks.push(msg);
      },
    },
  );
  return {
    logger,
    lines: () => chunks.map((c): unknown => JSON.parse(c)),
  };
}

/**
 * A promise with its resolve/reject exposed.
 */
export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const USER_ID = "660e8400-e29b-41d4-a716-446655440001";

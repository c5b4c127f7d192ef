/**
 * Structured request logging middleware.
 *
 * Reports one entry per request through an injectable sink; `pinoLogFn`
 * is the sink used in production.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

/**
 * Creates the request logging middleware.
 *
 * Logs after the response is produced, so `status` includes responses
 * built by the error handler.
 */
export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
    });
  };
}

/**
 * Log sink writing to pino: 5xx at error, 4xx at warn, everything else
 * at info.
 */
export function pinoLogFn(logger: Logger): (entry: RequestLogEntry) => void {
  return (entry) => {
    const msg = `${entry.method} ${entry.path} ${entry.status}`;
    if (entry.status >= 500) {
      logger.error(entry, msg);
    } else if (entry.status >= 400) {
      logger.warn(entry, msg);
    } else {
      logger.info(entry, msg);
    }
  };
}

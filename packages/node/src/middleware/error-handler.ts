/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (StoreError, TaskError, PreconditionError)
 * to appropriate HTTP status codes.
 */

import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { StoreError } from "@ordergrid/store";
import { TaskError } from "@ordergrid/orders";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiErrorCode, ErrorStatus } from "../types/error.js";
import { createErrorEnvelope, ERROR_STATUS } from "../types/error.js";
import { PreconditionError } from "./conditional.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

interface ApiError {
  readonly status: ErrorStatus;
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

function apiError(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ApiError {
  const status = ERROR_STATUS[code];
  return details === undefined
    ? { status, code, message }
    : { status, code, message, details };
}

const INTERNAL: ApiError = apiError("INTERNAL_ERROR", "Internal server error");

/**
 * Translate a thrown error into its API form. Anything unrecognized
 * becomes a 500 whose message does not leak internals.
 */
export function toApiError(err: Error): ApiError {
  if (err instanceof StoreError) {
    return apiError(err.code, err.message);
  }

  if (err instanceof TaskError) {
    switch (err.code) {
      case "TASK_NOT_FOUND":
        return apiError("NOT_FOUND", err.message);
      case "QUEUE_STOPPED":
        return apiError("SERVICE_UNAVAILABLE", err.message);
      case "INVALID_TRANSITION":
        return INTERNAL;
    }
  }

  if (err instanceof PreconditionError) {
    return err.currentETag === undefined
      ? apiError(err.code, err.message)
      : apiError(err.code, err.message, { currentETag: err.currentETag });
  }

  if (err instanceof HTTPException) {
    // Hono raises 400 for a body that is not valid JSON
    if (err.status === 400) {
      return apiError("VALIDATION_ERROR", err.message);
    }
    if (err.status === 401) {
      return apiError("UNAUTHORIZED", err.message);
    }
  }

  return INTERNAL;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 *
 * @param onUnexpected - Called for errors that end up as 500s
 */
export function createErrorHandler(
  onUnexpected?: (err: Error, c: Context<AppEnv>) => void,
): ErrorHandler<AppEnv> {
  return (err, c) => {
    const error = toApiError(err);

    if (error.status === 500) {
      onUnexpected?.(err, c);
    }
    if (err instanceof PreconditionError && err.currentETag !== undefined) {
      c.header("ETag", err.currentETag);
    }

    const envelope = createErrorEnvelope(error.code, error.message, error.details);
    return c.json(envelope, error.status);
  };
}

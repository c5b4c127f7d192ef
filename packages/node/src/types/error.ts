/**
 * Error envelope types for API responses.
 *
 * Every non-2xx response carries
 * { error: { code, message, details? } }, where `code` fixes the status.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Known API error codes, one per status the API answers with.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "PRECONDITION_REQUIRED"
  | "PRECONDITION_FAILED"
  | "NOT_IMPLEMENTED"
  | "SERVICE_UNAVAILABLE"
  | "INTERNAL_ERROR";

export type ErrorStatus = 401 | 404 | 412 | 422 | 428 | 500 | 501 | 503;

export const ERROR_STATUS: Readonly<Record<ApiErrorCode, ErrorStatus>> = {
  VALIDATION_ERROR: 422,
  NOT_FOUND: 404,
  UNAUTHORIZED: 401,
  PRECONDITION_REQUIRED: 428,
  PRECONDITION_FAILED: 412,
  NOT_IMPLEMENTED: 501,
  SERVICE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

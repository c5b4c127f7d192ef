/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler, toApiError } from "./error-handler.js";
export { requestIdMiddleware, isValidRequestId, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, pinoLogFn } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery, validateParams, formatZodErrors } from "./validate.js";
export { computeETag, opaqueTag, etagsMatch, matchesAny } from "./etag.js";
export {
  PreconditionError,
  respondWithETag,
  respondConditionally,
  ifMatchGuard,
} from "./conditional.js";
export type { PreconditionErrorCode } from "./conditional.js";
export { authMiddleware, verifyJwt, signJwt } from "./auth.js";
export type { AuthConfig } from "./auth.js";

/**
 * Conditional request protocol.
 *
 * Entity-agnostic: every helper takes the representation (or a function
 * producing it) and never looks at entity fields.
 *
 * - GET with If-None-Match matching the current validator → 304, no body
 * - PUT without If-Match → 428
 * - PUT with a stale If-Match → 412 carrying the current validator
 *
 * The If-Match check is an UpdateGuard so it runs inside the store's
 * per-key critical section: two writers holding the same validator cannot
 * both pass it. It also runs after the store has resolved the key, so an
 * unknown key is a 404 whatever the preconditions say.
 */

import type { Context } from "hono";
import type { UpdateGuard } from "@ordergrid/store";
import { computeETag, matchesAny } from "./etag.js";

// =============================================================================
// Errors
// =============================================================================

export type PreconditionErrorCode = "PRECONDITION_REQUIRED" | "PRECONDITION_FAILED";

export class PreconditionError extends Error {
  constructor(
    public readonly code: PreconditionErrorCode,
    message: string,
    /** Validator of the representation the request failed against */
    public readonly currentETag?: string,
  ) {
    super(message);
    this.name = "PreconditionError";
  }
}

// =============================================================================
// Responses
// =============================================================================

/**
 * Send a representation with its ETag.
 */
export function respondWithETag<T extends object>(
  c: Context,
  representation: T,
  status: 200 | 201 = 200,
): Response {
  c.header("ETag", computeETag(representation));
  return c.json(representation, status);
}

/**
 * Conditional GET: 304 when If-None-Match matches the current validator,
 * otherwise the full representation. Both carry the ETag.
 */
export function respondConditionally<T extends object>(
  c: Context,
  representation: T,
): Response {
  const etag = computeETag(representation);
  c.header("ETag", etag);

  const ifNoneMatch = c.req.header("If-None-Match");
  if (ifNoneMatch !== undefined && matchesAny(ifNoneMatch, etag)) {
    return c.body(null, 304);
  }
  return c.json(representation, 200);
}

// =============================================================================
// Guards
// =============================================================================

/**
 * Build the precondition check for a conditional PUT.
 *
 * @param ifMatch - Raw If-Match header value, if any
 * @param represent - Serializer whose output the client's validator was computed from
 */
export function ifMatchGuard<TEntity>(
  ifMatch: string | undefined,
  represent: (entity: TEntity) => unknown,
): UpdateGuard<TEntity> {
  return (current) => {
    if (ifMatch === undefined) {
      throw new PreconditionError(
        "PRECONDITION_REQUIRED",
        "If-Match header is required to update this resource",
      );
    }

    const currentETag = computeETag(represent(current));
    if (!matchesAny(ifMatch, currentETag)) {
      throw new PreconditionError(
        "PRECONDITION_FAILED",
        "If-Match header does not match current entity state",
        currentETag,
      );
    }
  };
}

/**
 * ETag utilities for conditional requests.
 *
 * A validator is derived from the canonical JSON (RFC 8785) of an entity
 * representation, so key order never changes it and any field change does.
 * Validators are weak (W/"...") because they identify the JSON
 * representation, not the bytes on the wire.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

const DIGEST_LENGTH = 32;

/**
 * Compute a weak ETag for a JSON-serializable representation.
 */
export function computeETag(representation: unknown): string {
  const digest = createHash("sha256")
    .update(canonicalize(representation))
    .digest("hex")
    .slice(0, DIGEST_LENGTH);
  return `W/"${digest}"`;
}

/**
 * Opaque part of a validator: no W/ prefix, no quotes.
 */
export function opaqueTag(etag: string): string {
  let tag = etag.trim();
  if (tag.startsWith("W/")) {
    tag = tag.slice(2);
  }
  if (tag.length >= 2 && tag.startsWith('"') && tag.endsWith('"')) {
    tag = tag.slice(1, -1);
  }
  return tag;
}

/**
 * Weak comparison: W/"x", "x" and x are all equal.
 */
export function etagsMatch(a: string, b: string): boolean {
  return opaqueTag(a) === opaqueTag(b);
}

/**
 * Evaluate an If-Match / If-None-Match header value against the current
 * validator. `*` matches any existing representation.
 */
export function matchesAny(header: string, current: string): boolean {
  if (header.trim() === "*") {
    return true;
  }
  return header
    .split(",")
    .map((candidate) => candidate.trim())
    .filter((candidate) => candidate !== "")
    .some((candidate) => etagsMatch(candidate, current));
}

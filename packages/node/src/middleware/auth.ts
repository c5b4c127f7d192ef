/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → checked against the configured key set
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, JwtClaims } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Accepted API keys */
  readonly apiKeys: ReadonlySet<string>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

/**
 * Create authentication middleware.
 *
 * Tries X-Api-Key first, then Authorization: Bearer.
 * Returns 401 if neither is present or valid.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    // Strategy 1: API Key
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      if (!config.apiKeys.has(apiKey)) {
        return c.json(
          createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
          401,
        );
      }
      auth = { type: "api-key", identity: apiKey };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "JWT authentication not configured"),
            401,
          );
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "Invalid or expired JWT"),
            401,
          );
        }
        auth = { type: "jwt", identity: claims.sub };
      }
    }

    if (auth === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

const JwtHeaderSchema = z.object({ alg: z.literal("HS256") });

const JwtClaimsSchema = z.object({
  sub: z.string().min(1),
  iss: z.string().optional(),
  exp: z.number().int(),
  iat: z.number().int(),
});

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
}

function sign(input: string, secret: string): string {
  return createHmac("sha256", secret).update(input).digest("base64url");
}

/**
 * Verify an HS256 JWT: signature, expiry and (optionally) issuer.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    return undefined;
  }

  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  if (!JwtHeaderSchema.safeParse(decodeSegment(headerB64)).success) {
    return undefined;
  }

  const parsed = JwtClaimsSchema.safeParse(decodeSegment(payloadB64));
  if (!parsed.success) {
    return undefined;
  }

  const claims = parsed.data;
  if (claims.exp < nowSeconds) {
    return undefined;
  }
  if (expectedIssuer !== undefined && claims.iss !== expectedIssuer) {
    return undefined;
  }

  return claims;
}

/**
 * Create a signed HS256 JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { readonly iat?: number | undefined },
  secret: string,
): string {
  const header = Buffer.from(
    JSON.stringify({ alg: "HS256", typ: "JWT" }),
  ).toString("base64url");

  const payload = Buffer.from(
    JSON.stringify({
      ...claims,
      iat: claims.iat ?? Math.floor(Date.now() / 1000),
    }),
  ).toString("base64url");

  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}

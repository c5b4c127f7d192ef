/**
 * Authentication types.
 *
 * Supports two auth strategies:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 *
 * Every authenticated caller has the same access; there are no roles.
 */

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt";
  readonly identity: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  readonly sub: string;
  readonly iss?: string | undefined;
  readonly exp: number;
  readonly iat: number;
}

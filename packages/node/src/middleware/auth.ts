/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * On success, sets `auth` and `caller` (the account the key or token
 * belongs to). On failure, returns 401 or 403.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type {
  AuthContext,
  Permission,
  ApiKeyRecord,
  JwtClaims,
  Role,
} from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
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
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(
          createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
          401,
        );
      }
      auth = {
        type: "api-key",
        role: record.role,
        accountId: record.accountId,
      };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        const token = authHeader.slice(7);
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "JWT authentication not configured"),
            401,
          );
        }
        const claims = verifyJwt(token, config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "Invalid or expired JWT"),
            401,
          );
        }
        auth = {
          type: "jwt",
          role: claims.role,
          accountId: claims.sub,
        };
      }
    }

    // No auth provided
    if (auth === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    c.set("auth", auth);
    c.set("caller", auth.accountId);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER authMiddleware. Returns 403 if the authenticated
 * role lacks the required permission. Without an auth context
 * (unsecured mode) every request passes.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth !== undefined && !hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

function isRole(value: unknown): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

function decodeSegment(segment: string): Record<string, unknown> | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (decoded === null || typeof decoded !== "object" || Array.isArray(decoded)) {
    return undefined;
  }
  return decoded as Record<string, unknown>;
}

function sign(data: string, secret: string): string {
  return createHmac("sha256", secret).update(data).digest("base64url");
}

/**
 * Verify a JWT token using HMAC-SHA256.
 *
 * Only supports HS256 (alg: "HS256").
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
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

  // Verify signature
  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  const header = decodeSegment(headerB64);
  if (header?.["alg"] !== "HS256") {
    return undefined;
  }

  const payload = decodeSegment(payloadB64);
  if (payload === undefined) {
    return undefined;
  }

  const { sub, role, iss, exp, iat } = payload;
  if (
    typeof sub !== "string" ||
    !isRole(role) ||
    typeof exp !== "number" ||
    typeof iat !== "number"
  ) {
    return undefined;
  }

  // Check expiration
  if (exp < Math.floor(Date.now() / 1000)) {
    return undefined;
  }

  // Check issuer
  if (expectedIssuer !== undefined && iss !== expectedIssuer) {
    return undefined;
  }

  return {
    sub,
    role,
    iss: typeof iss === "string" ? iss : "",
    exp,
    iat,
  };
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
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

/**
 * Caller identity.
 *
 * In secured mode the auth middleware sets the caller from the key or
 * token. In unsecured mode (tests, dev) the caller comes from the
 * X-Account-Id header.
 */

import type { MiddlewareHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../types/api-contract.js";

export const ACCOUNT_ID_HEADER = "X-Account-Id";

export function headerCallerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("caller", c.req.header(ACCOUNT_ID_HEADER));
    await next();
  };
}

/**
 * Narrow the `caller` context variable for a mutating route.
 *
 * @throws HTTPException 401 when the request carries no account
 */
export function requireCaller(caller: string | undefined): string {
  if (caller === undefined || caller === "") {
    throw new HTTPException(401, {
      message: `Caller account required (${ACCOUNT_ID_HEADER} header)`,
    });
  }
  return caller;
}

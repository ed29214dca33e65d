/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Custody errors keep their codes; the code picks the HTTP status.
 * Anything else is a 500 with a generic message.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { CustodyError } from "@timevault/custody";
import type { CustodyErrorCode, CustodyErrorDetails } from "@timevault/custody";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode, ErrorStatus } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const CUSTODY_STATUS: Record<CustodyErrorCode, ErrorStatus> = {
  INVALID_INPUT: 400,
  UNAUTHORIZED: 403,
  LOCK_NOT_FOUND: 404,
  LOCK_ALREADY_EXISTS: 409,
  NOT_YET_EXPIRED: 409,
  REENTRANCY_REJECTED: 409,
  INELIGIBLE_ASSET: 422,
  TRANSFER_FAILED: 422,
  FEE_CHARGE_FAILED: 422,
  PAUSED: 503,
};

const HTTP_ERROR_CODES: Partial<Record<ErrorStatus, ApiErrorCode>> = {
  400: "VALIDATION_ERROR",
  401: "UNAUTHORIZED",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
};

const ERROR_STATUSES: readonly ErrorStatus[] = [
  400, 401, 403, 404, 409, 422, 500, 503,
];

function detailsOf(details: CustodyErrorDetails | undefined) {
  if (details === undefined) {
    return undefined;
  }
  const out: Record<string, unknown> = {};
  if (details.reason !== undefined) {
    out["reason"] = details.reason;
  }
  if (details.compensationFailures !== undefined) {
    out["compensationFailures"] = details.compensationFailures;
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof CustodyError) {
    return c.json(
      createErrorEnvelope(err.code, err.message, detailsOf(err.details)),
      CUSTODY_STATUS[err.code],
    );
  }

  if (err instanceof HTTPException) {
    const status = ERROR_STATUSES.find((s) => s === err.status) ?? 500;
    const code = HTTP_ERROR_CODES[status] ?? "INTERNAL_ERROR";
    return c.json(createErrorEnvelope(code, err.message), status);
  }

  // Don't leak internal details
  return c.json(
    createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
    500,
  );
}

/**
 * Zod validation middleware.
 *
 * Validates request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import { createMiddleware } from "hono/factory";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Context variables added by `validateBody`. Hono merges them into the
 * handler's environment, so `c.get("validatedBody")` is typed.
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` (the parsed output) in context variables.
 * On failure, returns 400 with structured validation errors.
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return createMiddleware<ValidatedEnv<T>>(async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    await next();
  });
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

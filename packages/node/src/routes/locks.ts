/**
 * Lock routes.
 *
 * POST /api/v1/locks                              — Create a lock
 * GET  /api/v1/locks                              — List locks (cursor pagination)
 * GET  /api/v1/locks/:assetType/:unitId           — Get one lock
 * POST /api/v1/locks/:assetType/:unitId/extend    — Extend a lock
 * POST /api/v1/locks/:assetType/:unitId/withdraw  — Withdraw an expired lock
 */

import { Hono } from "hono";
import type { Lock } from "@timevault/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateLockSchema,
  ExtendLockSchema,
  ListLocksQuerySchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { requireCaller } from "../middleware/caller.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import {
  toCreateLockView,
  toExtendLockView,
  toLockView,
  toWithdrawView,
} from "../types/views.js";

/**
 * Path segment → unit id. Anything but plain digits becomes NaN and is
 * rejected by the custody input rules.
 */
export function parseUnitId(segment: string): number {
  return /^\d+$/.test(segment) ? Number(segment) : Number.NaN;
}

/**
 * Identifiers never contain "/", and unit ids are zero-padded, so
 * string order of this key is a total order over locks.
 */
function lockCursorKey(lock: Lock): string {
  return `${lock.assetType}/${String(lock.unitId).padStart(16, "0")}`;
}

export function createLockRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/locks — Create
  routes.post(
    "/",
    requirePermission("write"),
    validateBody(CreateLockSchema),
    (c) => {
      const service = c.get("service");
      const body = c.get("validatedBody");

      const result = service.createLock(body, {
        caller: requireCaller(c.get("caller")),
        correlationId: c.get("requestId"),
      });

      return c.json({ data: toCreateLockView(result) }, 201);
    },
  );

  // GET /api/v1/locks — List
  routes.get("/", requirePermission("read"), (c) => {
    const service = c.get("service");

    const queryResult = ListLocksQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const { cursor, limit, ...filter } = queryResult.data;
    const sorted = [...service.listLocks(filter)].sort((a, b) => {
      const ka = lockCursorKey(a);
      const kb = lockCursorKey(b);
      return ka < kb ? -1 : ka > kb ? 1 : 0;
    });

    const page = paginate(sorted, { cursor, limit }, lockCursorKey, "lock");
    return c.json({ ...page, data: page.data.map(toLockView) });
  });

  // GET /api/v1/locks/:assetType/:unitId — Get one
  routes.get("/:assetType/:unitId", requirePermission("read"), (c) => {
    const service = c.get("service");
    const assetType = c.req.param("assetType");
    const unitId = c.req.param("unitId");
    const lock = service.getLockedAsset(assetType, parseUnitId(unitId));

    if (lock === undefined) {
      return c.json(
        createErrorEnvelope(
          "LOCK_NOT_FOUND",
          `No lock for unit ${unitId} of '${assetType}'`,
        ),
        404,
      );
    }

    return c.json({ data: toLockView(lock) });
  });

  // POST /api/v1/locks/:assetType/:unitId/extend
  routes.post(
    "/:assetType/:unitId/extend",
    requirePermission("write"),
    validateBody(ExtendLockSchema),
    (c) => {
      const service = c.get("service");
      const body = c.get("validatedBody");

      const result = service.extendLockDuration(
        {
          assetType: c.req.param("assetType"),
          unitId: parseUnitId(c.req.param("unitId")),
          extraDuration: body.extraDuration,
        },
        {
          caller: requireCaller(c.get("caller")),
          correlationId: c.get("requestId"),
        },
      );

      return c.json({ data: toExtendLockView(result) });
    },
  );

  // POST /api/v1/locks/:assetType/:unitId/withdraw
  routes.post(
    "/:assetType/:unitId/withdraw",
    requirePermission("write"),
    (c) => {
      const service = c.get("service");

      const result = service.withdrawUnlockedNFT(
        {
          assetType: c.req.param("assetType"),
          unitId: parseUnitId(c.req.param("unitId")),
        },
        {
          caller: requireCaller(c.get("caller")),
          correlationId: c.get("requestId"),
        },
      );

      return c.json({ data: toWithdrawView(result) });
    },
  );

  return routes;
}

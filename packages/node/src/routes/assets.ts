/**
 * Asset type routes.
 *
 * GET  /api/v1/assets/:assetType            — Association status
 * POST /api/v1/assets/:assetType/associate  — Associate custody with an asset type
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";
import { requireCaller } from "../middleware/caller.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:assetType", requirePermission("read"), (c) => {
    const service = c.get("service");
    const assetType = c.req.param("assetType");

    return c.json({
      data: { assetType, associated: service.isAssociated(assetType) },
    });
  });

  // 201 when this call associated, 200 when it was already associated
  routes.post("/:assetType/associate", requirePermission("write"), (c) => {
    const service = c.get("service");

    const result = service.associateAsset(c.req.param("assetType"), {
      caller: requireCaller(c.get("caller")),
      correlationId: c.get("requestId"),
    });

    return c.json({ data: result }, result.associated ? 201 : 200);
  });

  return routes;
}

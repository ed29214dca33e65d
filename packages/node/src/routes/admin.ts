/**
 * Administration routes.
 *
 * GET  /api/v1/admin/config                   — Current custody configuration
 * POST /api/v1/admin/pause                    — Pause lock creation
 * POST /api/v1/admin/unpause                  — Resume lock creation
 * PUT  /api/v1/admin/fees                     — Set creation/extension fees
 * PUT  /api/v1/admin/fee-exemptions/:account  — Grant or revoke a fee exemption
 * POST /api/v1/admin/administrator            — Hand over administration
 *
 * The role check only opens the route; the custody core still requires
 * the caller to be the administrator account.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  SetFeeExemptionSchema,
  SetFeesSchema,
  TransferAdministrationSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { requireCaller } from "../middleware/caller.js";
import { toConfigView } from "../types/views.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/config", requirePermission("read"), (c) => {
    return c.json({ data: toConfigView(c.get("service").getConfig()) });
  });

  routes.post("/pause", requirePermission("admin"), (c) => {
    const service = c.get("service");
    service.pause({
      caller: requireCaller(c.get("caller")),
      correlationId: c.get("requestId"),
    });
    return c.json({ data: toConfigView(service.getConfig()) });
  });

  routes.post("/unpause", requirePermission("admin"), (c) => {
    const service = c.get("service");
    service.unpause({
      caller: requireCaller(c.get("caller")),
      correlationId: c.get("requestId"),
    });
    return c.json({ data: toConfigView(service.getConfig()) });
  });

  routes.put(
    "/fees",
    requirePermission("admin"),
    validateBody(SetFeesSchema),
    (c) => {
      const service = c.get("service");
      service.setFees(c.get("validatedBody"), {
        caller: requireCaller(c.get("caller")),
        correlationId: c.get("requestId"),
      });
      return c.json({ data: toConfigView(service.getConfig()) });
    },
  );

  routes.put(
    "/fee-exemptions/:account",
    requirePermission("admin"),
    validateBody(SetFeeExemptionSchema),
    (c) => {
      const service = c.get("service");
      const account = c.req.param("account");
      const { exempt } = c.get("validatedBody");

      const changed = service.setFeeExemption(account, exempt, {
        caller: requireCaller(c.get("caller")),
        correlationId: c.get("requestId"),
      });
      return c.json({ data: { account, exempt, changed } });
    },
  );

  routes.post(
    "/administrator",
    requirePermission("admin"),
    validateBody(TransferAdministrationSchema),
    (c) => {
      const service = c.get("service");
      service.transferAdministration(c.get("validatedBody").account, {
        caller: requireCaller(c.get("caller")),
        correlationId: c.get("requestId"),
      });
      return c.json({ data: toConfigView(service.getConfig()) });
    },
  );

  return routes;
}

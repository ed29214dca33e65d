/**
 * Sandbox routes for the in-process asset registry and fee ledger.
 *
 * Mounted only when SANDBOX_ENABLED is set. They stand in for the
 * external ledgers a deployment would wire into the custody ports.
 *
 * POST /api/v1/sandbox/asset-types                            — Register an asset type
 * POST /api/v1/sandbox/asset-types/:assetType/units           — Mint a unit
 * GET  /api/v1/sandbox/asset-types/:assetType/units/:unitId   — Current owner
 * POST /api/v1/sandbox/accounts/:account/associations         — Associate an account
 * POST /api/v1/sandbox/accounts/:account/credit               — Credit fee tokens
 * GET  /api/v1/sandbox/accounts/:account/balance              — Fee token balance
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { PortResult } from "@timevault/custody";
import type { AppEnv } from "../types/api-contract.js";
import {
  AssociateAccountSchema,
  CreditSchema,
  MintUnitSchema,
  RegisterAssetTypeSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseUnitId } from "./locks.js";

function rejected(c: Context, result: PortResult & { ok: false }): Response {
  return c.json(createErrorEnvelope("SANDBOX_REJECTED", result.reason), 422);
}

export function createSandboxRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("admin"));

  routes.post("/asset-types", validateBody(RegisterAssetTypeSchema), (c) => {
    const body = c.get("validatedBody");
    const schedule = body.feeSchedule;

    c.get("service").registerAssetType(body.assetType, {
      kind: body.kind,
      feeSchedule: {
        fixed: schedule?.fixed ?? 0,
        fractional: schedule?.fractional ?? 0,
        royalty: schedule?.royalty ?? 0,
      },
    });
    return c.json({ data: { assetType: body.assetType } }, 201);
  });

  routes.post(
    "/asset-types/:assetType/units",
    validateBody(MintUnitSchema),
    (c) => {
      const assetType = c.req.param("assetType");
      const { unitId, owner } = c.get("validatedBody");

      const result = c.get("service").mintUnit(assetType, unitId, owner);
      if (!result.ok) {
        return rejected(c, result);
      }
      return c.json({ data: { assetType, unitId, owner } }, 201);
    },
  );

  routes.get("/asset-types/:assetType/units/:unitId", (c) => {
    const assetType = c.req.param("assetType");
    const unitId = parseUnitId(c.req.param("unitId"));
    const owner = c.get("service").ownerOf(assetType, unitId);

    if (owner === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Unit ${unitId} of '${assetType}' does not exist`),
        404,
      );
    }
    return c.json({ data: { assetType, unitId, owner } });
  });

  routes.post(
    "/accounts/:account/associations",
    validateBody(AssociateAccountSchema),
    (c) => {
      const account = c.req.param("account");
      const { assetType } = c.get("validatedBody");

      const result = c.get("service").associateAccount(account, assetType);
      if (!result.ok) {
        return rejected(c, result);
      }
      return c.json({ data: { account, assetType } }, 201);
    },
  );

  routes.post("/accounts/:account/credit", validateBody(CreditSchema), (c) => {
    const account = c.req.param("account");
    const balance = c.get("service").credit(account, c.get("validatedBody").amount);
    return c.json({ data: { account, balance: balance.toString() } });
  });

  routes.get("/accounts/:account/balance", (c) => {
    const account = c.req.param("account");
    const balance = c.get("service").balanceOf(account);
    return c.json({ data: { account, balance: balance.toString() } });
  });

  return routes;
}

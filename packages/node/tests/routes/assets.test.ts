/**
 * Tests for asset type routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ADMIN, ART, OTHER, callAs, createTestApp, seedAssets } from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";

interface AssociationBody {
  data: { assetType: string; associated: boolean };
}

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
  seedAssets(instance.service);
});

describe("POST /api/v1/assets/:assetType/associate", () => {
  it("associates once and is a no-op afterwards", async () => {
    const { app } = instance;

    const first = await app.request(callAs(OTHER, `/api/v1/assets/${ART}/associate`));
    expect(first.status).toBe(201);
    expect(((await first.json()) as AssociationBody).data).toEqual({
      assetType: ART,
      associated: true,
    });

    const again = await app.request(callAs(OTHER, `/api/v1/assets/${ART}/associate`));
    expect(again.status).toBe(200);
    expect(((await again.json()) as AssociationBody).data.associated).toBe(false);
  });

  it("returns 422 INELIGIBLE_ASSET for a fungible asset type", async () => {
    const { app, service } = instance;
    service.registerAssetType("coin", { kind: "fungible" });

    const res = await app.request(callAs(OTHER, "/api/v1/assets/coin/associate"));

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INELIGIBLE_ASSET");
    expect(body.error.details).toEqual({ reason: "asset kind is fungible" });
  });

  it("returns 503 PAUSED while paused", async () => {
    const { app } = instance;
    await app.request(callAs(ADMIN, "/api/v1/admin/pause"));

    const res = await app.request(callAs(OTHER, `/api/v1/assets/${ART}/associate`));

    expect(res.status).toBe(503);
  });
});

describe("GET /api/v1/assets/:assetType", () => {
  it("reports the association status", async () => {
    const { app } = instance;

    const before = await app.request(`/api/v1/assets/${ART}`);
    expect(((await before.json()) as AssociationBody).data.associated).toBe(false);

    await app.request(callAs(OTHER, `/api/v1/assets/${ART}/associate`));

    const after = await app.request(`/api/v1/assets/${ART}`);
    expect(((await after.json()) as AssociationBody).data.associated).toBe(true);
  });
});

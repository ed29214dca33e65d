/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - JWT bearer auth (valid, invalid, expired, wrong issuer)
 * - Permission guard (allowed, denied)
 * - Caller identity in secured mode
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import {
  authMiddleware,
  requirePermission,
  signJwt,
  verifyJwt,
} from "../../src/middleware/auth.js";
import { ADMIN, ART, OTHER, createTestApp, jsonRequest } from "../setup.js";
import type { ErrorBody } from "../setup.js";

const JWT_SECRET = "test-secret";
const ISSUER = "timevault";

function makeApp(apiKeys: ApiKeyRecord[] = []) {
  const app = new Hono<AppEnv>();
  app.use(
    "*",
    authMiddleware({
      apiKeys: new Map(apiKeys.map((k): [string, ApiKeyRecord] => [k.key, k])),
      jwtSecret: JWT_SECRET,
      jwtIssuer: ISSUER,
    }),
  );
  app.get("/test", (c) => c.json({ auth: c.get("auth"), caller: c.get("caller") }));
  app.get("/admin-only", requirePermission("admin"), (c) => c.json({ ok: true }));
  app.get("/write-only", requirePermission("write"), (c) => c.json({ ok: true }));
  return app;
}

function inOneHour(): number {
  return Math.floor(Date.now() / 1000) + 3600;
}

describe("API Key auth", () => {
  it("authenticates with a valid API key and sets the caller", async () => {
    const app = makeApp([{ key: "key-1", role: "operator", accountId: "carol" }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "key-1" } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      auth: { type: "api-key", role: "operator", accountId: "carol" },
      caller: "carol",
    });
  });

  it("returns 401 for an invalid API key", async () => {
    const app = makeApp([{ key: "key-1", role: "operator", accountId: "carol" }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "nope" } });

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error.message).toBe("Invalid API key");
  });

  it("returns 401 when no credentials are sent", async () => {
    const res = await makeApp().request("/test");

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error.message).toBe("Authentication required");
  });
});

describe("JWT auth", () => {
  it("authenticates with a valid token", async () => {
    const token = signJwt(
      { sub: "bob", role: "viewer", iss: ISSUER, exp: inOneHour() },
      JWT_SECRET,
    );

    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      auth: { type: "jwt", role: "viewer", accountId: "bob" },
      caller: "bob",
    });
  });

  it("rejects a token signed with another secret", () => {
    const token = signJwt(
      { sub: "bob", role: "viewer", iss: ISSUER, exp: inOneHour() },
      "other-secret",
    );

    expect(verifyJwt(token, JWT_SECRET, ISSUER)).toBeUndefined();
  });

  it("rejects an expired token", () => {
    const token = signJwt(
      { sub: "bob", role: "viewer", iss: ISSUER, exp: Math.floor(Date.now() / 1000) - 1 },
      JWT_SECRET,
    );

    expect(verifyJwt(token, JWT_SECRET, ISSUER)).toBeUndefined();
  });

  it("rejects a token from another issuer", () => {
    const token = signJwt(
      { sub: "bob", role: "viewer", iss: "elsewhere", exp: inOneHour() },
      JWT_SECRET,
    );

    expect(verifyJwt(token, JWT_SECRET, ISSUER)).toBeUndefined();
  });

  it("rejects malformed tokens", () => {
    expect(verifyJwt("not-a-jwt", JWT_SECRET)).toBeUndefined();
    expect(verifyJwt("a.b.c.d", JWT_SECRET)).toBeUndefined();
  });

  it("returns the claims of a valid token", () => {
    const exp = inOneHour();
    const token = signJwt(
      { sub: "bob", role: "admin", iss: ISSUER, exp, iat: 100 },
      JWT_SECRET,
    );

    expect(verifyJwt(token, JWT_SECRET, ISSUER)).toEqual({
      sub: "bob",
      role: "admin",
      iss: ISSUER,
      exp,
      iat: 100,
    });
  });
});

describe("requirePermission", () => {
  const keys: ApiKeyRecord[] = [
    { key: "viewer-key", role: "viewer", accountId: "v" },
    { key: "admin-key", role: "admin", accountId: "a" },
  ];

  it("returns 403 when the role lacks the permission", async () => {
    const res = await makeApp(keys).request("/write-only", {
      headers: { "X-Api-Key": "viewer-key" },
    });

    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "FORBIDDEN",
      message: "Role 'viewer' lacks 'write' permission",
    });
  });

  it("allows a role that has the permission", async () => {
    const res = await makeApp(keys).request("/admin-only", {
      headers: { "X-Api-Key": "admin-key" },
    });

    expect(res.status).toBe(200);
  });
});

describe("secured app", () => {
  function securedApp() {
    return createTestApp({
      auth: {
        apiKeys: new Map<string, ApiKeyRecord>([
          ["admin-key", { key: "admin-key", role: "admin", accountId: ADMIN }],
          ["mallory-key", { key: "mallory-key", role: "admin", accountId: OTHER }],
          ["viewer-key", { key: "viewer-key", role: "viewer", accountId: ADMIN }],
        ]),
      },
    });
  }

  it("acts as the key's account and ignores X-Account-Id", async () => {
    const { app } = securedApp();

    const res = await app.request(
      jsonRequest("/api/v1/admin/pause", "POST", undefined, {
        "X-Api-Key": "mallory-key",
        "X-Account-Id": ADMIN,
      }),
    );

    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error.code).toBe("UNAUTHORIZED");
  });

  it("lets the administrator's key pause", async () => {
    const { app } = securedApp();

    const res = await app.request(
      jsonRequest("/api/v1/admin/pause", "POST", undefined, { "X-Api-Key": "admin-key" }),
    );

    expect(res.status).toBe(200);
  });

  it("blocks a viewer from admin routes before the custody check", async () => {
    const { app } = securedApp();

    const res = await app.request(
      jsonRequest("/api/v1/admin/pause", "POST", undefined, { "X-Api-Key": "viewer-key" }),
    );

    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error.code).toBe("FORBIDDEN");
  });

  it("leaves health routes open", async () => {
    const { app } = securedApp();

    const res = await app.request("/health");

    expect(res.status).toBe(200);
  });

  it("requires credentials for reads", async () => {
    const { app } = securedApp();

    const res = await app.request(`/api/v1/assets/${ART}`);

    expect(res.status).toBe(401);
  });
});

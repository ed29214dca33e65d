/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { CREATOR, callAs, createTestApp } from "../setup.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    const res = await app.request("/health");

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: res.headers.get("X-Request-Id"),
      caller: undefined,
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("records the caller and error status", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(callAs(CREATOR, "/api/v1/locks/art/1/withdraw"));

    expect(entries[0]).toMatchObject({
      method: "POST",
      path: "/api/v1/locks/art/1/withdraw",
      status: 404,
      caller: CREATOR,
    });
  });
});

/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event store hash chain integrity, no
 *               custody events lost since startup)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CustodyService } from "../services/custody-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.checkEventStore();
    const eventStore: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `chain broken after position ${integrity.lastVerifiedPosition}, errors=${integrity.errors.length}`,
        };
    const unrecorded = service.unrecordedEvents();
    const eventLog: SubsystemStatus =
      unrecorded === 0
        ? { status: "ok" }
        : { status: "down", detail: `${unrecorded} custody events not recorded` };
    const ready = eventStore.status === "ok" && eventLog.status === "ok";

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        paused: service.getConfig().paused,
        subsystems: { eventStore, eventLog },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}

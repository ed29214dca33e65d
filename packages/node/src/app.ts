/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app without
 * starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { CustodyService } from "./services/custody-service.js";
import type {
  CustodyServiceConfig,
  CustodyServiceOptions,
} from "./services/custody-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { headerCallerMiddleware } from "./middleware/caller.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAssetRoutes } from "./routes/assets.js";
import { createLockRoutes } from "./routes/locks.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";
import { createSandboxRoutes } from "./routes/sandbox.js";

// =============================================================================
// Options
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: CustodyServiceConfig;

  /** Logger and clock handed to the service */
  readonly serviceOptions?: CustodyServiceOptions | undefined;

  /** Request log sink; requests are not logged when omitted */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;

  /** Secured mode when set; otherwise callers identify via X-Account-Id */
  readonly auth?: AuthConfig | undefined;

  /** Mount the sandbox routes for the in-process ports */
  readonly sandbox?: boolean | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CustodyService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const app = new Hono<AppEnv>();
  const service = new CustodyService(
    options.serviceConfig,
    options.serviceOptions,
  );

  // ─── Global Middleware ──────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", headerCallerMiddleware());
  }

  app.route("/api/v1/assets", createAssetRoutes());
  app.route("/api/v1/locks", createLockRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());

  if (options.sandbox === true) {
    app.route("/api/v1/sandbox", createSandboxRoutes());
  }

  return { app, service };
}

/**
 * @timevault/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0 || config.JWT_SECRET !== undefined) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = {
      apiKeys: keyMap,
      jwtSecret: config.JWT_SECRET,
      jwtIssuer: config.JWT_ISSUER,
    };
    logger.info(
      { apiKeyCount: parsedKeys.length, jwtEnabled: config.JWT_SECRET !== undefined },
      "Auth configured",
    );
  } else {
    logger.warn("No API keys or JWT secret configured; callers identify via X-Account-Id");
  }

  if (config.SANDBOX_ENABLED) {
    logger.warn("Sandbox routes enabled");
  }

  const { app, service } = createApp({
    serviceConfig: {
      administrator: config.ADMIN_ACCOUNT,
      custodyAccount: config.CUSTODY_ACCOUNT,
      feeRecipient: config.FEE_RECIPIENT,
      fees: {
        creationFee: config.CREATION_FEE,
        extensionFee: config.EXTENSION_FEE,
      },
      feeExempt: config.FEE_EXEMPT_ACCOUNTS,
      dataDir: config.DATA_DIR,
    },
    serviceOptions: { logger: logger.child({ component: "custody" }) },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    auth: authConfig,
    sandbox: config.SANDBOX_ENABLED,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      persistence: config.DATA_DIR ?? "memory",
      paused: service.getConfig().paused,
    },
    "Timevault node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});

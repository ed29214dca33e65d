/**
 * Test helpers for @timevault/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import type { CustodyService } from "../src/services/custody-service.js";

export const ADMIN = "admin";
export const CUSTODY = "custody";
export const TREASURY = "treasury";
export const CREATOR = "carol";
export const BENEFICIARY = "bob";
export const OTHER = "mallory";
export const ART = "art";

/** Clock start for test apps (seconds) */
export const T0 = 1_000;

export interface TestApp extends AppInstance {
  /** Move the service clock to `seconds` */
  setTime(seconds: number): void;
}

/**
 * Create a test app with default configuration.
 *
 * Unsecured mode (callers identify via X-Account-Id), sandbox routes
 * mounted, clock fixed at T0.
 */
export function createTestApp(
  overrides: Partial<CreateAppOptions> = {},
): TestApp {
  let now = T0;
  const instance = createApp({
    serviceConfig: {
      administrator: ADMIN,
      custodyAccount: CUSTODY,
      feeRecipient: TREASURY,
    },
    sandbox: true,
    ...overrides,
    serviceOptions: {
      clock: () => now,
      ...overrides.serviceOptions,
    },
  });

  return {
    ...instance,
    setTime: (seconds) => {
      now = seconds;
    },
  };
}

/**
 * Register ART, mint units 1-3 to the creator, associate the
 * beneficiary and fund both with fee tokens.
 */
export function seedAssets(service: CustodyService): void {
  service.registerAssetType(ART, {});
  for (const unitId of [1, 2, 3]) {
    service.mintUnit(ART, unitId, CREATOR);
  }
  service.associateAccount(BENEFICIARY, ART);
  service.credit(CREATOR, 1000n);
  service.credit(BENEFICIARY, 1000n);
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Request made by `account` in unsecured mode.
 */
export function callAs(
  account: string,
  path: string,
  method: string = "POST",
  body?: unknown,
): Request {
  return jsonRequest(path, method, body, { "X-Account-Id": account });
}

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

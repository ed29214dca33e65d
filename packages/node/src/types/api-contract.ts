/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { CustodyService } from "../services/custody-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Timevault app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The custody service (set for every /api request) */
    service: CustodyService;

    /** Authentication context (secured mode only) */
    auth: AuthContext | undefined;

    /**
     * Account the request acts as: the authenticated account, or the
     * X-Account-Id header in unsecured mode
     */
    caller: string | undefined;
  };
}

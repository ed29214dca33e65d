/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
export { authMiddleware, requirePermission, verifyJwt, signJwt } from "./auth.js";
export type { AuthConfig } from "./auth.js";
export {
  headerCallerMiddleware,
  requireCaller,
  ACCOUNT_ID_HEADER,
} from "./caller.js";

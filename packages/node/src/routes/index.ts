/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAssetRoutes } from "./assets.js";
export { createLockRoutes, parseUnitId } from "./locks.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";
export { createSandboxRoutes } from "./sandbox.js";

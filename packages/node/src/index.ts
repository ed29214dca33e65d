/**
 * @timevault/node — HTTP node for the custody service.
 *
 * @packageDocumentation
 */

export { CustodyService, CUSTODY_SNAPSHOT_STREAM } from "./services/custody-service.js";
export type {
  CustodyServiceConfig,
  CustodyServiceOptions,
  CallContext,
  LockQuery,
} from "./services/custody-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";

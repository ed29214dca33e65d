/**
 * @timevault/types — Shared domain types for the Timevault stack.
 *
 * - Opaque identifiers (accounts, asset types, unit serials)
 * - Lock records
 * - Event envelope
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Guards are the only way to turn raw input into a branded identifier
 */

// Value types
export type { AccountId, AssetTypeId, UnitId } from "./values.js";
export {
  MAX_IDENTIFIER_LENGTH,
  isAccountId,
  isAssetTypeId,
  isUnitId,
} from "./values.js";

// Lock types
export type { Lock, LockKey } from "./lock.js";
export { releaseTimeOf } from "./lock.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isLock,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";

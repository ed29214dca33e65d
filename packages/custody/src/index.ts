/**
 * @timevault/custody — Time-locked custody of non-fungible asset units.
 *
 * - Timevault coordinator (associate → create → extend → withdraw)
 * - Admin gate: pause switch, fee policy, administrator
 * - Port contracts for asset transfer, asset metadata and fees
 * - In-process port implementations for development and tests
 *
 * @packageDocumentation
 */

// Coordinator
export { Timevault } from "./timevault.js";
export type { RestoreConfig } from "./timevault.js";

// Components
export { LockLifecycle } from "./lifecycle.js";
export type { LockLifecycleDeps, Outcome } from "./lifecycle.js";
export { InMemoryLockStore } from "./lock-store.js";
export type { LockStore } from "./lock-store.js";
export { EligibilityGuard } from "./eligibility.js";
export type { EligibilityVerdict } from "./eligibility.js";
export { AdminGate, assertFees, FEE_CEILING, NO_FEES } from "./admin-gate.js";
export type { AdminState, FeeKind } from "./admin-gate.js";
export { AssociationRegistry } from "./associations.js";
export { ReentrancyGuard } from "./reentrancy.js";
export { UnitOfWork, callPort } from "./unit-of-work.js";

// Errors
export { CustodyError } from "./errors.js";
export type { CustodyErrorCode, CustodyErrorDetails } from "./errors.js";

// Input parsing
export {
  MIN_LOCK_DURATION_SECONDS,
  toAccountId,
  toAssetTypeId,
  toUnitId,
  toLockKey,
  toDuration,
} from "./values.js";

// Events & snapshots
export {
  ADMIN_STREAM,
  assetStreamId,
  lockStreamId,
  payloadOf,
  sourceOf,
  streamIdOf,
} from "./events.js";
export { parseTimevaultSnapshot } from "./snapshot.js";

// Types
export type {
  PortResult,
  AssetTransferPort,
  AssetKind,
  AssetFeeSchedule,
  AssetDescription,
  AssetInfoPort,
  FeePort,
  TimevaultPorts,
  FeeConfig,
  Clock,
  TimevaultConfig,
  TimevaultOptions,
  CustodyConfigView,
  CreateLockRequest,
  ExtendLockRequest,
  LockRef,
  LockFilter,
  AssociateResult,
  CreateLockResult,
  ExtendLockResult,
  WithdrawResult,
  AssetAssociatedEvent,
  LockCreatedEvent,
  LockDurationExtendedEvent,
  UnlockedAssetWithdrawnEvent,
  CustodyPausedEvent,
  CustodyUnpausedEvent,
  FeesUpdatedEvent,
  FeeExemptionUpdatedEvent,
  AdministratorTransferredEvent,
  CustodyEvent,
  CustodyEventType,
  CustodyEventListener,
  ListenerErrorHandler,
  TimevaultSnapshot,
} from "./types.js";

// In-process ports
export { InMemoryAssetRegistry } from "./in-memory/asset-registry.js";
export type { AssetTypeDefinition } from "./in-memory/asset-registry.js";
export { InMemoryFeeLedger } from "./in-memory/fee-ledger.js";

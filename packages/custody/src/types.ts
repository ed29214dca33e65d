/**
 * Custody types — ports, configuration, events and results.
 */

import type { AccountId, AssetTypeId, Lock, UnitId } from "@timevault/types";

// =============================================================================
// Ports
// =============================================================================

export type PortResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

/**
 * Moves asset units between accounts.
 */
export interface AssetTransferPort {
  transfer(
    assetType: AssetTypeId,
    unitId: UnitId,
    from: AccountId,
    to: AccountId,
  ): PortResult;

  /** Allow `account` to hold units of `assetType` */
  associate(account: AccountId, assetType: AssetTypeId): PortResult;
}

export type AssetKind = "non-fungible" | "fungible";

/**
 * Number of custom fees of each kind attached to an asset type.
 * Royalty fees with a fallback fee count as royalty fees.
 */
export interface AssetFeeSchedule {
  readonly fixed: number;
  readonly fractional: number;
  readonly royalty: number;
}

export interface AssetDescription {
  readonly kind: AssetKind;
  readonly feeSchedule: AssetFeeSchedule;
}

/**
 * Asset metadata oracle.
 */
export interface AssetInfoPort {
  /** Undefined when the asset type is unknown */
  describe(assetType: AssetTypeId): AssetDescription | undefined;
}

/**
 * Fungible fee payments in integer fee units.
 */
export interface FeePort {
  charge(payer: AccountId, recipient: AccountId, amount: bigint): PortResult;
}

export interface TimevaultPorts {
  readonly transfer: AssetTransferPort;
  readonly assetInfo: AssetInfoPort;
  readonly fees: FeePort;
}

// =============================================================================
// Configuration
// =============================================================================

export interface FeeConfig {
  readonly creationFee: bigint;
  readonly extensionFee: bigint;
}

/** Current time in whole seconds since the Unix epoch */
export type Clock = () => number;

export interface TimevaultConfig {
  readonly administrator: string;

  /** Account that holds locked units */
  readonly custodyAccount: string;

  /** Account credited with charged fees */
  readonly feeRecipient: string;

  /** Default: no fees */
  readonly fees?: FeeConfig | undefined;

  readonly feeExempt?: readonly string[] | undefined;
}

export interface TimevaultOptions {
  readonly clock?: Clock | undefined;

  /**
   * Receives a listener's failure. The call that produced the event has
   * already committed, so the failure is never its outcome. When unset,
   * failures are kept in `Timevault.listenerFailures()`.
   */
  readonly onListenerError?: ListenerErrorHandler | undefined;
}

/**
 * Read-only view of the custody configuration.
 */
export interface CustodyConfigView {
  readonly administrator: AccountId;
  readonly custodyAccount: AccountId;
  readonly feeRecipient: AccountId;
  readonly paused: boolean;
  readonly fees: FeeConfig;
  readonly feeExempt: readonly AccountId[];
  readonly feeCeiling: bigint;
  readonly minLockDurationSeconds: number;
}

// =============================================================================
// Requests & Results
// =============================================================================

export interface CreateLockRequest {
  readonly assetType: string;
  readonly unitId: number;
  readonly beneficiary: string;

  /** Seconds; must exceed the minimum lock duration */
  readonly duration: number;
}

export interface ExtendLockRequest {
  readonly assetType: string;
  readonly unitId: number;
  readonly extraDuration: number;
}

export interface LockRef {
  readonly assetType: string;
  readonly unitId: number;
}

export interface LockFilter {
  readonly assetType?: string | undefined;
  readonly creator?: string | undefined;
  readonly beneficiary?: string | undefined;

  /** Only locks releasable at or before this time (seconds) */
  readonly unlockedAt?: number | undefined;
}

export interface AssociateResult {
  readonly assetType: AssetTypeId;

  /** False when the asset type was already associated */
  readonly associated: boolean;
}

export interface CreateLockResult {
  readonly lock: Lock;
  readonly feeCharged: bigint;

  /** True when this call also associated the asset type */
  readonly associated: boolean;
}

export interface ExtendLockResult {
  readonly lock: Lock;
  readonly feeCharged: bigint;
}

export interface WithdrawResult {
  /** The record as it was before release */
  readonly lock: Lock;
  readonly releasedTo: AccountId;
}

// =============================================================================
// Events
// =============================================================================

interface CustodyEventBase {
  /** Account whose call produced the event */
  readonly actor: AccountId;

  /** Seconds since the Unix epoch */
  readonly at: number;
}

export interface AssetAssociatedEvent extends CustodyEventBase {
  readonly type: "custody.asset.associated";
  readonly assetType: AssetTypeId;
}

export interface LockCreatedEvent extends CustodyEventBase {
  readonly type: "custody.lock.created";
  readonly assetType: AssetTypeId;
  readonly unitId: UnitId;
  readonly creator: AccountId;
  readonly beneficiary: AccountId;
  readonly duration: number;
  readonly start: number;
  readonly feeCharged: bigint;
}

export interface LockDurationExtendedEvent extends CustodyEventBase {
  readonly type: "custody.lock.extended";
  readonly assetType: AssetTypeId;
  readonly unitId: UnitId;
  readonly extraDuration: number;
  readonly duration: number;
  readonly feeCharged: bigint;
}

export interface UnlockedAssetWithdrawnEvent extends CustodyEventBase {
  readonly type: "custody.lock.withdrawn";
  readonly assetType: AssetTypeId;
  readonly unitId: UnitId;
  readonly beneficiary: AccountId;
}

export interface CustodyPausedEvent extends CustodyEventBase {
  readonly type: "admin.custody.paused";
}

export interface CustodyUnpausedEvent extends CustodyEventBase {
  readonly type: "admin.custody.unpaused";
}

export interface FeesUpdatedEvent extends CustodyEventBase {
  readonly type: "admin.fees.updated";
  readonly creationFee: bigint;
  readonly extensionFee: bigint;
}

export interface FeeExemptionUpdatedEvent extends CustodyEventBase {
  readonly type: "admin.fee-exemption.updated";
  readonly account: AccountId;
  readonly exempt: boolean;
}

export interface AdministratorTransferredEvent extends CustodyEventBase {
  readonly type: "admin.administrator.transferred";
  readonly previous: AccountId;
  readonly next: AccountId;
}

export type CustodyEvent =
  | AssetAssociatedEvent
  | LockCreatedEvent
  | LockDurationExtendedEvent
  | UnlockedAssetWithdrawnEvent
  | CustodyPausedEvent
  | CustodyUnpausedEvent
  | FeesUpdatedEvent
  | FeeExemptionUpdatedEvent
  | AdministratorTransferredEvent;

export type CustodyEventType = CustodyEvent["type"];

export type CustodyEventListener = (event: CustodyEvent) => void;

export type ListenerErrorHandler = (error: unknown, event: CustodyEvent) => void;

// =============================================================================
// Snapshot
// =============================================================================

export interface TimevaultSnapshot {
  readonly version: 1;
  readonly locks: readonly Lock[];
  readonly associatedAssetTypes: readonly string[];
  readonly admin: {
    readonly administrator: string;
    readonly paused: boolean;
    /** Decimal strings */
    readonly fees: {
      readonly creationFee: string;
      readonly extensionFee: string;
    };
    readonly feeExempt: readonly string[];
  };
  readonly savedAt: string;
}

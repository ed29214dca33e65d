/**
 * Lock Types
 *
 * A Lock binds one asset unit held in custody to a beneficiary
 * for a time window.
 *
 * Rules:
 * - (assetType, unitId) identifies at most one live lock
 * - `start` is set once at creation and never changes
 * - `duration` only grows (via extension)
 * - Times are whole seconds since the Unix epoch
 */

import type { AccountId, AssetTypeId, UnitId } from "./values.js";

/**
 * Composite key of a lock record.
 */
export interface LockKey {
  readonly assetType: AssetTypeId;
  readonly unitId: UnitId;
}

/**
 * A live lock record.
 */
export interface Lock extends LockKey {
  /** Account that deposited the unit */
  readonly creator: AccountId;

  /** Account entitled to extend the lock and receive the unit */
  readonly beneficiary: AccountId;

  /** Creation time (seconds) */
  readonly start: number;

  /** Seconds from `start` until the unit may be released */
  readonly duration: number;
}

/**
 * Time (seconds) at which a lock becomes withdrawable.
 */
export function releaseTimeOf(lock: Pick<Lock, "start" | "duration">): number {
  return lock.start + lock.duration;
}

/**
 * LockLifecycle — the lock state machine.
 *
 *   (absent) --create--> live --extend--> live --withdraw--> (absent)
 *
 * Rules:
 * - Preconditions are checked in a fixed order; the first failure wins
 *   and nothing changes
 * - Creation transfers the unit in, charges the fee, then writes the
 *   record; a failure at any step undoes the earlier ones
 * - Only the beneficiary may extend; duration only grows
 * - Anyone may withdraw once the lock has expired; the unit always goes
 *   to the beneficiary
 * - Every operation re-reads the record; nothing is cached across calls
 */

import { releaseTimeOf } from "@timevault/types";
import type { AccountId, AssetTypeId, Lock, LockKey } from "@timevault/types";
import { CustodyError } from "./errors.js";
import type { AdminGate } from "./admin-gate.js";
import type { AssociationRegistry } from "./associations.js";
import type { EligibilityGuard } from "./eligibility.js";
import type { LockStore } from "./lock-store.js";
import { callPort, UnitOfWork } from "./unit-of-work.js";
import {
  assertReleaseTime,
  MIN_LOCK_DURATION_SECONDS,
  toAccountId,
  toDuration,
  toLockKey,
} from "./values.js";
import type {
  AssetTransferPort,
  Clock,
  CreateLockRequest,
  CreateLockResult,
  CustodyEvent,
  ExtendLockRequest,
  ExtendLockResult,
  FeePort,
  LockRef,
  WithdrawResult,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface LockLifecycleDeps {
  readonly store: LockStore;
  readonly eligibility: EligibilityGuard;
  readonly admin: AdminGate;
  readonly associations: AssociationRegistry;
  readonly transfer: AssetTransferPort;
  readonly fees: FeePort;
  readonly custodyAccount: AccountId;
  readonly feeRecipient: AccountId;
  readonly clock: Clock;
}

/**
 * A result plus the events describing what changed.
 */
export interface Outcome<T> {
  readonly value: T;
  readonly events: readonly CustodyEvent[];
}

// =============================================================================
// Lock Lifecycle
// =============================================================================

export class LockLifecycle {
  private readonly deps: LockLifecycleDeps;

  constructor(deps: LockLifecycleDeps) {
    this.deps = deps;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Association
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Associate the custody account with an asset type it is not yet
   * associated with.
   *
   * @throws CustodyError TRANSFER_FAILED when the port refuses
   */
  associate(assetType: AssetTypeId, actor: AccountId): CustodyEvent {
    const { transfer, custodyAccount, associations, clock } = this.deps;

    const result = callPort(() => transfer.associate(custodyAccount, assetType));
    if (!result.ok) {
      throw new CustodyError(
        "TRANSFER_FAILED",
        `Could not associate custody with asset type '${assetType}': ${result.reason}`,
        { reason: result.reason },
      );
    }

    associations.add(assetType);
    return { type: "custody.asset.associated", actor, at: clock(), assetType };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Create
  // ───────────────────────────────────────────────────────────────────────

  create(request: CreateLockRequest, caller: string): Outcome<CreateLockResult> {
    const { store, eligibility, admin, associations, transfer, fees, clock } =
      this.deps;
    const { custodyAccount, feeRecipient } = this.deps;

    admin.assertNotPaused();

    const key = toLockKey(request.assetType, request.unitId);
    const beneficiary = toAccountId(request.beneficiary, "beneficiary");
    const creator = toAccountId(caller, "caller");
    const duration = toDuration(
      request.duration,
      "duration",
      MIN_LOCK_DURATION_SECONDS,
    );
    const start = clock();
    assertReleaseTime(start, duration);

    if (store.get(key) !== undefined) {
      throw new CustodyError(
        "LOCK_ALREADY_EXISTS",
        `Unit ${key.unitId} of '${key.assetType}' is already locked`,
      );
    }

    eligibility.assertLockable(key.assetType);

    const work = new UnitOfWork();
    const events: CustodyEvent[] = [];

    let associated = false;
    if (!associations.has(key.assetType)) {
      events.push(this.associate(key.assetType, creator));
      associated = true;
      // The port association stays: it is idempotent, and the registry
      // only lists associations whose event was published. A retry
      // re-associates and emits the event then.
      work.onRollback("forget association", () => {
        associations.delete(key.assetType);
        return { ok: true };
      });
    }

    const moved = callPort(() =>
      transfer.transfer(key.assetType, key.unitId, creator, custodyAccount),
    );
    if (!moved.ok) {
      work.fail(
        new CustodyError(
          "TRANSFER_FAILED",
          `Could not move unit ${key.unitId} of '${key.assetType}' into custody: ${moved.reason}`,
          { reason: moved.reason },
        ),
      );
    }
    work.onRollback("return unit to creator", () =>
      transfer.transfer(key.assetType, key.unitId, custodyAccount, creator),
    );

    const fee = admin.feeFor("creation", creator);
    if (fee > 0n) {
      const charged = callPort(() => fees.charge(creator, feeRecipient, fee));
      if (!charged.ok) {
        work.fail(
          new CustodyError(
            "FEE_CHARGE_FAILED",
            `Could not charge creation fee of ${fee}: ${charged.reason}`,
            { reason: charged.reason },
          ),
        );
      }
    }

    const lock: Lock = {
      assetType: key.assetType,
      unitId: key.unitId,
      creator,
      beneficiary,
      start,
      duration,
    };
    store.put(lock);

    events.push({
      type: "custody.lock.created",
      actor: creator,
      at: start,
      assetType: lock.assetType,
      unitId: lock.unitId,
      creator,
      beneficiary,
      duration,
      start,
      feeCharged: fee,
    });

    return { value: { lock, feeCharged: fee, associated }, events };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Extend
  // ───────────────────────────────────────────────────────────────────────

  extend(request: ExtendLockRequest, caller: string): Outcome<ExtendLockResult> {
    const { store, admin, fees, feeRecipient, clock } = this.deps;

    const key = toLockKey(request.assetType, request.unitId);
    const extraDuration = toDuration(request.extraDuration, "extraDuration");
    const actor = toAccountId(caller, "caller");

    const lock = this.requireLock(key);
    if (actor !== lock.beneficiary) {
      throw new CustodyError(
        "UNAUTHORIZED",
        `Only the beneficiary may extend unit ${key.unitId} of '${key.assetType}'`,
      );
    }

    const duration = lock.duration + extraDuration;
    assertReleaseTime(lock.start, duration);

    const fee = admin.feeFor("extension", actor);
    if (fee > 0n) {
      const charged = callPort(() => fees.charge(actor, feeRecipient, fee));
      if (!charged.ok) {
        throw new CustodyError(
          "FEE_CHARGE_FAILED",
          `Could not charge extension fee of ${fee}: ${charged.reason}`,
          { reason: charged.reason },
        );
      }
    }

    const updated: Lock = { ...lock, duration };
    store.put(updated);

    return {
      value: { lock: updated, feeCharged: fee },
      events: [
        {
          type: "custody.lock.extended",
          actor,
          at: clock(),
          assetType: updated.assetType,
          unitId: updated.unitId,
          extraDuration,
          duration,
          feeCharged: fee,
        },
      ],
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdraw
  // ───────────────────────────────────────────────────────────────────────

  withdraw(ref: LockRef, caller: string): Outcome<WithdrawResult> {
    const { store, eligibility, transfer, custodyAccount, clock } = this.deps;

    const key = toLockKey(ref.assetType, ref.unitId);
    const actor = toAccountId(caller, "caller");

    const lock = this.requireLock(key);
    const now = clock();
    const releaseAt = releaseTimeOf(lock);
    if (now < releaseAt) {
      throw new CustodyError(
        "NOT_YET_EXPIRED",
        `Unit ${key.unitId} of '${key.assetType}' is locked until ${releaseAt} (now ${now})`,
      );
    }

    eligibility.assertLockable(key.assetType);

    // The claim is cleared before the unit leaves custody.
    store.delete(key);
    const moved = callPort(() =>
      transfer.transfer(key.assetType, key.unitId, custodyAccount, lock.beneficiary),
    );
    if (!moved.ok) {
      store.put(lock);
      throw new CustodyError(
        "TRANSFER_FAILED",
        `Could not release unit ${key.unitId} of '${key.assetType}' to '${lock.beneficiary}': ${moved.reason}`,
        { reason: moved.reason },
      );
    }

    return {
      value: { lock, releasedTo: lock.beneficiary },
      events: [
        {
          type: "custody.lock.withdrawn",
          actor,
          at: now,
          assetType: lock.assetType,
          unitId: lock.unitId,
          beneficiary: lock.beneficiary,
        },
      ],
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireLock(key: LockKey): Lock {
    const lock = this.deps.store.get(key);
    if (lock === undefined) {
      throw new CustodyError(
        "LOCK_NOT_FOUND",
        `No lock for unit ${key.unitId} of '${key.assetType}'`,
      );
    }
    return lock;
  }
}

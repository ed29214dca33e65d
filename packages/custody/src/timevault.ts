/**
 * Timevault — custody top-level coordinator.
 *
 * Composes:
 * - LockStore (lock records)
 * - EligibilityGuard (which asset types may be held)
 * - AdminGate (administrator, pause switch, fee policy)
 * - LockLifecycle (create → extend → withdraw)
 * - ReentrancyGuard (one mutating call at a time)
 *
 * Every mutating entry point runs inside the reentrancy guard. Events
 * produced by a call reach listeners only after the call succeeds; a
 * listener that throws does not undo the call or stop delivery to the
 * others.
 */

import { releaseTimeOf } from "@timevault/types";
import type { AccountId, Lock } from "@timevault/types";
import { AdminGate, FEE_CEILING, NO_FEES } from "./admin-gate.js";
import { AssociationRegistry } from "./associations.js";
import { EligibilityGuard } from "./eligibility.js";
import { LockLifecycle } from "./lifecycle.js";
import type { Outcome } from "./lifecycle.js";
import { InMemoryLockStore } from "./lock-store.js";
import type { LockStore } from "./lock-store.js";
import { ReentrancyGuard } from "./reentrancy.js";
import { parseTimevaultSnapshot } from "./snapshot.js";
import {
  MIN_LOCK_DURATION_SECONDS,
  toAccountId,
  toAssetTypeId,
  toLockKey,
} from "./values.js";
import type {
  AssociateResult,
  Clock,
  CreateLockRequest,
  CreateLockResult,
  CustodyConfigView,
  CustodyEvent,
  CustodyEventListener,
  ExtendLockRequest,
  ExtendLockResult,
  FeeConfig,
  ListenerErrorHandler,
  LockFilter,
  LockRef,
  TimevaultConfig,
  TimevaultOptions,
  TimevaultPorts,
  TimevaultSnapshot,
  WithdrawResult,
} from "./types.js";

export type RestoreConfig = Pick<TimevaultConfig, "custodyAccount" | "feeRecipient">;

const systemClock: Clock = () => Math.floor(Date.now() / 1000);

function compareLocks(a: Lock, b: Lock): number {
  if (a.assetType !== b.assetType) {
    return a.assetType < b.assetType ? -1 : 1;
  }
  return a.unitId - b.unitId;
}

/** Listener failures kept when no handler is configured */
const MAX_LISTENER_FAILURES = 100;

// =============================================================================
// Timevault
// =============================================================================

export class Timevault {
  readonly custodyAccount: AccountId;
  readonly feeRecipient: AccountId;
  private readonly store: LockStore;
  private readonly admin: AdminGate;
  private readonly associations: AssociationRegistry;
  private readonly eligibility: EligibilityGuard;
  private readonly lifecycle: LockLifecycle;
  private readonly guard: ReentrancyGuard;
  private readonly clock: Clock;
  private readonly listeners: Set<CustodyEventListener> = new Set();
  private readonly onListenerError: ListenerErrorHandler;
  private readonly failures: string[] = [];

  constructor(
    config: TimevaultConfig,
    ports: TimevaultPorts,
    options?: TimevaultOptions,
  ) {
    this.custodyAccount = toAccountId(config.custodyAccount, "custodyAccount");
    this.feeRecipient = toAccountId(config.feeRecipient, "feeRecipient");
    this.clock = options?.clock ?? systemClock;
    this.onListenerError =
      options?.onListenerError ??
      ((error, event) => {
        this.failures.push(
          `${event.type}: ${error instanceof Error ? error.message : String(error)}`,
        );
        this.failures.splice(0, this.failures.length - MAX_LISTENER_FAILURES);
      });
    this.store = new InMemoryLockStore();
    this.associations = new AssociationRegistry();
    this.eligibility = new EligibilityGuard(ports.assetInfo);
    this.guard = new ReentrancyGuard();
    this.admin = new AdminGate({
      administrator: toAccountId(config.administrator, "administrator"),
      paused: false,
      fees: config.fees ?? NO_FEES,
      feeExempt: (config.feeExempt ?? []).map((a) => toAccountId(a, "feeExempt")),
    });
    this.lifecycle = new LockLifecycle({
      store: this.store,
      eligibility: this.eligibility,
      admin: this.admin,
      associations: this.associations,
      transfer: ports.transfer,
      fees: ports.fees,
      custodyAccount: this.custodyAccount,
      feeRecipient: this.feeRecipient,
      clock: this.clock,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Events
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register a listener. Returns a function that removes it.
   */
  onEvent(listener: CustodyEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Most recent listener failures, oldest first, when no handler is set */
  listenerFailures(): readonly string[] {
    return [...this.failures];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Custody
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Associate the custody account with an asset type so its units can
   * be received. A no-op when already associated.
   */
  associateAsset(assetType: string, caller: string): AssociateResult {
    return this.mutate<AssociateResult>("associateAsset", () => {
      this.admin.assertNotPaused();
      const id = toAssetTypeId(assetType);
      const actor = toAccountId(caller, "caller");
      this.eligibility.assertLockable(id);

      if (this.associations.has(id)) {
        return { value: { assetType: id, associated: false }, events: [] };
      }
      const event = this.lifecycle.associate(id, actor);
      return { value: { assetType: id, associated: true }, events: [event] };
    });
  }

  createLock(request: CreateLockRequest, caller: string): CreateLockResult {
    return this.mutate("createLock", () => this.lifecycle.create(request, caller));
  }

  extendLockDuration(request: ExtendLockRequest, caller: string): ExtendLockResult {
    return this.mutate("extendLockDuration", () =>
      this.lifecycle.extend(request, caller),
    );
  }

  withdrawUnlockedNFT(ref: LockRef, caller: string): WithdrawResult {
    return this.mutate("withdrawUnlockedNFT", () =>
      this.lifecycle.withdraw(ref, caller),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getLockedAsset(assetType: string, unitId: number): Lock | undefined {
    return this.store.get(toLockKey(assetType, unitId));
  }

  /**
   * Locks matching every given filter, ordered by asset type then unit id.
   */
  listLocks(filter: LockFilter = {}): readonly Lock[] {
    return this.store
      .list()
      .filter(
        (lock) =>
          (filter.assetType === undefined || lock.assetType === filter.assetType) &&
          (filter.creator === undefined || lock.creator === filter.creator) &&
          (filter.beneficiary === undefined || lock.beneficiary === filter.beneficiary) &&
          (filter.unlockedAt === undefined || releaseTimeOf(lock) <= filter.unlockedAt),
      )
      .sort(compareLocks);
  }

  isAssociated(assetType: string): boolean {
    return this.associations.has(toAssetTypeId(assetType));
  }

  getConfig(): CustodyConfigView {
    const state = this.admin.state();
    return {
      administrator: state.administrator,
      custodyAccount: this.custodyAccount,
      feeRecipient: this.feeRecipient,
      paused: state.paused,
      fees: state.fees,
      feeExempt: state.feeExempt,
      feeCeiling: FEE_CEILING,
      minLockDurationSeconds: MIN_LOCK_DURATION_SECONDS,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  pause(caller: string): void {
    this.mutate("pause", () => {
      const actor = toAccountId(caller, "caller");
      this.admin.pause(actor);
      return {
        value: undefined,
        events: [{ type: "admin.custody.paused", actor, at: this.clock() }],
      };
    });
  }

  unpause(caller: string): void {
    this.mutate("unpause", () => {
      const actor = toAccountId(caller, "caller");
      this.admin.unpause(actor);
      return {
        value: undefined,
        events: [{ type: "admin.custody.unpaused", actor, at: this.clock() }],
      };
    });
  }

  setFees(caller: string, fees: FeeConfig): void {
    this.mutate("setFees", () => {
      const actor = toAccountId(caller, "caller");
      this.admin.setFees(actor, fees);
      return {
        value: undefined,
        events: [
          {
            type: "admin.fees.updated",
            actor,
            at: this.clock(),
            creationFee: fees.creationFee,
            extensionFee: fees.extensionFee,
          },
        ],
      };
    });
  }

  /**
   * Returns false when the account already had the requested exemption.
   */
  setFeeExemption(caller: string, account: string, exempt: boolean): boolean {
    return this.mutate("setFeeExemption", () => {
      const actor = toAccountId(caller, "caller");
      const target = toAccountId(account);
      const changed = this.admin.setFeeExemption(actor, target, exempt);
      const events: CustodyEvent[] = changed
        ? [
            {
              type: "admin.fee-exemption.updated",
              actor,
              at: this.clock(),
              account: target,
              exempt,
            },
          ]
        : [];
      return { value: changed, events };
    });
  }

  transferAdministration(caller: string, next: string): void {
    this.mutate("transferAdministration", () => {
      const actor = toAccountId(caller, "caller");
      const nextAdmin = toAccountId(next, "next");
      const previous = this.admin.transferAdministration(actor, nextAdmin);
      return {
        value: undefined,
        events: [
          {
            type: "admin.administrator.transferred",
            actor,
            at: this.clock(),
            previous,
            next: nextAdmin,
          },
        ],
      };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (persistence)
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): TimevaultSnapshot {
    const state = this.admin.state();
    return {
      version: 1,
      locks: this.listLocks(),
      associatedAssetTypes: this.associations.list(),
      admin: {
        administrator: state.administrator,
        paused: state.paused,
        fees: {
          creationFee: state.fees.creationFee.toString(),
          extensionFee: state.fees.extensionFee.toString(),
        },
        feeExempt: state.feeExempt,
      },
      savedAt: new Date().toISOString(),
    };
  }

  /**
   * Rebuild a coordinator from a snapshot. Every record is validated.
   *
   * @throws CustodyError INVALID_INPUT when the snapshot is malformed
   */
  static restore(
    snapshot: unknown,
    config: RestoreConfig,
    ports: TimevaultPorts,
    options?: TimevaultOptions,
  ): Timevault {
    const parsed = parseTimevaultSnapshot(snapshot);
    const { admin } = parsed;

    const vault = new Timevault(
      {
        ...config,
        administrator: admin.administrator,
        fees: {
          creationFee: BigInt(admin.fees.creationFee),
          extensionFee: BigInt(admin.fees.extensionFee),
        },
        feeExempt: admin.feeExempt,
      },
      ports,
      options,
    );

    for (const assetType of parsed.associatedAssetTypes) {
      vault.associations.add(toAssetTypeId(assetType));
    }
    for (const lock of parsed.locks) {
      vault.store.put(lock);
    }
    if (admin.paused) {
      vault.admin.pause(vault.admin.state().administrator);
    }
    return vault;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private mutate<T>(operation: string, fn: () => Outcome<T>): T {
    const outcome = this.guard.run(operation, fn);
    for (const event of outcome.events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.onListenerError(err, event);
        }
      }
    }
    return outcome.value;
  }
}

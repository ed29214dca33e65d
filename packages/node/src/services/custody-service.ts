/**
 * CustodyService — Composition root for the custody node.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service owns the Timevault, its in-process
 * ports, the event store and the snapshot store:
 *
 * - Every custody event becomes a DomainEvent in the event store
 * - After each successful mutation the custody state is snapshotted
 *   at the event store's global position
 * - On construction the latest snapshot (if any) is verified and
 *   restored
 * - An event the store refuses is logged and counted; the mutation
 *   that produced it stands and is still snapshotted
 */

import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { Logger } from "pino";
import {
  CustodyError,
  InMemoryAssetRegistry,
  InMemoryFeeLedger,
  Timevault,
  payloadOf,
  sourceOf,
  streamIdOf,
  toAccountId,
  toAssetTypeId,
  toUnitId,
} from "@timevault/custody";
import type {
  AssetTypeDefinition,
  AssociateResult,
  Clock,
  CreateLockRequest,
  CreateLockResult,
  CustodyConfigView,
  CustodyEvent,
  ExtendLockRequest,
  ExtendLockResult,
  FeeConfig,
  LockFilter,
  LockRef,
  PortResult,
  TimevaultOptions,
  TimevaultPorts,
  WithdrawResult,
} from "@timevault/custody";
import {
  FileSnapshotStore,
  InMemoryEventStore,
  InMemorySnapshotStore,
  JsonlEventStore,
  verifySnapshotIntegrity,
} from "@timevault/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  SnapshotStore,
  StoredEvent,
} from "@timevault/event-store";
import { releaseTimeOf } from "@timevault/types";
import type { DomainEvent, Lock } from "@timevault/types";

// =============================================================================
// Configuration
// =============================================================================

/** Snapshot stream holding the custody state */
export const CUSTODY_SNAPSHOT_STREAM = "custody";

export interface CustodyServiceConfig {
  readonly administrator: string;
  readonly custodyAccount: string;
  readonly feeRecipient: string;
  readonly fees?: FeeConfig | undefined;
  readonly feeExempt?: readonly string[] | undefined;

  /** JSONL events and file snapshots live here; in-memory when unset */
  readonly dataDir?: string | undefined;
}

export interface CustodyServiceOptions {
  readonly logger?: Logger | undefined;
  readonly clock?: Clock | undefined;
}

/**
 * Who is calling, and the request the resulting events belong to.
 */
export interface CallContext {
  readonly caller: string;
  readonly correlationId: string;
}

export interface LockQuery extends Omit<LockFilter, "unlockedAt"> {
  /** true: only withdrawable locks; false: only still-locked ones */
  readonly unlocked?: boolean | undefined;
}

const systemClock: Clock = () => Math.floor(Date.now() / 1000);

// =============================================================================
// Service
// =============================================================================

export class CustodyService {
  readonly vault: Timevault;
  readonly assets: InMemoryAssetRegistry;
  readonly feeLedger: InMemoryFeeLedger;
  readonly eventStore: EventStore;
  readonly snapshotStore: SnapshotStore;

  private readonly _logger: Logger | undefined;
  private readonly _clock: Clock;
  private _context: CallContext | undefined;
  private _unrecordedEvents = 0;

  constructor(config: CustodyServiceConfig, options?: CustodyServiceOptions) {
    this._logger = options?.logger;
    this._clock = options?.clock ?? systemClock;
    this.assets = new InMemoryAssetRegistry();
    this.feeLedger = new InMemoryFeeLedger();

    if (config.dataDir !== undefined) {
      this.eventStore = new JsonlEventStore({
        filePath: join(config.dataDir, "events.jsonl"),
      });
      this.snapshotStore = new FileSnapshotStore(
        join(config.dataDir, "snapshots"),
        { retain: 5 },
      );
    } else {
      this.eventStore = new InMemoryEventStore();
      this.snapshotStore = new InMemorySnapshotStore();
    }

    const ports: TimevaultPorts = {
      transfer: this.assets,
      assetInfo: this.assets,
      fees: this.feeLedger,
    };
    this.vault = this.openVault(config, ports);
    this.vault.onEvent((event) => {
      this.record(event);
    });
  }

  // ─── Custody ───────────────────────────────────────────────────────

  associateAsset(assetType: string, ctx: CallContext): AssociateResult {
    return this.run("associateAsset", ctx, () =>
      this.vault.associateAsset(assetType, ctx.caller),
    );
  }

  createLock(request: CreateLockRequest, ctx: CallContext): CreateLockResult {
    return this.run("createLock", ctx, () =>
      this.vault.createLock(request, ctx.caller),
    );
  }

  extendLockDuration(
    request: ExtendLockRequest,
    ctx: CallContext,
  ): ExtendLockResult {
    return this.run("extendLockDuration", ctx, () =>
      this.vault.extendLockDuration(request, ctx.caller),
    );
  }

  withdrawUnlockedNFT(ref: LockRef, ctx: CallContext): WithdrawResult {
    return this.run("withdrawUnlockedNFT", ctx, () =>
      this.vault.withdrawUnlockedNFT(ref, ctx.caller),
    );
  }

  getLockedAsset(assetType: string, unitId: number): Lock | undefined {
    return this.vault.getLockedAsset(assetType, unitId);
  }

  listLocks(query: LockQuery = {}): readonly Lock[] {
    const { unlocked, ...filter } = query;
    const now = this._clock();
    if (unlocked === true) {
      return this.vault.listLocks({ ...filter, unlockedAt: now });
    }
    const locks = this.vault.listLocks(filter);
    return unlocked === false
      ? locks.filter((lock) => releaseTimeOf(lock) > now)
      : locks;
  }

  isAssociated(assetType: string): boolean {
    return this.vault.isAssociated(assetType);
  }

  // ─── Administration ────────────────────────────────────────────────

  getConfig(): CustodyConfigView {
    return this.vault.getConfig();
  }

  pause(ctx: CallContext): void {
    this.run("pause", ctx, () => this.vault.pause(ctx.caller));
  }

  unpause(ctx: CallContext): void {
    this.run("unpause", ctx, () => this.vault.unpause(ctx.caller));
  }

  setFees(fees: FeeConfig, ctx: CallContext): void {
    this.run("setFees", ctx, () => this.vault.setFees(ctx.caller, fees));
  }

  setFeeExemption(account: string, exempt: boolean, ctx: CallContext): boolean {
    return this.run("setFeeExemption", ctx, () =>
      this.vault.setFeeExemption(ctx.caller, account, exempt),
    );
  }

  transferAdministration(next: string, ctx: CallContext): void {
    this.run("transferAdministration", ctx, () =>
      this.vault.transferAdministration(ctx.caller, next),
    );
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(
    streamId: string,
    options?: ReadOptions,
  ): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  // ─── Sandbox (in-process ports) ────────────────────────────────────

  registerAssetType(assetType: string, definition: AssetTypeDefinition): void {
    this.assets.registerAssetType(toAssetTypeId(assetType), definition);
  }

  mintUnit(assetType: string, unitId: number, owner: string): PortResult {
    return this.assets.mint(
      toAssetTypeId(assetType),
      toUnitId(unitId),
      toAccountId(owner, "owner"),
    );
  }

  associateAccount(account: string, assetType: string): PortResult {
    return this.assets.associate(
      toAccountId(account),
      toAssetTypeId(assetType),
    );
  }

  ownerOf(assetType: string, unitId: number): string | undefined {
    return this.assets.ownerOf(toAssetTypeId(assetType), toUnitId(unitId));
  }

  credit(account: string, amount: bigint): bigint {
    const id = toAccountId(account);
    if (amount <= 0n) {
      throw new CustodyError("INVALID_INPUT", `amount must be positive, got ${amount}`);
    }
    this.feeLedger.credit(id, amount);
    return this.feeLedger.balanceOf(id);
  }

  balanceOf(account: string): bigint {
    return this.feeLedger.balanceOf(toAccountId(account));
  }

  // ─── Health ────────────────────────────────────────────────────────

  checkEventStore(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  /** Custody events the event store failed to append since startup */
  unrecordedEvents(): number {
    return this._unrecordedEvents;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private openVault(
    config: CustodyServiceConfig,
    ports: TimevaultPorts,
  ): Timevault {
    const options: TimevaultOptions = {
      clock: this._clock,
      onListenerError: (error, event) => {
        this.reportUnrecorded(error, event);
      },
    };
    const stored = this.snapshotStore.load(CUSTODY_SNAPSHOT_STREAM);

    if (stored === undefined) {
      return new Timevault(
        {
          administrator: config.administrator,
          custodyAccount: config.custodyAccount,
          feeRecipient: config.feeRecipient,
          fees: config.fees,
          feeExempt: config.feeExempt,
        },
        ports,
        options,
      );
    }

    if (!verifySnapshotIntegrity(stored)) {
      throw new Error(
        `Custody snapshot at position ${stored.version} failed its integrity check`,
      );
    }
    if (stored.version !== this.eventStore.globalPosition()) {
      this._logger?.warn(
        {
          snapshotPosition: stored.version,
          eventStorePosition: this.eventStore.globalPosition(),
        },
        "Custody snapshot and event log positions differ",
      );
    }

    const vault = Timevault.restore(
      stored.state,
      {
        custodyAccount: config.custodyAccount,
        feeRecipient: config.feeRecipient,
      },
      ports,
      options,
    );
    this._logger?.info(
      { position: stored.version, locks: vault.listLocks().length },
      "Custody state restored from snapshot",
    );
    return vault;
  }

  /**
   * Run one vault mutation with `ctx` attached to the events it emits,
   * then snapshot the resulting state.
   */
  private run<T>(operation: string, ctx: CallContext, fn: () => T): T {
    this._context = ctx;
    try {
      const result = fn();
      this.snapshotStore.save({
        streamId: CUSTODY_SNAPSHOT_STREAM,
        version: this.eventStore.globalPosition(),
        state: this.vault.snapshot(),
      });
      return result;
    } catch (err) {
      if (
        err instanceof CustodyError &&
        err.details?.compensationFailures !== undefined
      ) {
        this._logger?.error(
          {
            operation,
            code: err.code,
            caller: ctx.caller,
            correlationId: ctx.correlationId,
            compensationFailures: err.details.compensationFailures,
          },
          "Compensation incomplete",
        );
      }
      throw err;
    } finally {
      this._context = undefined;
    }
  }

  private reportUnrecorded(error: unknown, event: CustodyEvent): void {
    this._unrecordedEvents += 1;
    this._logger?.error(
      {
        err: error,
        type: event.type,
        streamId: streamIdOf(event),
        actor: event.actor,
        correlationId: this._context?.correlationId,
      },
      "Custody event not recorded",
    );
  }

  private record(event: CustodyEvent): void {
    const streamId = streamIdOf(event);
    const domainEvent: DomainEvent = {
      type: event.type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date(event.at * 1000).toISOString(),
        actor: event.actor,
        correlationId: this._context?.correlationId ?? randomUUID(),
        source: sourceOf(event),
      },
      payload: payloadOf(event),
    };

    const result = this.eventStore.append(streamId, [domainEvent]);
    this._logger?.info(
      {
        type: event.type,
        streamId,
        version: result.toVersion,
        actor: event.actor,
        correlationId: domainEvent.metadata.correlationId,
      },
      "Custody event recorded",
    );
  }
}

/**
 * InMemoryAssetRegistry — in-process asset ledger.
 *
 * Implements both the transfer and the metadata ports. Tracks who owns
 * each unit, which accounts are associated with which asset types, and
 * which accounts are frozen.
 *
 * Rules:
 * - A unit can only move from its current owner
 * - The receiving account must be associated with the asset type
 * - Nothing moves to or from a frozen account
 */

import type { AccountId, AssetTypeId, UnitId } from "@timevault/types";
import type {
  AssetDescription,
  AssetFeeSchedule,
  AssetInfoPort,
  AssetKind,
  AssetTransferPort,
  PortResult,
} from "../types.js";

export interface AssetTypeDefinition {
  /** Default: "non-fungible" */
  readonly kind?: AssetKind | undefined;

  /** Default: no custom fees */
  readonly feeSchedule?: Partial<AssetFeeSchedule> | undefined;
}

const OK: PortResult = { ok: true };

function refuse(reason: string): PortResult {
  return { ok: false, reason };
}

export class InMemoryAssetRegistry implements AssetTransferPort, AssetInfoPort {
  private readonly assetTypes: Map<string, AssetDescription> = new Map();
  private readonly owners: Map<string, AccountId> = new Map();
  private readonly associations: Map<string, Set<string>> = new Map();
  private readonly frozen: Set<string> = new Set();

  // ───────────────────────────────────────────────────────────────────────
  // Setup
  // ───────────────────────────────────────────────────────────────────────

  registerAssetType(assetType: AssetTypeId, definition: AssetTypeDefinition = {}): void {
    this.assetTypes.set(assetType, {
      kind: definition.kind ?? "non-fungible",
      feeSchedule: {
        fixed: definition.feeSchedule?.fixed ?? 0,
        fractional: definition.feeSchedule?.fractional ?? 0,
        royalty: definition.feeSchedule?.royalty ?? 0,
      },
    });
  }

  /**
   * Create a unit owned by `owner`, associating the owner if needed.
   */
  mint(assetType: AssetTypeId, unitId: UnitId, owner: AccountId): PortResult {
    if (!this.assetTypes.has(assetType)) {
      return refuse(`unknown asset type '${assetType}'`);
    }
    const key = unitKey(assetType, unitId);
    if (this.owners.has(key)) {
      return refuse(`unit ${unitId} of '${assetType}' already exists`);
    }
    this.associationsOf(owner).add(assetType);
    this.owners.set(key, owner);
    return OK;
  }

  freeze(account: AccountId): void {
    this.frozen.add(account);
  }

  unfreeze(account: AccountId): void {
    this.frozen.delete(account);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  ownerOf(assetType: AssetTypeId, unitId: UnitId): AccountId | undefined {
    return this.owners.get(unitKey(assetType, unitId));
  }

  isAssociated(account: AccountId, assetType: AssetTypeId): boolean {
    return this.associations.get(account)?.has(assetType) ?? false;
  }

  describe(assetType: AssetTypeId): AssetDescription | undefined {
    return this.assetTypes.get(assetType);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Port operations
  // ───────────────────────────────────────────────────────────────────────

  associate(account: AccountId, assetType: AssetTypeId): PortResult {
    if (!this.assetTypes.has(assetType)) {
      return refuse(`unknown asset type '${assetType}'`);
    }
    this.associationsOf(account).add(assetType);
    return OK;
  }

  transfer(
    assetType: AssetTypeId,
    unitId: UnitId,
    from: AccountId,
    to: AccountId,
  ): PortResult {
    const key = unitKey(assetType, unitId);
    const owner = this.owners.get(key);
    if (owner === undefined) {
      return refuse(`unit ${unitId} of '${assetType}' does not exist`);
    }
    if (owner !== from) {
      return refuse(`'${from}' does not own unit ${unitId} of '${assetType}'`);
    }
    if (this.frozen.has(from)) {
      return refuse(`account '${from}' is frozen`);
    }
    if (this.frozen.has(to)) {
      return refuse(`account '${to}' is frozen`);
    }
    if (!this.isAssociated(to, assetType)) {
      return refuse(`account '${to}' is not associated with '${assetType}'`);
    }
    this.owners.set(key, to);
    return OK;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private associationsOf(account: AccountId): Set<string> {
    let set = this.associations.get(account);
    if (set === undefined) {
      set = new Set();
      this.associations.set(account, set);
    }
    return set;
  }
}

function unitKey(assetType: AssetTypeId, unitId: UnitId): string {
  return `${assetType}/${unitId}`;
}

/**
 * Asset types the custody account has been associated with.
 */

import type { AssetTypeId } from "@timevault/types";

export class AssociationRegistry {
  private readonly assetTypes: Set<AssetTypeId> = new Set();

  has(assetType: AssetTypeId): boolean {
    return this.assetTypes.has(assetType);
  }

  add(assetType: AssetTypeId): void {
    this.assetTypes.add(assetType);
  }

  delete(assetType: AssetTypeId): void {
    this.assetTypes.delete(assetType);
  }

  list(): readonly AssetTypeId[] {
    return [...this.assetTypes].sort();
  }
}

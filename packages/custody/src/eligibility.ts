/**
 * EligibilityGuard — decides whether an asset type can be held in custody.
 *
 * Lockable asset types are non-fungible and carry no custom fees of any
 * kind. Read-only.
 */

import type { AssetTypeId } from "@timevault/types";
import { CustodyError } from "./errors.js";
import type { AssetInfoPort } from "./types.js";

export type EligibilityVerdict =
  | { readonly eligible: true }
  | { readonly eligible: false; readonly reason: string };

export class EligibilityGuard {
  private readonly assetInfo: AssetInfoPort;

  constructor(assetInfo: AssetInfoPort) {
    this.assetInfo = assetInfo;
  }

  check(assetType: AssetTypeId): EligibilityVerdict {
    const description = this.assetInfo.describe(assetType);
    if (description === undefined) {
      return { eligible: false, reason: "unknown asset type" };
    }
    if (description.kind !== "non-fungible") {
      return { eligible: false, reason: `asset kind is ${description.kind}` };
    }

    const { fixed, fractional, royalty } = description.feeSchedule;
    if (fixed > 0 || fractional > 0 || royalty > 0) {
      return { eligible: false, reason: "asset type carries custom fees" };
    }
    return { eligible: true };
  }

  /**
   * @throws CustodyError INELIGIBLE_ASSET
   */
  assertLockable(assetType: AssetTypeId): void {
    const verdict = this.check(assetType);
    if (!verdict.eligible) {
      throw new CustodyError(
        "INELIGIBLE_ASSET",
        `Asset type '${assetType}' cannot be locked: ${verdict.reason}`,
        { reason: verdict.reason },
      );
    }
  }
}

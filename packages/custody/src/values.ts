/**
 * Input parsing for custody operations.
 *
 * Raw caller input becomes branded identifiers here or fails with
 * INVALID_INPUT.
 */

import {
  isAccountId,
  isAssetTypeId,
  isUnitId,
  MAX_IDENTIFIER_LENGTH,
} from "@timevault/types";
import type { AccountId, AssetTypeId, LockKey, UnitId } from "@timevault/types";
import { CustodyError } from "./errors.js";

/**
 * Locks must last strictly longer than this many seconds.
 */
export const MIN_LOCK_DURATION_SECONDS = 60;

function invalid(field: string, rule: string): CustodyError {
  return new CustodyError("INVALID_INPUT", `${field} ${rule}`);
}

const IDENTIFIER_RULE = `must be a non-empty identifier of at most ${MAX_IDENTIFIER_LENGTH} characters without whitespace or "/"`;

export function toAccountId(value: unknown, field = "account"): AccountId {
  if (!isAccountId(value)) {
    throw invalid(field, IDENTIFIER_RULE);
  }
  return value;
}

export function toAssetTypeId(value: unknown, field = "assetType"): AssetTypeId {
  if (!isAssetTypeId(value)) {
    throw invalid(field, IDENTIFIER_RULE);
  }
  return value;
}

export function toUnitId(value: unknown, field = "unitId"): UnitId {
  if (!isUnitId(value)) {
    throw invalid(field, "must be a positive integer");
  }
  return value;
}

export function toLockKey(assetType: unknown, unitId: unknown): LockKey {
  return { assetType: toAssetTypeId(assetType), unitId: toUnitId(unitId) };
}

/**
 * A whole number of seconds strictly greater than `exclusiveMin`.
 */
export function toDuration(
  value: unknown,
  field: string,
  exclusiveMin = 0,
): number {
  if (
    typeof value !== "number" ||
    !Number.isSafeInteger(value) ||
    value <= exclusiveMin
  ) {
    throw invalid(field, `must be an integer greater than ${exclusiveMin}`);
  }
  return value;
}

/**
 * Reject a release time outside the safe integer range.
 */
export function assertReleaseTime(start: number, duration: number): void {
  if (!Number.isSafeInteger(start + duration)) {
    throw invalid("duration", "pushes the release time out of range");
  }
}

/**
 * Snapshot validation.
 *
 * Snapshots come back from disk as untyped JSON; every field is checked
 * before a coordinator is rebuilt from one.
 */

import { isAccountId, isAssetTypeId, isLock } from "@timevault/types";
import type { Lock } from "@timevault/types";
import { CustodyError } from "./errors.js";
import type { TimevaultSnapshot } from "./types.js";

const FEE_PATTERN = /^(0|[1-9]\d*)$/;

function invalid(message: string): CustodyError {
  return new CustodyError("INVALID_INPUT", `Invalid snapshot: ${message}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function stringList(value: unknown, field: string, check: (v: unknown) => boolean): string[] {
  if (!Array.isArray(value)) {
    throw invalid(`${field} must be an array`);
  }
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== "string" || !check(item)) {
      throw invalid(`${field} contains an invalid entry`);
    }
    result.push(item);
  }
  return result;
}

/**
 * @throws CustodyError INVALID_INPUT describing the first problem found
 */
export function parseTimevaultSnapshot(value: unknown): TimevaultSnapshot {
  if (!isRecord(value)) {
    throw invalid("not an object");
  }
  if (value.version !== 1) {
    throw invalid(`unsupported version ${String(value.version)}`);
  }

  if (!Array.isArray(value.locks)) {
    throw invalid("locks must be an array");
  }
  const locks: Lock[] = [];
  const seen = new Set<string>();
  for (const lock of value.locks) {
    if (!isLock(lock)) {
      throw invalid("locks contains an invalid record");
    }
    const key = `${lock.assetType}/${lock.unitId}`;
    if (seen.has(key)) {
      throw invalid(`duplicate lock for unit ${lock.unitId} of '${lock.assetType}'`);
    }
    seen.add(key);
    locks.push(lock);
  }

  const associatedAssetTypes = stringList(
    value.associatedAssetTypes,
    "associatedAssetTypes",
    isAssetTypeId,
  );

  const admin = value.admin;
  if (!isRecord(admin)) {
    throw invalid("admin must be an object");
  }
  if (!isAccountId(admin.administrator)) {
    throw invalid("admin.administrator is not a valid account");
  }
  if (typeof admin.paused !== "boolean") {
    throw invalid("admin.paused must be a boolean");
  }
  const fees = admin.fees;
  if (
    !isRecord(fees) ||
    typeof fees.creationFee !== "string" ||
    typeof fees.extensionFee !== "string" ||
    !FEE_PATTERN.test(fees.creationFee) ||
    !FEE_PATTERN.test(fees.extensionFee)
  ) {
    throw invalid("admin.fees must hold decimal fee amounts");
  }
  const feeExempt = stringList(admin.feeExempt, "admin.feeExempt", isAccountId);

  if (typeof value.savedAt !== "string") {
    throw invalid("savedAt must be a string");
  }

  return {
    version: 1,
    locks,
    associatedAssetTypes,
    admin: {
      administrator: admin.administrator,
      paused: admin.paused,
      fees: { creationFee: fees.creationFee, extensionFee: fees.extensionFee },
      feeExempt,
    },
    savedAt: value.savedAt,
  };
}

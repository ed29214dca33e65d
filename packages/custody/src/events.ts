/**
 * Custody event routing and serialization.
 *
 * Stream ids:
 * - lock:<assetType>:<unitId> for lock events
 * - asset:<assetType> for associations
 * - admin for administrator actions
 *
 * Fee amounts are written as decimal strings.
 */

import type { EventSource } from "@timevault/types";
import type { CustodyEvent } from "./types.js";

export const ADMIN_STREAM = "admin";

export function lockStreamId(assetType: string, unitId: number): string {
  return `lock:${assetType}:${unitId}`;
}

export function assetStreamId(assetType: string): string {
  return `asset:${assetType}`;
}

export function streamIdOf(event: CustodyEvent): string {
  switch (event.type) {
    case "custody.asset.associated":
      return assetStreamId(event.assetType);
    case "custody.lock.created":
    case "custody.lock.extended":
    case "custody.lock.withdrawn":
      return lockStreamId(event.assetType, event.unitId);
    case "admin.custody.paused":
    case "admin.custody.unpaused":
    case "admin.fees.updated":
    case "admin.fee-exemption.updated":
    case "admin.administrator.transferred":
      return ADMIN_STREAM;
  }
}

export function sourceOf(event: CustodyEvent): EventSource {
  return event.type.startsWith("admin.") ? "admin" : "custody";
}

/**
 * JSON-safe payload of an event (without the type, actor and time,
 * which travel in the envelope).
 */
export function payloadOf(event: CustodyEvent): Record<string, unknown> {
  switch (event.type) {
    case "custody.asset.associated":
      return { assetType: event.assetType };
    case "custody.lock.created":
      return {
        assetType: event.assetType,
        unitId: event.unitId,
        creator: event.creator,
        beneficiary: event.beneficiary,
        duration: event.duration,
        start: event.start,
        feeCharged: event.feeCharged.toString(),
      };
    case "custody.lock.extended":
      return {
        assetType: event.assetType,
        unitId: event.unitId,
        extraDuration: event.extraDuration,
        duration: event.duration,
        feeCharged: event.feeCharged.toString(),
      };
    case "custody.lock.withdrawn":
      return {
        assetType: event.assetType,
        unitId: event.unitId,
        actor: event.actor,
        beneficiary: event.beneficiary,
      };
    case "admin.custody.paused":
    case "admin.custody.unpaused":
      return { actor: event.actor };
    case "admin.fees.updated":
      return {
        creationFee: event.creationFee.toString(),
        extensionFee: event.extensionFee.toString(),
      };
    case "admin.fee-exemption.updated":
      return { account: event.account, exempt: event.exempt };
    case "admin.administrator.transferred":
      return { previous: event.previous, next: event.next };
  }
}

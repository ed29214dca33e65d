/**
 * Runtime Type Guards
 *
 * Narrowing functions for Timevault domain types.
 * Used at system boundaries (API inputs, restored snapshots,
 * events read back from disk).
 */

import type { Lock } from "./lock.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import { isAccountId, isAssetTypeId, isUnitId } from "./values.js";

// =============================================================================
// Lock guards
// =============================================================================

function isNonNegativeSafeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/**
 * A structurally valid, live lock: duration is positive and the
 * release time stays within the safe integer range.
 */
export function isLock(value: unknown): value is Lock {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAssetTypeId(v.assetType) &&
    isUnitId(v.unitId) &&
    isAccountId(v.creator) &&
    isAccountId(v.beneficiary) &&
    isNonNegativeSafeInteger(v.start) &&
    isNonNegativeSafeInteger(v.duration) &&
    v.duration > 0 &&
    Number.isSafeInteger(v.start + v.duration)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["custody", "admin"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    (v.causationId === undefined || typeof v.causationId === "string") &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

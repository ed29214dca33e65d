/**
 * @timevault/event-store — Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[0].hash = sha256(canonicalize(event[0]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";

/**
 * The `previousHash` of the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

function canonicalEventContent(event: UnhashedStoredEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Compute the hex SHA-256 hash of an event given its predecessor's hash.
 */
export function computeEventHash(
  event: UnhashedStoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Attach chain links to an event.
 */
export function linkEvent(
  event: UnhashedStoredEvent,
  previousHash: string,
): StoredEvent {
  return { ...event, hash: computeEventHash(event, previousHash), previousHash };
}

/**
 * Verify the hash chain of a sequence of events in global position order.
 *
 * Verification continues past a broken link so every bad position is
 * reported; `lastVerifiedPosition` stops at the first failure.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let expectedPrevious = GENESIS_HASH;

  for (const event of events) {
    const position = event.globalPosition;
    let linkValid = true;

    if (event.previousHash !== expectedPrevious) {
      linkValid = false;
      errors.push({
        position,
        reason: `previousHash mismatch at position ${position}: expected "${expectedPrevious}", got "${event.previousHash}"`,
      });
    }

    const recomputed = computeEventHash(event, event.previousHash);
    if (event.hash !== recomputed) {
      linkValid = false;
      errors.push({
        position,
        reason: `Hash mismatch at position ${position}: expected "${recomputed}", got "${event.hash}"`,
      });
    }

    if (linkValid && errors.length === 0) {
      lastVerifiedPosition = position;
    }
    expectedPrevious = event.hash;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}

/**
 * @timevault/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by a SHA-256 hash chain
 * - Concurrency control via expected version (optimistic locking)
 */

import type { DomainEvent, EventMetadata } from "@timevault/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: position within the stream (1-based)
 * - globalPosition: position across all streams (1-based)
 * - hash / previousHash: tamper-evident chain links
 */
export interface StoredEvent {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<Record<string, unknown>>;
  }>;

  readonly streamId: string;

  readonly version: number;

  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 over the canonical event content + previousHash */
  readonly hash: string;

  /** Hash of the preceding event in global order, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * A stored event before its chain links are computed.
 */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append Result
// =============================================================================

export interface AppendResult {
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  readonly count: number;
}

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Default: "forward" */
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  readonly maxCount?: number;

  readonly direction?: ReadDirection;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose link verified */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if the stream id is empty or no events are
   *   given
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /**
   * Read events from a single stream (empty if the stream doesn't exist).
   */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /**
   * Read events across all streams in global order.
   */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  streamExists(streamId: string): boolean;

  /** Current version of a stream, or 0 if it doesn't exist */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty */
  globalPosition(): number;

  /** Recompute and check the hash chain over every event */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}

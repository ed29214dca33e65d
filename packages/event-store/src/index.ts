/**
 * @timevault/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - SHA-256 hash chain over every appended event
 * - SnapshotStore for checkpoint-based recovery
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export {
  computeEventHash,
  linkEvent,
  verifyHashChain,
  GENESIS_HASH,
} from "./hash-chain.js";

// Implementations
export { BaseEventStore } from "./base-store.js";
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Snapshot store
export type {
  StoredSnapshot,
  SaveSnapshotOptions,
  SnapshotStore,
  FileSnapshotStoreOptions,
} from "./snapshot-store.js";
export {
  InMemorySnapshotStore,
  FileSnapshotStore,
  computeSnapshotHash,
  verifySnapshotIntegrity,
} from "./snapshot-store.js";

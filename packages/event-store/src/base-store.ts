/**
 * @timevault/event-store — Shared EventStore machinery.
 *
 * Holds the in-memory indexes (per stream + global log), the hash chain
 * head and stream validation. Backends only
 * decide what "durable" means by implementing `persist`.
 *
 * Append is all-or-nothing: indexes and the chain head are updated only
 * after `persist` returns.
 */

import type { DomainEvent } from "@timevault/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, linkEvent, verifyHashChain } from "./hash-chain.js";

export abstract class BaseEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private _nextGlobalPosition = 1;
  private _lastHash: string = GENESIS_HASH;

  /**
   * Make a batch of events durable. Throwing aborts the append.
   */
  protected abstract persist(events: readonly StoredEvent[]): void;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this.validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const linked = linkEvent(
        {
          event: {
            type: event.type,
            metadata: event.metadata,
            payload: event.payload,
          },
          streamId,
          version: fromVersion + i,
          globalPosition: this._nextGlobalPosition + i,
          appendedAt,
        },
        previousHash,
      );
      previousHash = linked.hash;
      stored.push(linked);
    });

    this.persist(stored);
    this.index(stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this.validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    const result =
      options?.direction === "backward"
        ? stream.filter((e) => e.version <= fromVersion).reverse()
        : stream.filter((e) => e.version >= fromVersion);

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const result =
      options?.direction === "backward"
        ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
        : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(result, options?.maxCount);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Add already-durable events to the indexes (used on append and when
   * a backend reloads its log).
   */
  protected index(events: readonly StoredEvent[]): void {
    for (const event of events) {
      let stream = this._streams.get(event.streamId);
      if (stream === undefined) {
        stream = [];
        this._streams.set(event.streamId, stream);
      }
      stream.push(event);
      this._globalLog.push(event);
      this._nextGlobalPosition = event.globalPosition + 1;
      this._lastHash = event.hash;
    }
  }

  private validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }
}

function limit(
  events: readonly StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0
    ? events.slice(0, maxCount)
    : events;
}

/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: versions, global positions, validation
 * - Read / readAll: direction, bounds, maxCount
 * - Integrity: every append extends the hash chain
 */

import { describe, it, expect } from "vitest";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import { GENESIS_HASH } from "../src/hash-chain.js";
import { makeEvent, makeEvents } from "./support/events.js";

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();

    const result = store.append("lock:art:1", [makeEvent("custody.lock.created")]);

    expect(result).toEqual({
      streamId: "lock:art:1",
      fromVersion: 1,
      toVersion: 1,
      count: 1,
    });
  });

  it("assigns contiguous versions per stream and global positions across streams", () => {
    const store = new InMemoryEventStore();

    store.append("lock:art:1", makeEvents(2));
    store.append("asset:art", [makeEvent("custody.asset.associated")]);
    store.append("lock:art:1", [makeEvent("custody.lock.withdrawn")]);

    expect(store.read("lock:art:1").map((e) => e.version)).toEqual([1, 2, 3]);
    expect(store.read("asset:art").map((e) => e.version)).toEqual([1]);
    expect(store.readAll().map((e) => e.globalPosition)).toEqual([1, 2, 3, 4]);
    expect(store.globalPosition()).toBe(4);
  });

  it("stores the domain event unchanged", () => {
    const store = new InMemoryEventStore();
    const event = makeEvent("custody.lock.extended", { duration: 7200 });

    store.append("lock:art:1", [event]);
    const [stored] = store.read("lock:art:1");

    expect(stored?.event).toEqual(event);
    expect(stored?.streamId).toBe("lock:art:1");
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();

    expect(() => store.append("admin", [])).toThrow(EventStoreError);
    expect(() => store.append("admin", [])).toThrow("Cannot append zero events");
  });

  it("rejects an empty stream id", () => {
    const store = new InMemoryEventStore();

    expect(() => store.append("", [makeEvent("admin.custody.paused")])).toThrow(
      "non-empty string",
    );
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty list for an unknown stream", () => {
    expect(new InMemoryEventStore().read("lock:art:99")).toEqual([]);
  });

  it("reads forward from a version with a limit", () => {
    const store = new InMemoryEventStore();
    store.append("lock:art:1", makeEvents(6));

    const events = store.read("lock:art:1", { fromVersion: 3, maxCount: 2 });

    expect(events.map((e) => e.version)).toEqual([3, 4]);
  });

  it("reads backward from a version", () => {
    const store = new InMemoryEventStore();
    store.append("lock:art:1", makeEvents(5));

    const events = store.read("lock:art:1", { fromVersion: 4, direction: "backward" });

    expect(events.map((e) => e.version)).toEqual([4, 3, 2, 1]);
  });

  it("rejects fromVersion below 1", () => {
    const store = new InMemoryEventStore();

    expect(() => store.read("lock:art:1", { fromVersion: 0 })).toThrow(
      "fromVersion must be >= 1",
    );
  });

  it("readAll honors position, direction and limit", () => {
    const store = new InMemoryEventStore();
    store.append("lock:art:1", makeEvents(3));
    store.append("lock:art:2", makeEvents(3));

    expect(store.readAll({ fromPosition: 5 }).map((e) => e.globalPosition)).toEqual([5, 6]);
    expect(
      store
        .readAll({ fromPosition: 4, direction: "backward", maxCount: 3 })
        .map((e) => e.globalPosition),
    ).toEqual([4, 3, 2]);
  });
});

// =============================================================================
// Query and Integrity
// =============================================================================

describe("query", () => {
  it("reports stream existence and versions", () => {
    const store = new InMemoryEventStore();
    store.append("lock:art:1", makeEvents(2));

    expect(store.streamExists("lock:art:1")).toBe(true);
    expect(store.streamExists("lock:art:2")).toBe(false);
    expect(store.streamVersion("lock:art:1")).toBe(2);
    expect(store.streamVersion("lock:art:2")).toBe(0);
    expect(new InMemoryEventStore().globalPosition()).toBe(0);
  });

  it("links each appended event to its predecessor", () => {
    const store = new InMemoryEventStore();
    store.append("lock:art:1", makeEvents(2));
    store.append("admin", [makeEvent("admin.custody.paused")]);

    const all = store.readAll();
    expect(all[0]?.previousHash).toBe(GENESIS_HASH);
    expect(all[1]?.previousHash).toBe(all[0]?.hash);
    expect(all[2]?.previousHash).toBe(all[1]?.hash);
    expect(store.verifyIntegrity()).toEqual({
      valid: true,
      lastVerifiedPosition: 3,
      errors: [],
    });
  });
});

/**
 * Tests for InMemorySnapshotStore and FileSnapshotStore.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  mkdtempSync,
  readdirSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  computeSnapshotHash,
  FileSnapshotStore,
  InMemorySnapshotStore,
  verifySnapshotIntegrity,
} from "../src/snapshot-store.js";
import type { SnapshotStore } from "../src/snapshot-store.js";

const STATE = {
  version: 1,
  locks: [{ assetType: "art", unitId: 1, duration: 3600 }],
};

let testDir: string;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), "timevault-snapshots-"));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// =============================================================================
// Hashing
// =============================================================================

describe("computeSnapshotHash", () => {
  it("is independent of key order", () => {
    expect(computeSnapshotHash({ a: 1, b: [1, 2] })).toBe(
      computeSnapshotHash({ b: [1, 2], a: 1 }),
    );
  });

  it("verifySnapshotIntegrity detects a changed state", () => {
    const snapshot = new InMemorySnapshotStore().save({
      streamId: "custody",
      version: 1,
      state: STATE,
    });

    expect(verifySnapshotIntegrity(snapshot)).toBe(true);
    expect(verifySnapshotIntegrity({ ...snapshot, state: { version: 2 } })).toBe(false);
    expect(verifySnapshotIntegrity({ ...snapshot, stateHash: "" })).toBe(false);
  });
});

// =============================================================================
// Shared behavior
// =============================================================================

const factories: Array<[string, () => SnapshotStore]> = [
  ["InMemorySnapshotStore", () => new InMemorySnapshotStore()],
  ["FileSnapshotStore", () => new FileSnapshotStore(join(testDir, "snapshots"))],
];

describe.each(factories)("%s", (_name, create) => {
  it("returns undefined when nothing is saved", () => {
    const store = create();
    expect(store.load("custody")).toBeUndefined();
    expect(store.hasSnapshot("custody")).toBe(false);
  });

  it("loads the highest version", () => {
    const store = create();
    store.save({ streamId: "custody", version: 3, state: { n: 3 } });
    store.save({ streamId: "custody", version: 10, state: { n: 10 } });
    store.save({ streamId: "custody", version: 7, state: { n: 7 } });

    const latest = store.load("custody");

    expect(latest?.version).toBe(10);
    expect(latest?.state).toEqual({ n: 10 });
    expect(latest !== undefined && verifySnapshotIntegrity(latest)).toBe(true);
  });

  it("overwrites a snapshot at the same version", () => {
    const store = create();
    store.save({ streamId: "custody", version: 2, state: { n: 1 } });
    store.save({ streamId: "custody", version: 2, state: { n: 2 } });

    expect(store.load("custody")?.state).toEqual({ n: 2 });
  });

  it("deleteAll removes every snapshot of a stream", () => {
    const store = create();
    store.save({ streamId: "custody", version: 1, state: STATE });
    store.save({ streamId: "other", version: 1, state: STATE });

    store.deleteAll("custody");

    expect(store.hasSnapshot("custody")).toBe(false);
    expect(store.hasSnapshot("other")).toBe(true);
  });
});

// =============================================================================
// File-specific behavior
// =============================================================================

describe("FileSnapshotStore", () => {
  it("prunes older snapshots beyond the retain count", () => {
    const baseDir = join(testDir, "snapshots");
    const store = new FileSnapshotStore(baseDir, { retain: 2 });

    for (const version of [1, 2, 3, 4]) {
      store.save({ streamId: "custody", version, state: { version } });
    }

    expect(readdirSync(join(baseDir, "custody")).sort()).toEqual(["3.json", "4.json"]);
  });

  it("survives recreation", () => {
    const baseDir = join(testDir, "snapshots");
    new FileSnapshotStore(baseDir).save({ streamId: "custody", version: 5, state: STATE });

    const loaded = new FileSnapshotStore(baseDir).load("custody");

    expect(loaded?.version).toBe(5);
    expect(loaded?.state).toEqual(STATE);
  });

  it("treats an unreadable latest file as missing", () => {
    const baseDir = join(testDir, "snapshots");
    const store = new FileSnapshotStore(baseDir);
    store.save({ streamId: "custody", version: 1, state: STATE });
    writeFileSync(join(baseDir, "custody", "2.json"), "{not json", "utf-8");

    expect(store.load("custody")).toBeUndefined();
  });
});

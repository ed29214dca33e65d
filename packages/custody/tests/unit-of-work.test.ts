/**
 * Tests for the compensation stack and the lock store.
 */

import { describe, it, expect } from "vitest";
import { CustodyError } from "../src/errors.js";
import { InMemoryLockStore } from "../src/lock-store.js";
import { callPort, UnitOfWork } from "../src/unit-of-work.js";
import { toAccountId } from "../src/values.js";
import { ART, captureError, unit } from "./support/harness.js";

describe("UnitOfWork", () => {
  it("undoes steps newest first", () => {
    const order: string[] = [];
    const work = new UnitOfWork();
    work.onRollback("first", () => {
      order.push("first");
      return { ok: true };
    });
    work.onRollback("second", () => {
      order.push("second");
      return { ok: true };
    });

    expect(work.rollback()).toEqual([]);
    expect(order).toEqual(["second", "first"]);
  });

  it("runs each step once", () => {
    let calls = 0;
    const work = new UnitOfWork();
    work.onRollback("count", () => {
      calls++;
      return { ok: true };
    });

    work.rollback();
    work.rollback();

    expect(calls).toBe(1);
  });

  it("keeps going after a failed step and reports it", () => {
    const work = new UnitOfWork();
    let reached = false;
    work.onRollback("last", () => {
      reached = true;
      return { ok: true };
    });
    work.onRollback("refund", () => ({ ok: false, reason: "ledger offline" }));
    work.onRollback("explode", () => {
      throw new Error("boom");
    });

    expect(work.rollback()).toEqual(["explode: boom", "refund: ledger offline"]);
    expect(reached).toBe(true);
  });

  it("fail rethrows the original error when every undo succeeds", () => {
    const work = new UnitOfWork();
    const original = new CustodyError("TRANSFER_FAILED", "no", { reason: "frozen" });

    expect(captureError(() => work.fail(original))).toBe(original);
  });

  it("callPort converts thrown values into failures", () => {
    expect(
      callPort(() => {
        throw "plain string";
      }),
    ).toEqual({ ok: false, reason: "plain string" });
  });
});

describe("InMemoryLockStore", () => {
  const lock = {
    assetType: ART,
    unitId: unit(1),
    creator: toAccountId("carol"),
    beneficiary: toAccountId("bob"),
    start: 0,
    duration: 100,
  };

  it("stores frozen copies keyed by asset type and unit", () => {
    const store = new InMemoryLockStore();
    store.put(lock);

    const stored = store.get({ assetType: ART, unitId: unit(1) });
    expect(stored).toEqual(lock);
    expect(stored).not.toBe(lock);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(store.get({ assetType: ART, unitId: unit(2) })).toBeUndefined();
  });

  it("treats a zero duration as absent", () => {
    const store = new InMemoryLockStore();
    store.put({ ...lock, duration: 0 });

    expect(store.get(lock)).toBeUndefined();
    expect(store.list()).toEqual([]);
    expect(store.size).toBe(0);
  });

  it("delete returns the removed record", () => {
    const store = new InMemoryLockStore();
    store.put(lock);

    expect(store.delete(lock)).toEqual(lock);
    expect(store.delete(lock)).toBeUndefined();
    expect(store.size).toBe(0);
  });
});

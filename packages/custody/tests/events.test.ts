/**
 * Tests for custody event routing and payloads.
 */

import { describe, it, expect } from "vitest";
import { payloadOf, sourceOf, streamIdOf } from "../src/events.js";
import { ART, CREATOR, CUSTODY, createHarness, TREASURY, unit } from "./support/harness.js";

describe("custody events", () => {
  it("routes lock, asset and admin events to their streams", () => {
    const { vault, events, setTime } = createHarness({ fees: { creationFee: 7n, extensionFee: 2n } });
    vault.createLock({ assetType: "art", unitId: 3, beneficiary: "bob", duration: 3600 }, "carol");
    vault.extendLockDuration({ assetType: "art", unitId: 3, extraDuration: 40 }, "bob");
    setTime(3640);
    vault.withdrawUnlockedNFT({ assetType: "art", unitId: 3 }, "mallory");
    vault.setFees("admin", { creationFee: 1n, extensionFee: 1n });

    expect(events.map((e) => [e.type, streamIdOf(e), sourceOf(e)])).toEqual([
      ["custody.asset.associated", "asset:art", "custody"],
      ["custody.lock.created", "lock:art:3", "custody"],
      ["custody.lock.extended", "lock:art:3", "custody"],
      ["custody.lock.withdrawn", "lock:art:3", "custody"],
      ["admin.fees.updated", "admin", "admin"],
    ]);
  });

  it("serializes fee amounts as decimal strings", () => {
    const { vault, events } = createHarness({ fees: { creationFee: 7n, extensionFee: 2n } });
    vault.createLock({ assetType: "art", unitId: 1, beneficiary: "bob", duration: 3600 }, "carol");
    vault.extendLockDuration({ assetType: "art", unitId: 1, extraDuration: 40 }, "bob");

    expect(events.map(payloadOf).slice(1)).toEqual([
      {
        assetType: "art",
        unitId: 1,
        creator: "carol",
        beneficiary: "bob",
        duration: 3600,
        start: 0,
        feeCharged: "7",
      },
      {
        assetType: "art",
        unitId: 1,
        extraDuration: 40,
        duration: 3640,
        feeCharged: "2",
      },
    ]);
  });

  it("carries the actor and beneficiary on withdrawal", () => {
    const { vault, events, setTime } = createHarness();
    vault.createLock({ assetType: "art", unitId: 1, beneficiary: "bob", duration: 3600 }, "carol");
    setTime(3600);
    vault.withdrawUnlockedNFT({ assetType: "art", unitId: 1 }, "mallory");

    const last = events[events.length - 1];
    expect(last && payloadOf(last)).toEqual({
      assetType: "art",
      unitId: 1,
      actor: "mallory",
      beneficiary: "bob",
    });
  });

  it("reports exemption and administrator changes", () => {
    const { vault, events } = createHarness();
    vault.setFeeExemption("admin", "carol", true);
    vault.transferAdministration("admin", "ops");
    vault.pause("ops");

    expect(events.map(payloadOf)).toEqual([
      { account: "carol", exempt: true },
      { previous: "admin", next: "ops" },
      { actor: "ops" },
    ]);
  });

  it("stops delivering to a removed listener", () => {
    const { vault } = createHarness();
    const seen: string[] = [];
    const off = vault.onEvent((e) => seen.push(e.type));

    vault.pause("admin");
    off();
    vault.unpause("admin");

    expect(seen).toEqual(["admin.custody.paused"]);
  });

  it("commits a call whose listener throws", () => {
    const { vault, registry, ledger, events } = createHarness({
      fees: { creationFee: 10n, extensionFee: 0n },
    });
    vault.onEvent(() => {
      throw new Error("disk full");
    });

    const { lock } = vault.createLock(
      { assetType: "art", unitId: 1, beneficiary: "bob", duration: 3600 },
      "carol",
    );

    expect(vault.getLockedAsset("art", 1)).toEqual(lock);
    expect(registry.ownerOf(ART, unit(1))).toBe(CUSTODY);
    expect(ledger.balanceOf(CREATOR)).toBe(990n);
    expect(ledger.balanceOf(TREASURY)).toBe(10n);
    expect(events.map((e) => e.type)).toEqual([
      "custody.asset.associated",
      "custody.lock.created",
    ]);
    expect(vault.listenerFailures()).toEqual([
      "custody.asset.associated: disk full",
      "custody.lock.created: disk full",
    ]);
  });

  it("keeps delivering to later listeners after one throws", () => {
    const { vault } = createHarness();
    vault.onEvent(() => {
      throw new Error("disk full");
    });
    const seen: string[] = [];
    vault.onEvent((e) => seen.push(e.type));

    vault.pause("admin");

    expect(seen).toEqual(["admin.custody.paused"]);
    expect(vault.getConfig().paused).toBe(true);
  });
});

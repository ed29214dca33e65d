/**
 * Tests for re-entrant calls raised from inside ports.
 */

import { describe, it, expect } from "vitest";
import { CustodyError } from "../src/errors.js";
import { ReentrancyGuard } from "../src/reentrancy.js";
import type { Timevault } from "../src/timevault.js";
import { ART, captureError, createHarness, CUSTODY, unit } from "./support/harness.js";

describe("ReentrancyGuard", () => {
  it("rejects a nested run and releases after the outer run", () => {
    const guard = new ReentrancyGuard();
    let nested: CustodyError | undefined;

    const result = guard.run("outer", () => {
      nested = captureError(() => guard.run("inner", () => 1));
      return 2;
    });

    expect(result).toBe(2);
    expect(nested?.code).toBe("REENTRANCY_REJECTED");
    expect(nested?.message).toBe("Cannot start 'inner' while 'outer' is in progress");
    expect(guard.isActive).toBe(false);
  });

  it("releases when the operation throws", () => {
    const guard = new ReentrancyGuard();

    expect(() =>
      guard.run("failing", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(guard.isActive).toBe(false);
    expect(guard.run("next", () => "ok")).toBe("ok");
  });
});

describe("Timevault re-entrancy", () => {
  it("rejects a lock created from inside a transfer and completes the outer call", () => {
    let vault: Timevault | undefined;
    const nested: unknown[] = [];

    const harness = createHarness({
      transfer: (registry) => ({
        associate: (account, assetType) => registry.associate(account, assetType),
        transfer: (assetType, unitId, from, to) => {
          try {
            vault?.createLock(
              { assetType: "art", unitId: 2, beneficiary: "carol", duration: 3600 },
              "carol",
            );
          } catch (err) {
            nested.push(err);
          }
          return registry.transfer(assetType, unitId, from, to);
        },
      }),
    });
    vault = harness.vault;

    const { lock } = harness.vault.createLock(
      { assetType: "art", unitId: 1, beneficiary: "bob", duration: 3600 },
      "carol",
    );

    expect(lock.unitId).toBe(1);
    expect(nested).toHaveLength(1);
    expect(nested[0]).toBeInstanceOf(CustodyError);
    expect(nested[0]).toMatchObject({ code: "REENTRANCY_REJECTED" });
    expect(harness.vault.getLockedAsset("art", 2)).toBeUndefined();
    expect(harness.registry.ownerOf(ART, unit(1))).toBe(CUSTODY);
  });

  it("guards administrator calls made from inside the fee port", () => {
    let vault: Timevault | undefined;
    let nested: CustodyError | undefined;

    const harness = createHarness({
      fees: { creationFee: 10n, extensionFee: 0n },
      feePort: (ledger) => ({
        charge: (payer, recipient, amount) => {
          nested = captureError(() => vault?.pause("admin"));
          return ledger.charge(payer, recipient, amount);
        },
      }),
    });
    vault = harness.vault;

    harness.vault.createLock(
      { assetType: "art", unitId: 1, beneficiary: "bob", duration: 3600 },
      "carol",
    );

    expect(nested?.code).toBe("REENTRANCY_REJECTED");
    expect(harness.vault.getConfig().paused).toBe(false);
    harness.vault.pause("admin");
    expect(harness.vault.getConfig().paused).toBe(true);
  });
});

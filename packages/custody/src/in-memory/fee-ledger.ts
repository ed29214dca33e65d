/**
 * InMemoryFeeLedger — in-process fee token balances.
 */

import type { AccountId } from "@timevault/types";
import type { FeePort, PortResult } from "../types.js";

export class InMemoryFeeLedger implements FeePort {
  private readonly balances: Map<string, bigint> = new Map();

  credit(account: AccountId, amount: bigint): void {
    if (amount <= 0n) {
      throw new RangeError(`Credit amount must be positive, got ${amount}`);
    }
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  balanceOf(account: AccountId): bigint {
    return this.balances.get(account) ?? 0n;
  }

  charge(payer: AccountId, recipient: AccountId, amount: bigint): PortResult {
    return this.move(payer, recipient, amount);
  }

  private move(from: AccountId, to: AccountId, amount: bigint): PortResult {
    if (amount <= 0n) {
      return { ok: false, reason: `amount must be positive, got ${amount}` };
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      return {
        ok: false,
        reason: `insufficient balance: '${from}' has ${available}, needs ${amount}`,
      };
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return { ok: true };
  }
}

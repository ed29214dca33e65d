/**
 * AdminGate — administrator identity, pause switch and fee policy.
 *
 * Rules:
 * - Only the administrator may pause, unpause or change the fee policy
 * - Pausing or unpausing into the current state is rejected
 * - Fees stay within [0, FEE_CEILING]
 * - Exempt accounts are charged nothing
 */

import type { AccountId } from "@timevault/types";
import { CustodyError } from "./errors.js";
import type { FeeConfig } from "./types.js";

/**
 * Upper bound for any configured fee, in fee units.
 */
export const FEE_CEILING = 100_000_000n;

export const NO_FEES: FeeConfig = { creationFee: 0n, extensionFee: 0n };

export type FeeKind = "creation" | "extension";

export interface AdminState {
  readonly administrator: AccountId;
  readonly paused: boolean;
  readonly fees: FeeConfig;
  readonly feeExempt: readonly AccountId[];
}

/**
 * @throws CustodyError INVALID_INPUT when a fee is negative or above the ceiling
 */
export function assertFees(fees: FeeConfig): void {
  for (const [name, amount] of [
    ["creationFee", fees.creationFee],
    ["extensionFee", fees.extensionFee],
  ] as const) {
    if (amount < 0n || amount > FEE_CEILING) {
      throw new CustodyError(
        "INVALID_INPUT",
        `${name} must be between 0 and ${FEE_CEILING}, got ${amount}`,
      );
    }
  }
}

export class AdminGate {
  private administrator: AccountId;
  private paused: boolean;
  private fees: FeeConfig;
  private readonly feeExempt: Set<AccountId>;

  constructor(state: AdminState) {
    assertFees(state.fees);
    this.administrator = state.administrator;
    this.paused = state.paused;
    this.fees = { ...state.fees };
    this.feeExempt = new Set(state.feeExempt);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checks
  // ───────────────────────────────────────────────────────────────────────

  get isPaused(): boolean {
    return this.paused;
  }

  assertNotPaused(): void {
    if (this.paused) {
      throw new CustodyError("PAUSED", "Custody is paused");
    }
  }

  assertAdministrator(caller: AccountId): void {
    if (caller !== this.administrator) {
      throw new CustodyError(
        "UNAUTHORIZED",
        `Account '${caller}' is not the administrator`,
      );
    }
  }

  isExempt(account: AccountId): boolean {
    return this.feeExempt.has(account);
  }

  /**
   * The fee `payer` owes for an operation (zero when exempt).
   */
  feeFor(kind: FeeKind, payer: AccountId): bigint {
    if (this.isExempt(payer)) {
      return 0n;
    }
    return kind === "creation" ? this.fees.creationFee : this.fees.extensionFee;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  pause(caller: AccountId): void {
    this.assertAdministrator(caller);
    if (this.paused) {
      throw new CustodyError("INVALID_INPUT", "Custody is already paused");
    }
    this.paused = true;
  }

  unpause(caller: AccountId): void {
    this.assertAdministrator(caller);
    if (!this.paused) {
      throw new CustodyError("INVALID_INPUT", "Custody is not paused");
    }
    this.paused = false;
  }

  setFees(caller: AccountId, fees: FeeConfig): void {
    this.assertAdministrator(caller);
    assertFees(fees);
    this.fees = { ...fees };
  }

  /**
   * Returns false when the account was already in the requested state.
   */
  setFeeExemption(caller: AccountId, account: AccountId, exempt: boolean): boolean {
    this.assertAdministrator(caller);
    if (this.feeExempt.has(account) === exempt) {
      return false;
    }
    if (exempt) {
      this.feeExempt.add(account);
    } else {
      this.feeExempt.delete(account);
    }
    return true;
  }

  transferAdministration(caller: AccountId, next: AccountId): AccountId {
    this.assertAdministrator(caller);
    const previous = this.administrator;
    this.administrator = next;
    return previous;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  state(): AdminState {
    return {
      administrator: this.administrator,
      paused: this.paused,
      fees: { ...this.fees },
      feeExempt: [...this.feeExempt].sort(),
    };
  }
}

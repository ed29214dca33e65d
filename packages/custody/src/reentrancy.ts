/**
 * ReentrancyGuard — one mutating call at a time.
 *
 * A call started while another is in flight (for example from inside a
 * port callback) fails with REENTRANCY_REJECTED; the outer call is not
 * affected.
 */

import { CustodyError } from "./errors.js";

export class ReentrancyGuard {
  private active: string | undefined;

  get isActive(): boolean {
    return this.active !== undefined;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.active !== undefined) {
      throw new CustodyError(
        "REENTRANCY_REJECTED",
        `Cannot start '${operation}' while '${this.active}' is in progress`,
      );
    }

    this.active = operation;
    try {
      return fn();
    } finally {
      this.active = undefined;
    }
  }
}

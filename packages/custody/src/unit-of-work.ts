/**
 * UnitOfWork — compensation stack for multi-step side effects.
 *
 * Each completed side effect registers its undo step. On failure the
 * undo steps run newest-first; steps that cannot be undone are reported
 * on the error rather than hiding the original failure.
 */

import { CustodyError } from "./errors.js";
import type { PortResult } from "./types.js";

interface Compensation {
  readonly label: string;
  readonly undo: () => PortResult;
}

/**
 * Call a port and turn a thrown error into a failed result.
 */
export function callPort(call: () => PortResult): PortResult {
  try {
    return call();
  } catch (err) {
    return {
      ok: false,
      reason: err instanceof Error ? err.message : String(err),
    };
  }
}

export class UnitOfWork {
  private readonly compensations: Compensation[] = [];

  onRollback(label: string, undo: () => PortResult): void {
    this.compensations.push({ label, undo });
  }

  /**
   * Run every registered undo step, newest first.
   * Returns a description of each step that failed.
   */
  rollback(): string[] {
    const failures: string[] = [];
    while (this.compensations.length > 0) {
      const step = this.compensations.pop();
      if (step === undefined) break;
      const result = callPort(step.undo);
      if (!result.ok) {
        failures.push(`${step.label}: ${result.reason}`);
      }
    }
    return failures;
  }

  /**
   * Roll back, then throw `error` (annotated with any failed undo steps).
   */
  fail(error: CustodyError): never {
    const compensationFailures = this.rollback();
    if (compensationFailures.length === 0) {
      throw error;
    }
    throw new CustodyError(error.code, error.message, {
      ...error.details,
      compensationFailures,
    });
  }
}

/**
 * Custody errors.
 *
 * Every failure the custody core reports is a CustodyError carrying one
 * of a closed set of codes. Preconditions fail before any state change.
 */

export type CustodyErrorCode =
  | "INVALID_INPUT"
  | "LOCK_NOT_FOUND"
  | "LOCK_ALREADY_EXISTS"
  | "UNAUTHORIZED"
  | "NOT_YET_EXPIRED"
  | "INELIGIBLE_ASSET"
  | "TRANSFER_FAILED"
  | "FEE_CHARGE_FAILED"
  | "REENTRANCY_REJECTED"
  | "PAUSED";

export interface CustodyErrorDetails {
  /** Reason reported by the port that failed */
  readonly reason?: string;

  /** Undo steps that could not be completed after the failure */
  readonly compensationFailures?: readonly string[];
}

export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;
  public readonly details: CustodyErrorDetails | undefined;

  constructor(
    code: CustodyErrorCode,
    message: string,
    details?: CustodyErrorDetails,
  ) {
    super(message);
    this.name = "CustodyError";
    this.code = code;
    this.details = details;
  }
}

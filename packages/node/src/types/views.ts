/**
 * JSON views of custody results.
 *
 * Fee amounts are bigint in the domain and decimal strings on the wire.
 */

import { releaseTimeOf } from "@timevault/types";
import type { Lock } from "@timevault/types";
import type {
  CreateLockResult,
  CustodyConfigView,
  ExtendLockResult,
  WithdrawResult,
} from "@timevault/custody";

export interface LockView extends Lock {
  /** Time (seconds) from which the unit may be withdrawn */
  readonly releaseTime: number;
}

export function toLockView(lock: Lock): LockView {
  return { ...lock, releaseTime: releaseTimeOf(lock) };
}

export function toCreateLockView(result: CreateLockResult) {
  return {
    lock: toLockView(result.lock),
    feeCharged: result.feeCharged.toString(),
    associated: result.associated,
  };
}

export function toExtendLockView(result: ExtendLockResult) {
  return {
    lock: toLockView(result.lock),
    feeCharged: result.feeCharged.toString(),
  };
}

export function toWithdrawView(result: WithdrawResult) {
  return {
    lock: toLockView(result.lock),
    releasedTo: result.releasedTo,
  };
}

export function toConfigView(config: CustodyConfigView) {
  return {
    administrator: config.administrator,
    custodyAccount: config.custodyAccount,
    feeRecipient: config.feeRecipient,
    paused: config.paused,
    fees: {
      creationFee: config.fees.creationFee.toString(),
      extensionFee: config.fees.extensionFee.toString(),
    },
    feeExempt: config.feeExempt,
    feeCeiling: config.feeCeiling.toString(),
    minLockDurationSeconds: config.minLockDurationSeconds,
  };
}

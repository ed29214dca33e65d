/**
 * LockStore — the only owner of lock records.
 *
 * Rules:
 * - (assetType, unitId) maps to at most one record
 * - A record with zero duration is treated as absent
 * - Records handed out are frozen copies
 */

import type { Lock, LockKey } from "@timevault/types";

export interface LockStore {
  get(key: LockKey): Lock | undefined;

  /** Insert or replace the record for the lock's key */
  put(lock: Lock): void;

  /** Remove and return the record, if any */
  delete(key: LockKey): Lock | undefined;

  list(): readonly Lock[];

  readonly size: number;
}

function storageKey(key: LockKey): string {
  // Identifiers never contain "/", so the key is unambiguous.
  return `${key.assetType}/${key.unitId}`;
}

function freeze(lock: Lock): Lock {
  return Object.freeze({
    assetType: lock.assetType,
    unitId: lock.unitId,
    creator: lock.creator,
    beneficiary: lock.beneficiary,
    start: lock.start,
    duration: lock.duration,
  });
}

export class InMemoryLockStore implements LockStore {
  private readonly locks: Map<string, Lock> = new Map();

  get(key: LockKey): Lock | undefined {
    const lock = this.locks.get(storageKey(key));
    return lock !== undefined && lock.duration > 0 ? lock : undefined;
  }

  put(lock: Lock): void {
    this.locks.set(storageKey(lock), freeze(lock));
  }

  delete(key: LockKey): Lock | undefined {
    const lock = this.get(key);
    this.locks.delete(storageKey(key));
    return lock;
  }

  list(): readonly Lock[] {
    return [...this.locks.values()].filter((l) => l.duration > 0);
  }

  get size(): number {
    return this.list().length;
  }
}

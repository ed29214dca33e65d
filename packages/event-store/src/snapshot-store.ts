/**
 * @timevault/event-store — Snapshot Store.
 *
 * Snapshots are point-in-time captures of aggregate state, tagged with
 * the event position they were taken at. They let a process restart
 * without replaying the whole log.
 *
 * Design principles:
 * - The event log is the source of truth; snapshots can be deleted
 * - Each snapshot carries a stateHash (SHA-256 over RFC 8785 JSON)
 * - Multiple snapshots per stream are allowed; older ones can be pruned
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

// =============================================================================
// Types
// =============================================================================

export function computeSnapshotHash(state: unknown): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

export interface StoredSnapshot {
  readonly streamId: string;

  /** The event position this snapshot was taken at */
  readonly version: number;

  readonly state: unknown;

  readonly createdAt: string;

  readonly stateHash: string;
}

export interface SaveSnapshotOptions {
  readonly streamId: string;
  readonly version: number;
  readonly state: unknown;
}

/**
 * Check that a snapshot's stateHash matches its state.
 */
export function verifySnapshotIntegrity(snapshot: StoredSnapshot): boolean {
  if (snapshot.stateHash === "") {
    return false;
  }
  return snapshot.stateHash === computeSnapshotHash(snapshot.state);
}

export interface SnapshotStore {
  /** Overwrites any snapshot for the same stream at the same version */
  save(options: SaveSnapshotOptions): StoredSnapshot;

  /** The most recent snapshot, or undefined */
  load(streamId: string): StoredSnapshot | undefined;

  deleteAll(streamId: string): void;

  hasSnapshot(streamId: string): boolean;
}

function createSnapshot(options: SaveSnapshotOptions): StoredSnapshot {
  return {
    streamId: options.streamId,
    version: options.version,
    state: options.state,
    createdAt: new Date().toISOString(),
    stateHash: computeSnapshotHash(options.state),
  };
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemorySnapshotStore implements SnapshotStore {
  /** streamId → snapshots sorted by version */
  private readonly _snapshots = new Map<string, StoredSnapshot[]>();

  save(options: SaveSnapshotOptions): StoredSnapshot {
    const snapshot = createSnapshot(options);
    const kept = (this._snapshots.get(options.streamId) ?? []).filter(
      (s) => s.version !== options.version,
    );
    kept.push(snapshot);
    kept.sort((a, b) => a.version - b.version);
    this._snapshots.set(options.streamId, kept);
    return snapshot;
  }

  load(streamId: string): StoredSnapshot | undefined {
    const snapshots = this._snapshots.get(streamId);
    return snapshots?.[snapshots.length - 1];
  }

  deleteAll(streamId: string): void {
    this._snapshots.delete(streamId);
  }

  hasSnapshot(streamId: string): boolean {
    return (this._snapshots.get(streamId)?.length ?? 0) > 0;
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

export interface FileSnapshotStoreOptions {
  /** Keep at most this many snapshots per stream. Default: unlimited */
  readonly retain?: number;
}

/**
 * Stores each snapshot as `<baseDir>/<streamId>/<version>.json`.
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly _baseDir: string;
  private readonly _retain: number | undefined;

  constructor(baseDir: string, options?: FileSnapshotStoreOptions) {
    this._baseDir = baseDir;
    this._retain = options?.retain;
    mkdirSync(this._baseDir, { recursive: true });
  }

  get baseDir(): string {
    return this._baseDir;
  }

  save(options: SaveSnapshotOptions): StoredSnapshot {
    const snapshot = createSnapshot(options);
    mkdirSync(this.streamDir(options.streamId), { recursive: true });
    writeFileSync(
      this.snapshotPath(options.streamId, options.version),
      JSON.stringify(snapshot, null, 2),
      "utf-8",
    );
    this.prune(options.streamId);
    return snapshot;
  }

  load(streamId: string): StoredSnapshot | undefined {
    const versions = this.listVersions(streamId);
    const latest = versions[versions.length - 1];
    return latest === undefined ? undefined : this.readSnapshot(streamId, latest);
  }

  deleteAll(streamId: string): void {
    for (const version of this.listVersions(streamId)) {
      unlinkSync(this.snapshotPath(streamId, version));
    }
  }

  hasSnapshot(streamId: string): boolean {
    return this.listVersions(streamId).length > 0;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private prune(streamId: string): void {
    if (this._retain === undefined) {
      return;
    }
    const versions = this.listVersions(streamId);
    for (const version of versions.slice(0, Math.max(0, versions.length - this._retain))) {
      unlinkSync(this.snapshotPath(streamId, version));
    }
  }

  private streamDir(streamId: string): string {
    return join(this._baseDir, streamId.replace(/[^a-zA-Z0-9_.-]/g, "_"));
  }

  private snapshotPath(streamId: string, version: number): string {
    return join(this.streamDir(streamId), `${version}.json`);
  }

  private listVersions(streamId: string): number[] {
    const dir = this.streamDir(streamId);
    if (!existsSync(dir)) {
      return [];
    }

    const versions: number[] = [];
    for (const file of readdirSync(dir)) {
      const match = /^(\d+)\.json$/.exec(file);
      if (match?.[1] !== undefined) {
        versions.push(Number(match[1]));
      }
    }
    return versions.sort((a, b) => a - b);
  }

  private readSnapshot(
    streamId: string,
    version: number,
  ): StoredSnapshot | undefined {
    const filePath = this.snapshotPath(streamId, version);
    if (!existsSync(filePath)) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch {
      return undefined;
    }
    return isStoredSnapshot(parsed) ? parsed : undefined;
  }
}

function isStoredSnapshot(value: unknown): value is StoredSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.streamId === "string" &&
    typeof v.version === "number" &&
    "state" in v &&
    typeof v.createdAt === "string" &&
    typeof v.stateHash === "string"
  );
}

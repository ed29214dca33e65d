/**
 * @timevault/event-store — File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append writes all lines in one call and fsyncs before returning
 * - Partial or malformed lines (torn writes) are skipped on load
 * - The file is the source of truth; in-memory indexes are derived
 *
 * File format (one StoredEvent per line):
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isEventMetadata } from "@timevault/types";
import { BaseEventStore } from "./base-store.js";
import type { StoredEvent } from "./types.js";

export interface JsonlEventStoreOptions {
  readonly filePath: string;
}

export class JsonlEventStore extends BaseEventStore {
  private readonly _filePath: string;
  private _skippedLines = 0;

  /**
   * Open (or lazily create) the log at `filePath`.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlEventStoreOptions) {
    super();
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this.index(this.loadFromFile());
  }

  get filePath(): string {
    return this._filePath;
  }

  /** Lines dropped on load because they were torn or malformed */
  get skippedLines(): number {
    return this._skippedLines;
  }

  protected persist(events: readonly StoredEvent[]): void {
    const data = events.map((e) => JSON.stringify(e) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private loadFromFile(): StoredEvent[] {
    if (!existsSync(this._filePath)) {
      return [];
    }

    const loaded: StoredEvent[] = [];
    for (const line of readFileSync(this._filePath, "utf-8").split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn write from an unclean shutdown.
        this._skippedLines++;
        continue;
      }

      if (!isStoredEvent(parsed)) {
        this._skippedLines++;
        continue;
      }
      loaded.push(parsed);
    }
    return loaded;
  }
}

function isStoredEvent(value: unknown): value is StoredEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (v.event === null || typeof v.event !== "object") return false;
  const e = v.event as Record<string, unknown>;
  return (
    typeof e.type === "string" &&
    isEventMetadata(e.metadata) &&
    e.payload !== null &&
    typeof e.payload === "object" &&
    typeof v.streamId === "string" &&
    typeof v.version === "number" &&
    typeof v.globalPosition === "number" &&
    typeof v.appendedAt === "string" &&
    typeof v.hash === "string" &&
    typeof v.previousHash === "string"
  );
}

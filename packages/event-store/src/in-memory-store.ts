/**
 * @timevault/event-store — In-memory EventStore implementation.
 *
 * Suitable for unit tests, short-lived processes and development.
 * All state is lost on process exit.
 */

import { BaseEventStore } from "./base-store.js";
import type { StoredEvent } from "./types.js";

export class InMemoryEventStore extends BaseEventStore {
  protected persist(_events: readonly StoredEvent[]): void {
    // Memory is the only storage.
  }
}

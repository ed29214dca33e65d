/**
 * Event Types
 *
 * Append-only event architecture.
 * Every custody state change is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Which Timevault subsystem emitted an event.
 */
export type EventSource = "custody" | "admin";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping events produced by the same operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`
 * (e.g., "custody.lock.created", "admin.custody.paused").
 */
export interface DomainEvent {
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}

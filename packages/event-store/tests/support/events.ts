import type { DomainEvent, EventSource } from "@timevault/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
  source: EventSource = "custody",
): DomainEvent {
  counter++;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: `corr-${counter}`,
      source,
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "custody.lock.created"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) =>
    makeEvent(prefix, { unitId: i + 1 }),
  );
}

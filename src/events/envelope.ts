import { newEventId } from "../core/ids.js";
import { nowIso } from "../core/time.js";
import { ValidationError } from "../core/errors.js";
import {
  EventEnvelope,
  missionAggregateId,
  type EventType,
  type PayloadInputOf
} from "../schemas/event.js";

/** Everything about an event its author decides; node identity and clock are stamped later. */
export type EventDraft<T extends EventType> = {
  event_type: T;
  mission_id: string;
  payload: PayloadInputOf<T>;
  causation_id?: string | null;
  correlation_id?: string;
  schema_version?: string;
  /** Pre-allocated when the payload must reference its own event id. */
  event_id?: string;
  timestamp?: string;
};

export type NewEnvelopeArgs<T extends EventType> = EventDraft<T> & {
  origin_node: string;
  logical_clock: number;
};

export const ENVELOPE_SCHEMA_VERSION = "1.0.0";

/**
 * Builds and validates an envelope. Payloads are checked against the shape for
 * their event kind here, so a malformed event never reaches the queue.
 */
export function newEnvelope<T extends EventType>(args: NewEnvelopeArgs<T>): EventEnvelope {
  const parsed = EventEnvelope.safeParse({
    event_id: args.event_id ?? newEventId(),
    event_type: args.event_type,
    aggregate_id: missionAggregateId(args.mission_id),
    payload: args.payload,
    timestamp: args.timestamp ?? nowIso(),
    origin_node: args.origin_node,
    logical_clock: args.logical_clock,
    causation_id: args.causation_id ?? null,
    ...(args.correlation_id ? { correlation_id: args.correlation_id } : {}),
    schema_version: args.schema_version ?? ENVELOPE_SCHEMA_VERSION
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid ${args.event_type} event: ${detail}`);
  }
  return parsed.data;
}

export function isEventOfType<T extends EventType>(
  ev: EventEnvelope,
  type: T
): ev is Extract<EventEnvelope, { event_type: T }> {
  return ev.event_type === type;
}

import { newEventId } from "../core/ids.js";
import type { QueueStore } from "../events/queue_store.js";
import type { RecordArgs } from "../events/recorder.js";
import type { EventEnvelope, EventType } from "../schemas/event.js";
import { parseFocus } from "./focus.js";
import { activeDriversOn, buildRoster, type ParticipantSnapshot } from "./roster.js";

export type CollisionSeverity = "medium" | "high";

export type CollisionWarning = {
  /** Event id of the recorded warning; acknowledgements point back at it. */
  warning_id: string;
  type: "PotentialStepCollisionDetected" | "ConcurrentDriverWarning";
  severity: CollisionSeverity;
  focus: string;
  conflicting_participants: ParticipantSnapshot[];
};

export type CollisionContext = {
  store: QueueStore;
  emit: <T extends EventType>(args: RecordArgs<T>) => Promise<EventEnvelope>;
};

export type DetectArgs = {
  stream_id: string;
  participant_id: string;
  /** `wp:<id>` / `step:<id>`; null means nothing to collide on. */
  focus: string | null;
};

/**
 * Advisory check run before a participant starts driving. Returns null when
 * no one else is actively driving the same focus target; otherwise records a
 * warning event and returns it.
 */
export async function detectCollision(ctx: CollisionContext, args: DetectArgs): Promise<CollisionWarning | null> {
  if (args.focus === null) return null;
  const focusTarget = parseFocus(args.focus);
  if (focusTarget === null) return null;

  const roster = await buildRoster(ctx.store, args.stream_id);
  // An unknown requester is invisible to the view, not a collision.
  if (!roster.has(args.participant_id)) return null;

  const others = activeDriversOn(roster, args.focus).filter((p) => p.participant_id !== args.participant_id);
  if (others.length === 0) return null;

  const warningId = newEventId();
  const conflictingIds = others.map((p) => p.participant_id);
  const base = {
    participant_id: args.participant_id,
    mission_id: args.stream_id,
    warning_id: warningId,
    focus_target: focusTarget,
    conflicting_participant_ids: conflictingIds
  };

  if (others.length === 1) {
    await ctx.emit({
      event_type: "PotentialStepCollisionDetected",
      mission_id: args.stream_id,
      event_id: warningId,
      payload: { ...base, severity: "medium" }
    });
    return {
      warning_id: warningId,
      type: "PotentialStepCollisionDetected",
      severity: "medium",
      focus: args.focus,
      conflicting_participants: others
    };
  }

  await ctx.emit({
    event_type: "ConcurrentDriverWarning",
    mission_id: args.stream_id,
    event_id: warningId,
    payload: { ...base, severity: "high" }
  });
  return {
    warning_id: warningId,
    type: "ConcurrentDriverWarning",
    severity: "high",
    focus: args.focus,
    conflicting_participants: others
  };
}

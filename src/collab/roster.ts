import type { EventEnvelope, QueueEntry } from "../schemas/event.js";
import type { DriveIntent, ParticipantRole } from "../schemas/common.js";
import type { QueueStore } from "../events/queue_store.js";
import { formatFocus } from "./focus.js";

export type ParticipantSnapshot = {
  participant_id: string;
  role: ParticipantRole;
  joined_at: string;
  /** `wp:<id>` / `step:<id>`, or null when unfocused. */
  focus: string | null;
  drive_intent: DriveIntent;
  last_activity_at: string;
};

export type Roster = Map<string, ParticipantSnapshot>;

function applyEvent(roster: Roster, ev: EventEnvelope): void {
  const participantId = ev.payload.participant_id;

  if (ev.event_type === "ParticipantJoined") {
    if (roster.has(participantId)) return;
    roster.set(participantId, {
      participant_id: participantId,
      role: ev.payload.role,
      joined_at: ev.timestamp,
      focus: null,
      drive_intent: "inactive",
      last_activity_at: ev.timestamp
    });
    return;
  }

  // Events for participants we never saw join are stale or foreign.
  const prev = roster.get(participantId);
  if (!prev) return;
  const next: ParticipantSnapshot = { ...prev, last_activity_at: ev.timestamp };
  switch (ev.event_type) {
    case "FocusChanged":
      next.focus = formatFocus(ev.payload.focus_target);
      break;
    case "DriveIntentSet":
      next.drive_intent = ev.payload.intent;
      break;
    default:
      break;
  }
  roster.set(participantId, next);
}

/** Folds entries in log order. Pure: the same entries always give the same roster. */
export function foldRoster(entries: QueueEntry[]): Roster {
  const roster: Roster = new Map();
  for (const entry of entries) applyEvent(roster, entry.event);
  return roster;
}

export async function buildRoster(store: QueueStore, streamId: string): Promise<Roster> {
  return foldRoster(await store.readAll(streamId));
}

export function activeDriversOn(roster: Roster, focus: string): ParticipantSnapshot[] {
  return [...roster.values()].filter((p) => p.focus === focus && p.drive_intent === "active");
}

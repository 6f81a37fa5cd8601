import { z } from "zod";
import { DriveIntent, IsoDateTime, ParticipantRole, Ulid } from "./common.js";

export const FocusTarget = z
  .object({
    target_type: z.enum(["work_package", "step"]),
    target_id: z.string().min(1)
  })
  .strict();
export type FocusTarget = z.infer<typeof FocusTarget>;

const PayloadBase = z.object({
  participant_id: z.string().min(1),
  mission_id: z.string().min(1)
});

export const ParticipantJoinedPayload = PayloadBase.extend({
  role: ParticipantRole,
  display_name: z.string().min(1).nullable().default(null)
}).strict();

export const FocusChangedPayload = PayloadBase.extend({
  focus_target: FocusTarget.nullable(),
  previous_focus_target: FocusTarget.nullable()
}).strict();

export const DriveIntentSetPayload = PayloadBase.extend({
  intent: DriveIntent
}).strict();

const CollisionPayloadBase = PayloadBase.extend({
  warning_id: Ulid,
  focus_target: FocusTarget,
  conflicting_participant_ids: z.array(z.string().min(1)).min(1)
});

export const PotentialStepCollisionPayload = CollisionPayloadBase.extend({
  severity: z.literal("medium")
}).strict();

export const ConcurrentDriverWarningPayload = CollisionPayloadBase.extend({
  severity: z.literal("high")
}).strict();

export const AcknowledgementAction = z.enum(["continue", "hold", "reassign", "defer"]);
export type AcknowledgementAction = z.infer<typeof AcknowledgementAction>;

export const WarningAcknowledgedPayload = PayloadBase.extend({
  warning_id: Ulid,
  acknowledgement: AcknowledgementAction
}).strict();

export const COMMENT_MAX_LENGTH = 500;

export const CommentPostedPayload = PayloadBase.extend({
  comment_id: Ulid,
  content: z.string().trim().min(1).max(COMMENT_MAX_LENGTH),
  reply_to: Ulid.nullable().default(null),
  mentions: z.array(z.string().min(1)).default([])
}).strict();

export const DecisionCapturedPayload = PayloadBase.extend({
  decision_id: Ulid,
  topic: z.string().min(1),
  chosen_option: z.string().trim().min(1),
  rationale: z.string().min(1).nullable().default(null),
  referenced_warning_id: Ulid.nullable().default(null)
}).strict();

const EnvelopeBase = z.object({
  event_id: Ulid,
  aggregate_id: z.string().min(1),
  timestamp: IsoDateTime,
  origin_node: z.string().min(1),
  logical_clock: z.number().int().nonnegative(),
  // Older writers leave it out.
  causation_id: Ulid.nullable().default(null),
  // Optional metadata owned by the remote schema; carried through untouched,
  // as is any other envelope key the remote schema adds.
  correlation_id: z.string().min(1).optional(),
  schema_version: z.string().min(1).optional()
});

export const EventEnvelope = z.discriminatedUnion("event_type", [
  EnvelopeBase.extend({ event_type: z.literal("ParticipantJoined"), payload: ParticipantJoinedPayload }).passthrough(),
  EnvelopeBase.extend({ event_type: z.literal("FocusChanged"), payload: FocusChangedPayload }).passthrough(),
  EnvelopeBase.extend({ event_type: z.literal("DriveIntentSet"), payload: DriveIntentSetPayload }).passthrough(),
  EnvelopeBase.extend({
    event_type: z.literal("PotentialStepCollisionDetected"),
    payload: PotentialStepCollisionPayload
  }).passthrough(),
  EnvelopeBase.extend({
    event_type: z.literal("ConcurrentDriverWarning"),
    payload: ConcurrentDriverWarningPayload
  }).passthrough(),
  EnvelopeBase.extend({ event_type: z.literal("WarningAcknowledged"), payload: WarningAcknowledgedPayload }).passthrough(),
  EnvelopeBase.extend({ event_type: z.literal("CommentPosted"), payload: CommentPostedPayload }).passthrough(),
  EnvelopeBase.extend({ event_type: z.literal("DecisionCaptured"), payload: DecisionCapturedPayload }).passthrough()
]);
export type EventEnvelope = z.infer<typeof EventEnvelope>;

export type EventType = EventEnvelope["event_type"];

export type PayloadOf<T extends EventType> = Extract<EventEnvelope, { event_type: T }>["payload"];

/** Payload as callers write it, before zod applies defaults. */
export type PayloadInputOf<T extends EventType> = Extract<
  z.input<typeof EventEnvelope>,
  { event_type: T }
>["payload"];

export const ReplayStatus = z.enum(["pending", "delivered", "failed"]);
export type ReplayStatus = z.infer<typeof ReplayStatus>;

export const ReplayMetadata = z
  .object({
    replay_status: ReplayStatus,
    retry_count: z.number().int().nonnegative(),
    last_retry_at: IsoDateTime.nullable(),
    last_error: z.string().nullable().default(null)
  })
  .strict();
export type ReplayMetadata = z.infer<typeof ReplayMetadata>;

export type QueueEntry = {
  event: EventEnvelope;
} & ReplayMetadata;

export function missionAggregateId(missionId: string): string {
  return `mission/${missionId}`;
}

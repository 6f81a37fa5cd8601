import { ConfigError, NotJoinedError, ReplayAuthError, TransientDeliveryError, ValidationError } from "../core/errors.js";
import { newEventId } from "../core/ids.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { nowIso } from "../core/time.js";
import type { EventDraft } from "../events/envelope.js";
import type { ApiFactory, MissionApi } from "../events/ingestion_client.js";
import type { LamportClock } from "../events/lamport.js";
import type { QueueStore } from "../events/queue_store.js";
import { EventRecorder } from "../events/recorder.js";
import { replayPending, type ReplayResult, type RetryPolicy } from "../events/replay.js";
import { DriveIntent, ParticipantRole } from "../schemas/common.js";
import {
  AcknowledgementAction,
  COMMENT_MAX_LENGTH,
  type EventEnvelope,
  type EventType
} from "../schemas/event.js";
import type { MissionSession } from "../schemas/session.js";
import { detectCollision, type CollisionWarning } from "./collision.js";
import { formatFocus, parseFocus } from "./focus.js";
import { buildRoster, type ParticipantSnapshot } from "./roster.js";
import type { SessionStore } from "./session.js";

export type Delivery = "delivered" | "queued" | "rejected";

export type RecordedEvent = {
  event: EventEnvelope;
  delivery: Delivery;
};

export type ReplaySettings = {
  max_batch_size?: number;
  max_retries?: number;
  policy?: RetryPolicy;
};

export type MissionServiceDeps = {
  store: QueueStore;
  clock: LamportClock;
  sessions: SessionStore;
  /** Omit to run fully offline: events are queued and never sent. */
  api?: ApiFactory;
  api_url?: string;
  auth_token?: string;
  replay?: ReplaySettings;
  logger?: Logger;
};

export type JoinResult = {
  participant_id: string;
  role: ParticipantRole;
  delivery: Delivery;
};

export type FocusResult =
  | { status: "unchanged"; focus: string | null }
  | { status: "changed"; focus: string | null; previous: string | null; delivery: Delivery };

export type DriveResult =
  | { status: "unchanged"; drive_intent: DriveIntent }
  | { status: "changed"; drive_intent: DriveIntent; delivery: Delivery }
  | { status: "collision"; warning: CollisionWarning };

export type AcknowledgeResult = {
  action: AcknowledgementAction;
  acknowledgement: RecordedEvent;
  /** Set for `continue` and `hold`. */
  drive?: DriveResult;
  /** Set for `reassign`. */
  comment?: RecordedEvent;
};

export type StatusReport = {
  mission_id: string;
  participants: ParticipantSnapshot[];
  active_drivers: number;
  queue: { pending: number; delivered: number; failed: number; corrupt_lines: number };
  /** Definitive rejections; each needs an operator to look at it. */
  failures: { event_id: string; event_type: EventType; reason: string | null }[];
};

type WarningRecord = {
  warning_id: string;
  participant_id: string;
  focus: string | null;
  conflicting_participant_ids: string[];
};

/**
 * Mission collaboration use-cases. Every state change is appended to the
 * local queue first and only then offered to the ingestion service, so an
 * unreachable service never fails an operation.
 */
export class MissionService {
  private readonly store: QueueStore;
  private readonly clock: LamportClock;
  private readonly sessions: SessionStore;
  private readonly recorder: EventRecorder;
  private readonly api?: ApiFactory;
  private readonly apiUrl: string;
  private readonly authToken: string;
  private readonly replaySettings: ReplaySettings;
  private readonly logger: Logger;

  constructor(deps: MissionServiceDeps) {
    this.store = deps.store;
    this.clock = deps.clock;
    this.sessions = deps.sessions;
    this.recorder = new EventRecorder(deps.store, deps.clock);
    this.api = deps.api;
    this.apiUrl = deps.api_url ?? "";
    this.authToken = deps.auth_token ?? "";
    this.replaySettings = deps.replay ?? {};
    this.logger = deps.logger ?? silentLogger();
  }

  get node_id(): string {
    return this.clock.node_id;
  }

  async join(missionId: string, role: string, opts: { display_name?: string } = {}): Promise<JoinResult> {
    this.store.queuePath(missionId);
    const parsedRole = ParticipantRole.safeParse(role);
    if (!parsedRole.success) {
      throw new ValidationError(`Invalid role: ${role}. Expected one of ${ParticipantRole.options.join(", ")}`);
    }
    if (!this.api || !this.apiUrl) throw new ConfigError("Joining a mission requires MC_API_URL");
    if (!this.authToken) throw new ConfigError("Joining a mission requires MC_AUTH_TOKEN");

    const reply = await this.api({ api_url: this.apiUrl, token: this.authToken }).joinMission(
      missionId,
      parsedRole.data
    );
    const session: MissionSession = {
      mission_id: missionId,
      mission_run_id: reply.mission_run_id ?? "",
      participant_id: reply.participant_id,
      role: parsedRole.data,
      joined_at: nowIso(),
      api_url: this.apiUrl,
      session_token: reply.session_token ?? this.authToken
    };
    await this.sessions.save(session);
    await this.sessions.setActiveMission(missionId);

    const recorded = await this.emit(session, {
      event_type: "ParticipantJoined",
      mission_id: missionId,
      correlation_id: session.mission_run_id || undefined,
      payload: {
        participant_id: session.participant_id,
        mission_id: missionId,
        role: session.role,
        display_name: opts.display_name ?? reply.display_name ?? null
      }
    });
    return { participant_id: session.participant_id, role: session.role, delivery: recorded.delivery };
  }

  async setFocus(missionId: string, focus: string): Promise<FocusResult> {
    const target = parseFocus(focus);
    const { session, self } = await this.requireParticipant(missionId);
    const next = formatFocus(target);
    if (self.focus === next) return { status: "unchanged", focus: next };

    const recorded = await this.emit(session, {
      event_type: "FocusChanged",
      mission_id: missionId,
      payload: {
        participant_id: session.participant_id,
        mission_id: missionId,
        focus_target: target,
        previous_focus_target: self.focus === null ? null : parseFocus(self.focus)
      }
    });
    return { status: "changed", focus: next, previous: self.focus, delivery: recorded.delivery };
  }

  async setDrive(missionId: string, intent: string, opts: { bypass_collision?: boolean } = {}): Promise<DriveResult> {
    const parsedIntent = DriveIntent.safeParse(intent);
    if (!parsedIntent.success) {
      throw new ValidationError(`Invalid drive state: ${intent}. Must be 'active' or 'inactive'`);
    }
    const { session, self } = await this.requireParticipant(missionId);
    if (self.drive_intent === parsedIntent.data) return { status: "unchanged", drive_intent: self.drive_intent };

    // Releasing is always safe; only taking the wheel is checked.
    if (parsedIntent.data === "active" && !opts.bypass_collision) {
      const warning = await detectCollision(
        {
          store: this.store,
          emit: async <T extends EventType>(draft: EventDraft<T>) => (await this.emit(session, draft)).event
        },
        { stream_id: missionId, participant_id: session.participant_id, focus: self.focus }
      );
      if (warning) return { status: "collision", warning };
    }

    const recorded = await this.emit(session, {
      event_type: "DriveIntentSet",
      mission_id: missionId,
      payload: { participant_id: session.participant_id, mission_id: missionId, intent: parsedIntent.data }
    });
    return { status: "changed", drive_intent: parsedIntent.data, delivery: recorded.delivery };
  }

  /** Records the response to a collision warning and carries it out. */
  async acknowledge(missionId: string, warningId: string, action: string): Promise<AcknowledgeResult> {
    const parsedAction = AcknowledgementAction.safeParse(action);
    if (!parsedAction.success) {
      throw new ValidationError(
        `Invalid acknowledgement: ${action}. Must be one of ${AcknowledgementAction.options.join(", ")}`
      );
    }
    const session = await this.sessions.ensureJoined(missionId);
    const warning = await this.findWarning(missionId, warningId);
    if (!warning) throw new ValidationError(`Unknown collision warning: ${warningId}`);
    if (warning.participant_id !== session.participant_id) {
      throw new ValidationError(`Warning ${warningId} was raised for another participant`);
    }

    const acknowledgement = await this.emit(session, {
      event_type: "WarningAcknowledged",
      mission_id: missionId,
      causation_id: warningId,
      payload: {
        participant_id: session.participant_id,
        mission_id: missionId,
        warning_id: warningId,
        acknowledgement: parsedAction.data
      }
    });

    const result: AcknowledgeResult = { action: parsedAction.data, acknowledgement };
    switch (parsedAction.data) {
      case "continue":
        result.drive = await this.setDrive(missionId, "active", { bypass_collision: true });
        break;
      case "hold":
        result.drive = await this.setDrive(missionId, "inactive");
        break;
      case "reassign": {
        const mentions = warning.conflicting_participant_ids;
        const content = `Suggest reassigning ${warning.focus ?? "the current focus"}: ${mentions
          .map((id) => `@${id}`)
          .join(" ")} already driving`;
        result.comment = await this.emitWithOwnId(session, (id) => ({
          event_type: "CommentPosted",
          mission_id: missionId,
          causation_id: warningId,
          payload: {
            participant_id: session.participant_id,
            mission_id: missionId,
            comment_id: id,
            content: content.slice(0, COMMENT_MAX_LENGTH),
            mentions
          }
        }));
        break;
      }
      case "defer":
        break;
    }
    return result;
  }

  async comment(
    missionId: string,
    text: string,
    opts: { reply_to?: string } = {}
  ): Promise<{ comment_id: string; truncated: boolean; delivery: Delivery }> {
    const body = text.trim();
    if (!body) throw new ValidationError("Comment cannot be empty");
    const truncated = body.length > COMMENT_MAX_LENGTH;
    if (truncated) {
      this.logger.warn({ length: body.length, max: COMMENT_MAX_LENGTH }, "truncating comment");
    }
    const { session } = await this.requireParticipant(missionId);
    const recorded = await this.emitWithOwnId(session, (id) => ({
      event_type: "CommentPosted",
      mission_id: missionId,
      causation_id: opts.reply_to ?? null,
      payload: {
        participant_id: session.participant_id,
        mission_id: missionId,
        comment_id: id,
        content: body.slice(0, COMMENT_MAX_LENGTH),
        reply_to: opts.reply_to ?? null
      }
    }));
    return { comment_id: recorded.event.event_id, truncated, delivery: recorded.delivery };
  }

  async decide(
    missionId: string,
    text: string,
    opts: { rationale?: string; referenced_warning_id?: string } = {}
  ): Promise<{ decision_id: string; topic: string; delivery: Delivery }> {
    const chosen = text.trim();
    if (!chosen) throw new ValidationError("Decision cannot be empty");
    const { session, self } = await this.requireParticipant(missionId);
    const topic = self.focus ?? "mission";
    const recorded = await this.emitWithOwnId(session, (id) => ({
      event_type: "DecisionCaptured",
      mission_id: missionId,
      causation_id: opts.referenced_warning_id ?? null,
      payload: {
        participant_id: session.participant_id,
        mission_id: missionId,
        decision_id: id,
        topic,
        chosen_option: chosen,
        rationale: opts.rationale?.trim() || null,
        referenced_warning_id: opts.referenced_warning_id ?? null
      }
    }));
    return { decision_id: recorded.event.event_id, topic, delivery: recorded.delivery };
  }

  async status(missionId: string): Promise<StatusReport> {
    const roster = await buildRoster(this.store, missionId);
    const summary = await this.store.summarize(missionId);
    const participants = [...roster.values()].sort((a, b) =>
      a.joined_at < b.joined_at ? -1 : a.joined_at > b.joined_at ? 1 : 0
    );
    return {
      mission_id: missionId,
      participants,
      active_drivers: participants.filter((p) => p.drive_intent === "active").length,
      queue: {
        pending: summary.pending,
        delivered: summary.delivered,
        failed: summary.failed,
        corrupt_lines: summary.corrupt_lines
      },
      failures: summary.failed_entries.map((e) => ({
        event_id: e.event.event_id,
        event_type: e.event.event_type,
        reason: e.last_error
      }))
    };
  }

  async replay(missionId: string, opts: { include_failed?: boolean } = {}): Promise<ReplayResult> {
    const session = await this.sessions.load(missionId);
    const client = this.clientFor(session);
    if (!client) throw new ConfigError("No ingestion endpoint configured; set MC_API_URL to replay");
    return replayPending({
      store: this.store,
      client,
      stream_id: missionId,
      include_failed: opts.include_failed,
      clock: this.clock,
      logger: this.logger,
      ...this.replaySettings
    });
  }

  private async requireParticipant(missionId: string): Promise<{ session: MissionSession; self: ParticipantSnapshot }> {
    const session = await this.sessions.ensureJoined(missionId);
    const roster = await buildRoster(this.store, missionId);
    const self = roster.get(session.participant_id);
    if (!self) throw new NotJoinedError(missionId);
    return { session, self };
  }

  private async findWarning(missionId: string, warningId: string): Promise<WarningRecord | null> {
    for (const entry of await this.store.readAll(missionId)) {
      const ev = entry.event;
      if (ev.event_type !== "PotentialStepCollisionDetected" && ev.event_type !== "ConcurrentDriverWarning") {
        continue;
      }
      if (ev.payload.warning_id !== warningId) continue;
      return {
        warning_id: warningId,
        participant_id: ev.payload.participant_id,
        focus: formatFocus(ev.payload.focus_target),
        conflicting_participant_ids: ev.payload.conflicting_participant_ids
      };
    }
    return null;
  }

  private clientFor(session: MissionSession | null): MissionApi | null {
    const apiUrl = session?.api_url || this.apiUrl;
    const token = session?.session_token || this.authToken;
    if (!this.api || !apiUrl) return null;
    return this.api({ api_url: apiUrl, token });
  }

  private async emitWithOwnId<T extends EventType>(
    session: MissionSession,
    build: (eventId: string) => EventDraft<T>
  ): Promise<RecordedEvent> {
    const id = newEventId();
    return this.emit(session, { ...build(id), event_id: id });
  }

  private async emit<T extends EventType>(session: MissionSession, draft: EventDraft<T>): Promise<RecordedEvent> {
    const event = await this.recorder.record(draft);
    return { event, delivery: await this.deliver(session, event) };
  }

  private async deliver(session: MissionSession, event: EventEnvelope): Promise<Delivery> {
    const client = this.clientFor(session);
    if (!client) return "queued";
    if (!(await client.health())) {
      this.logger.warn({ event_id: event.event_id }, "offline: event queued for replay");
      return "queued";
    }
    try {
      const res = await replayPending({
        store: this.store,
        client,
        stream_id: session.mission_id,
        through_event_id: event.event_id,
        origin_node: event.origin_node,
        max_retries: 0,
        clock: this.clock,
        logger: this.logger
      });
      if (res.accepted.includes(event.event_id)) return "delivered";
      if (res.rejected.includes(event.event_id)) return "rejected";
      return "queued";
    } catch (e) {
      if (e instanceof TransientDeliveryError || e instanceof ReplayAuthError) {
        this.logger.warn({ event_id: event.event_id, err: e.message }, "delivery deferred; event stays queued");
        return "queued";
      }
      throw e;
    }
  }
}

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { ConfigError, NotJoinedError, TransientDeliveryError, ValidationError } from "../src/core/errors.js";
import { MissionService } from "../src/collab/service.js";
import { SessionStore } from "../src/collab/session.js";
import type { BatchReply, JoinReply, MissionApi } from "../src/events/ingestion_client.js";
import { LamportClock } from "../src/events/lamport.js";
import { QueueStore } from "../src/events/queue_store.js";
import { ZERO_DELAY_POLICY } from "../src/events/replay.js";
import type { ParticipantRole } from "../src/schemas/common.js";
import type { EventEnvelope, EventType } from "../src/schemas/event.js";

async function mkTmpDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "mission-collab-"));
}

class FakeMissionApi implements MissionApi {
  online = false;
  /** Refuse events from participants whose join the service has not seen. */
  enforceRoster = false;
  readonly rejectTypes = new Set<EventType>();
  private readonly roster = new Set<string>();
  readonly sent: string[] = [];
  readonly joins: { mission_id: string; role: ParticipantRole }[] = [];

  constructor(private readonly participantId: string) {}

  async joinMission(missionId: string, role: ParticipantRole): Promise<JoinReply> {
    this.joins.push({ mission_id: missionId, role });
    return { participant_id: this.participantId, mission_run_id: "run-1" };
  }

  async submitBatch(events: EventEnvelope[]): Promise<BatchReply> {
    if (!this.online) throw new TransientDeliveryError("Request to /api/v1/events/batch/ failed: offline");
    this.sent.push(...events.map((e) => e.event_id));
    return {
      results: events.map((e) => {
        if (this.rejectTypes.has(e.event_type)) {
          return { event_id: e.event_id, status: "rejected" as const, reason: "schema mismatch" };
        }
        if (e.event_type === "ParticipantJoined") this.roster.add(e.payload.participant_id);
        else if (this.enforceRoster && !this.roster.has(e.payload.participant_id)) {
          return { event_id: e.event_id, status: "rejected" as const, reason: "participant not in mission roster" };
        }
        return { event_id: e.event_id, status: "accepted" as const };
      })
    };
  }

  async health(): Promise<boolean> {
    return this.online;
  }
}

type Participant = {
  id: string;
  api: FakeMissionApi;
  service: MissionService;
  sessions: SessionStore;
};

/** Participants share one queue directory, as they would after a sync, but keep separate homes and clocks. */
async function mission(): Promise<{ store: QueueStore; participant: (id: string) => Promise<Participant> }> {
  const root = await mkTmpDir();
  const store = new QueueStore({ queue_dir: path.join(root, "queues") });
  return {
    store,
    participant: async (id: string) => {
      const home = path.join(root, "homes", id);
      const api = new FakeMissionApi(id);
      const sessions = new SessionStore({ home_dir: home });
      const clock = await LamportClock.load({ node_id: `cli-${id}`, file_path: path.join(home, "clock.json") });
      const service = new MissionService({
        store,
        clock,
        sessions,
        api: () => api,
        api_url: "http://ingest.test",
        auth_token: "test-secret",
        replay: { policy: ZERO_DELAY_POLICY }
      });
      return { id, api, service, sessions };
    }
  };
}

async function eventTypes(store: QueueStore): Promise<EventType[]> {
  return (await store.readAll("m1")).map((e) => e.event.event_type);
}

describe("mission service", () => {
  test("join stores the session, activates the mission and queues the join while offline", async () => {
    const { store, participant } = await mission();
    const p1 = await participant("p1");

    const res = await p1.service.join("m1", "developer", { display_name: "Pat" });
    expect(res).toEqual({ participant_id: "p1", role: "developer", delivery: "queued" });
    expect(p1.api.joins).toEqual([{ mission_id: "m1", role: "developer" }]);
    expect(await p1.sessions.getActiveMission()).toBe("m1");
    expect((await p1.sessions.load("m1"))?.mission_run_id).toBe("run-1");

    const [joined] = await store.readAll("m1");
    expect(joined?.replay_status).toBe("pending");
    expect(joined?.event.correlation_id).toBe("run-1");
    expect(joined?.event.payload).toEqual({
      participant_id: "p1",
      mission_id: "m1",
      role: "developer",
      display_name: "Pat"
    });
  });

  test("join needs an endpoint and a valid role", async () => {
    const root = await mkTmpDir();
    const store = new QueueStore({ queue_dir: path.join(root, "queues") });
    const clock = await LamportClock.load({ node_id: "cli-x", file_path: path.join(root, "clock.json") });
    const offline = new MissionService({ store, clock, sessions: new SessionStore({ home_dir: root }) });
    await expect(offline.join("m1", "developer")).rejects.toBeInstanceOf(ConfigError);

    const { participant } = await mission();
    const p1 = await participant("p1");
    await expect(p1.service.join("m1", "pilot")).rejects.toBeInstanceOf(ValidationError);
  });

  test("commands before joining fail with a join hint", async () => {
    const { participant } = await mission();
    const p1 = await participant("p1");
    await expect(p1.service.setFocus("m1", "wp:WP01")).rejects.toBeInstanceOf(NotJoinedError);
    await expect(p1.service.comment("m1", "hello")).rejects.toThrow(
      "Not joined to mission m1. Run: mcollab mission:join m1 --role <role>"
    );
  });

  test("focus and drive changes to the current state emit nothing", async () => {
    const { store, participant } = await mission();
    const p1 = await participant("p1");
    await p1.service.join("m1", "developer");

    expect((await p1.service.setFocus("m1", "wp:WP01")).status).toBe("changed");
    expect(await p1.service.setFocus("m1", "wp:WP01")).toEqual({ status: "unchanged", focus: "wp:WP01" });
    expect((await p1.service.setDrive("m1", "active")).status).toBe("changed");
    expect(await p1.service.setDrive("m1", "active")).toEqual({ status: "unchanged", drive_intent: "active" });
    expect(await p1.service.setDrive("m1", "inactive")).toMatchObject({ status: "changed", drive_intent: "inactive" });

    expect(await eventTypes(store)).toEqual(["ParticipantJoined", "FocusChanged", "DriveIntentSet", "DriveIntentSet"]);
  });

  test("focus changes carry the previous target", async () => {
    const { store, participant } = await mission();
    const p1 = await participant("p1");
    await p1.service.join("m1", "developer");
    await p1.service.setFocus("m1", "wp:WP01");
    const res = await p1.service.setFocus("m1", "step:S2");
    expect(res).toMatchObject({ status: "changed", focus: "step:S2", previous: "wp:WP01" });

    const last = (await store.readAll("m1")).at(-1)?.event;
    expect(last?.payload).toEqual({
      participant_id: "p1",
      mission_id: "m1",
      focus_target: { target_type: "step", target_id: "S2" },
      previous_focus_target: { target_type: "work_package", target_id: "WP01" }
    });
  });

  test("invalid focus and drive values are refused before anything is written", async () => {
    const { store, participant } = await mission();
    const p1 = await participant("p1");
    await p1.service.join("m1", "developer");
    await expect(p1.service.setFocus("m1", "task:7")).rejects.toBeInstanceOf(ValidationError);
    await expect(p1.service.setDrive("m1", "sometimes")).rejects.toThrow(
      "Invalid drive state: sometimes. Must be 'active' or 'inactive'"
    );
    expect(await eventTypes(store)).toEqual(["ParticipantJoined"]);
  });

  describe("collisions", () => {
    async function contested(): Promise<{ store: QueueStore; p1: Participant; p2: Participant }> {
      const m = await mission();
      const p1 = await m.participant("p1");
      const p2 = await m.participant("p2");
      await p1.service.join("m1", "developer");
      await p2.service.join("m1", "developer");
      await p1.service.setFocus("m1", "wp:WP01");
      await p1.service.setDrive("m1", "active");
      await p2.service.setFocus("m1", "wp:WP01");
      return { store: m.store, p1, p2 };
    }

    test("going active on a driven focus records a warning and leaves the drive unchanged", async () => {
      const { store, p2 } = await contested();
      const res = await p2.service.setDrive("m1", "active");
      if (res.status !== "collision") throw new Error(`expected a collision, got ${res.status}`);
      expect(res.warning.severity).toBe("medium");
      expect(res.warning.conflicting_participants.map((p) => p.participant_id)).toEqual(["p1"]);

      const report = await p2.service.status("m1");
      expect(report.participants.find((p) => p.participant_id === "p2")?.drive_intent).toBe("inactive");
      expect((await eventTypes(store)).at(-1)).toBe("PotentialStepCollisionDetected");
    });

    test("continue acknowledges and then goes active", async () => {
      const { store, p2 } = await contested();
      const res = await p2.service.setDrive("m1", "active");
      if (res.status !== "collision") throw new Error("expected a collision");

      const ack = await p2.service.acknowledge("m1", res.warning.warning_id, "continue");
      expect(ack.acknowledgement.event.causation_id).toBe(res.warning.warning_id);
      expect(ack.drive).toMatchObject({ status: "changed", drive_intent: "active" });
      expect((await eventTypes(store)).slice(-3)).toEqual([
        "PotentialStepCollisionDetected",
        "WarningAcknowledged",
        "DriveIntentSet"
      ]);
      const report = await p2.service.status("m1");
      expect(report.active_drivers).toBe(2);
    });

    test("hold acknowledges and stays inactive", async () => {
      const { store, p2 } = await contested();
      const res = await p2.service.setDrive("m1", "active");
      if (res.status !== "collision") throw new Error("expected a collision");

      const ack = await p2.service.acknowledge("m1", res.warning.warning_id, "hold");
      expect(ack.drive).toEqual({ status: "unchanged", drive_intent: "inactive" });
      expect((await eventTypes(store)).at(-1)).toBe("WarningAcknowledged");
    });

    test("reassign posts a comment mentioning the current drivers", async () => {
      const { store, p2 } = await contested();
      const res = await p2.service.setDrive("m1", "active");
      if (res.status !== "collision") throw new Error("expected a collision");

      const ack = await p2.service.acknowledge("m1", res.warning.warning_id, "reassign");
      const comment = ack.comment?.event;
      if (comment?.event_type !== "CommentPosted") throw new Error("expected a comment");
      expect(comment.causation_id).toBe(res.warning.warning_id);
      expect(comment.payload.content).toBe("Suggest reassigning wp:WP01: @p1 already driving");
      expect(comment.payload.mentions).toEqual(["p1"]);
      expect(comment.payload.comment_id).toBe(comment.event_id);
      expect((await eventTypes(store)).slice(-2)).toEqual(["WarningAcknowledged", "CommentPosted"]);
    });

    test("defer only records the acknowledgement", async () => {
      const { store, p2 } = await contested();
      const res = await p2.service.setDrive("m1", "active");
      if (res.status !== "collision") throw new Error("expected a collision");

      const ack = await p2.service.acknowledge("m1", res.warning.warning_id, "defer");
      expect(ack.drive).toBeUndefined();
      expect(ack.comment).toBeUndefined();
      expect((await eventTypes(store)).slice(-2)).toEqual(["PotentialStepCollisionDetected", "WarningAcknowledged"]);
    });

    test("an invalid action, an unknown warning or someone else's warning emit nothing", async () => {
      const { store, p1, p2 } = await contested();
      const res = await p2.service.setDrive("m1", "active");
      if (res.status !== "collision") throw new Error("expected a collision");
      const before = (await store.readAll("m1")).length;

      await expect(p2.service.acknowledge("m1", res.warning.warning_id, "maybe")).rejects.toThrow(
        "Invalid acknowledgement: maybe. Must be one of continue, hold, reassign, defer"
      );
      await expect(p2.service.acknowledge("m1", "01ARZ3NDEKTSV4RRFFQ69G5FAV", "continue")).rejects.toThrow(
        "Unknown collision warning: 01ARZ3NDEKTSV4RRFFQ69G5FAV"
      );
      await expect(p1.service.acknowledge("m1", res.warning.warning_id, "continue")).rejects.toBeInstanceOf(
        ValidationError
      );
      expect((await store.readAll("m1")).length).toBe(before);
    });
  });

  test("comments are trimmed, truncated at 500 characters and refused when empty", async () => {
    const { store, participant } = await mission();
    const p1 = await participant("p1");
    await p1.service.join("m1", "developer");

    const short = await p1.service.comment("m1", "  looks good  ");
    expect(short.truncated).toBe(false);
    const long = await p1.service.comment("m1", "y".repeat(600), { reply_to: short.comment_id });
    expect(long.truncated).toBe(true);
    await expect(p1.service.comment("m1", "   ")).rejects.toThrow("Comment cannot be empty");

    const comments = (await store.readAll("m1")).flatMap((e) => (e.event.event_type === "CommentPosted" ? [e.event] : []));
    expect(comments.map((c) => c.payload.content.length)).toEqual([10, 500]);
    expect(comments[0]?.payload.content).toBe("looks good");
    expect(comments[1]?.payload.reply_to).toBe(short.comment_id);
    expect(comments[1]?.causation_id).toBe(short.comment_id);
  });

  test("decisions are filed under the current focus", async () => {
    const { store, participant } = await mission();
    const p1 = await participant("p1");
    await p1.service.join("m1", "developer");

    const general = await p1.service.decide("m1", "ship on friday");
    expect(general.topic).toBe("mission");
    await p1.service.setFocus("m1", "step:S4");
    const scoped = await p1.service.decide("m1", "use the v2 parser", { rationale: "fewer edge cases" });
    expect(scoped.topic).toBe("step:S4");

    const last = (await store.readAll("m1")).at(-1)?.event;
    expect(last?.payload).toEqual({
      participant_id: "p1",
      mission_id: "m1",
      decision_id: scoped.decision_id,
      topic: "step:S4",
      chosen_option: "use the v2 parser",
      rationale: "fewer edge cases",
      referenced_warning_id: null
    });
  });

  test("online events are delivered immediately", async () => {
    const { store, participant } = await mission();
    const p1 = await participant("p1");
    p1.api.online = true;

    const res = await p1.service.join("m1", "developer");
    expect(res.delivery).toBe("delivered");
    const [joined] = await store.readAll("m1");
    expect(joined?.replay_status).toBe("delivered");
    expect(p1.api.sent).toEqual([joined?.event.event_id]);
  });

  test("rejected events show up in status with their reason", async () => {
    const { participant } = await mission();
    const p1 = await participant("p1");
    p1.api.online = true;
    p1.api.rejectTypes.add("CommentPosted");
    await p1.service.join("m1", "developer");

    const res = await p1.service.comment("m1", "hello");
    expect(res.delivery).toBe("rejected");
    const report = await p1.service.status("m1");
    expect(report.queue).toEqual({ pending: 0, delivered: 1, failed: 1, corrupt_lines: 0 });
    expect(report.failures).toEqual([{ event_id: res.comment_id, event_type: "CommentPosted", reason: "schema mismatch" }]);
  });

  test("events queued offline are sent by replay once the service is back", async () => {
    const { store, participant } = await mission();
    const p1 = await participant("p1");
    await p1.service.join("m1", "developer");
    await p1.service.setFocus("m1", "wp:WP01");
    expect((await p1.service.status("m1")).queue.pending).toBe(2);

    p1.api.online = true;
    const res = await p1.service.replay("m1");
    expect(res.accepted).toHaveLength(2);
    expect((await store.readAll("m1")).map((e) => e.replay_status)).toEqual(["delivered", "delivered"]);
  });

  test("delivering a new event first sends this node's earlier queued events in order", async () => {
    const { store, participant } = await mission();
    const p1 = await participant("p1");
    const p2 = await participant("p2");
    p1.api.enforceRoster = true;
    await p2.service.join("m1", "reviewer");
    await p1.service.join("m1", "developer");

    p1.api.online = true;
    expect(await p1.service.setFocus("m1", "wp:WP01")).toMatchObject({ status: "changed", delivery: "delivered" });

    const entries = await store.readAll("m1");
    expect(entries.map((e) => [e.event.event_type, e.event.payload.participant_id, e.replay_status])).toEqual([
      ["ParticipantJoined", "p2", "pending"],
      ["ParticipantJoined", "p1", "delivered"],
      ["FocusChanged", "p1", "delivered"]
    ]);
    expect(p1.api.sent).toEqual([entries[1]?.event.event_id, entries[2]?.event.event_id]);
  });

  test("status lists participants in join order", async () => {
    const { participant } = await mission();
    const p1 = await participant("p1");
    const p2 = await participant("p2");
    await p1.service.join("m1", "developer");
    await p2.service.join("m1", "reviewer");
    await p2.service.setFocus("m1", "wp:WP03");

    const report = await p1.service.status("m1");
    expect(report.participants.map((p) => [p.participant_id, p.role, p.focus])).toEqual([
      ["p1", "developer", null],
      ["p2", "reviewer", "wp:WP03"]
    ]);
    expect(report.active_drivers).toBe(0);
  });
});

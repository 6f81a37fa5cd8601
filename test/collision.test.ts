import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { detectCollision, type CollisionContext } from "../src/collab/collision.js";
import { LamportClock } from "../src/events/lamport.js";
import { QueueStore } from "../src/events/queue_store.js";
import { EventRecorder } from "../src/events/recorder.js";

async function mkTmpDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "mission-collab-"));
}

async function setup(): Promise<{ store: QueueStore; recorder: EventRecorder; ctx: CollisionContext }> {
  const dir = await mkTmpDir();
  const store = new QueueStore({ queue_dir: path.join(dir, "queues") });
  const clock = await LamportClock.load({ node_id: "node-a", file_path: path.join(dir, "clock.json") });
  const recorder = new EventRecorder(store, clock);
  return { store, recorder, ctx: { store, emit: (args) => recorder.record(args) } };
}

async function join(recorder: EventRecorder, participantId: string): Promise<void> {
  await recorder.record({
    event_type: "ParticipantJoined",
    mission_id: "m1",
    payload: { participant_id: participantId, mission_id: "m1", role: "developer" }
  });
}

async function focusAndDrive(
  recorder: EventRecorder,
  participantId: string,
  focus: string,
  intent: "active" | "inactive" = "active"
): Promise<void> {
  const [kind, id] = focus.split(":");
  await recorder.record({
    event_type: "FocusChanged",
    mission_id: "m1",
    payload: {
      participant_id: participantId,
      mission_id: "m1",
      focus_target: { target_type: kind === "wp" ? "work_package" : "step", target_id: id ?? "" },
      previous_focus_target: null
    }
  });
  await recorder.record({
    event_type: "DriveIntentSet",
    mission_id: "m1",
    payload: { participant_id: participantId, mission_id: "m1", intent }
  });
}

describe("collision detection", () => {
  test("no warning when nobody else drives the focus", async () => {
    const { store, recorder, ctx } = await setup();
    await join(recorder, "p1");
    await join(recorder, "p2");
    await focusAndDrive(recorder, "p2", "wp:WP02");
    await focusAndDrive(recorder, "p1", "wp:WP01", "inactive");
    const before = (await store.readAll("m1")).length;

    expect(await detectCollision(ctx, { stream_id: "m1", participant_id: "p1", focus: "wp:WP01" })).toBeNull();
    expect((await store.readAll("m1")).length).toBe(before);
  });

  test("an inactive participant on the same focus is not a collision", async () => {
    const { recorder, ctx } = await setup();
    await join(recorder, "p1");
    await join(recorder, "p2");
    await focusAndDrive(recorder, "p2", "wp:WP01", "inactive");
    expect(await detectCollision(ctx, { stream_id: "m1", participant_id: "p1", focus: "wp:WP01" })).toBeNull();
  });

  test("one other active driver raises a medium warning", async () => {
    const { store, recorder, ctx } = await setup();
    await join(recorder, "p1");
    await join(recorder, "p2");
    await focusAndDrive(recorder, "p1", "wp:WP01");

    const warning = await detectCollision(ctx, { stream_id: "m1", participant_id: "p2", focus: "wp:WP01" });
    expect(warning?.type).toBe("PotentialStepCollisionDetected");
    expect(warning?.severity).toBe("medium");
    expect(warning?.conflicting_participants.map((p) => p.participant_id)).toEqual(["p1"]);

    const last = (await store.readAll("m1")).at(-1)?.event;
    expect(last?.event_type).toBe("PotentialStepCollisionDetected");
    expect(last?.event_id).toBe(warning?.warning_id);
    expect(last?.payload).toEqual({
      participant_id: "p2",
      mission_id: "m1",
      warning_id: warning?.warning_id,
      focus_target: { target_type: "work_package", target_id: "WP01" },
      conflicting_participant_ids: ["p1"],
      severity: "medium"
    });
  });

  test("two or more other active drivers raise a high warning", async () => {
    const { store, recorder, ctx } = await setup();
    for (const id of ["p1", "p2", "p3"]) await join(recorder, id);
    await focusAndDrive(recorder, "p1", "step:S1");
    await focusAndDrive(recorder, "p2", "step:S1");

    const warning = await detectCollision(ctx, { stream_id: "m1", participant_id: "p3", focus: "step:S1" });
    expect(warning?.type).toBe("ConcurrentDriverWarning");
    expect(warning?.severity).toBe("high");
    expect(warning?.conflicting_participants.map((p) => p.participant_id)).toEqual(["p1", "p2"]);
    expect((await store.readAll("m1")).at(-1)?.event.event_type).toBe("ConcurrentDriverWarning");
  });

  test("the requester never collides with itself", async () => {
    const { recorder, ctx } = await setup();
    await join(recorder, "p1");
    await focusAndDrive(recorder, "p1", "wp:WP01");
    expect(await detectCollision(ctx, { stream_id: "m1", participant_id: "p1", focus: "wp:WP01" })).toBeNull();
  });

  test("a participant who has not joined yet is invisible, and no focus means no check", async () => {
    const { recorder, ctx } = await setup();
    await join(recorder, "p1");
    await focusAndDrive(recorder, "p1", "wp:WP01");
    expect(await detectCollision(ctx, { stream_id: "m1", participant_id: "stranger", focus: "wp:WP01" })).toBeNull();
    expect(await detectCollision(ctx, { stream_id: "m1", participant_id: "p1", focus: null })).toBeNull();
  });
});

#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import readline from "node:readline/promises";
import { loadConfig, storagePaths } from "./config.js";
import { isUserFacingError } from "./core/errors.js";
import { componentLogger, createLogger } from "./core/logger.js";
import { MissionService, type DriveResult } from "./collab/service.js";
import { deliveryNote, renderCollision, renderStatus } from "./collab/render.js";
import { SessionStore } from "./collab/session.js";
import { httpApiFactory } from "./events/ingestion_client.js";
import { LamportClock } from "./events/lamport.js";
import { QueueStore } from "./events/queue_store.js";
import { describeReplayError, exponentialBackoff } from "./events/replay.js";
import { AcknowledgementAction } from "./schemas/event.js";

function reportError(e: unknown): void {
  const err = e instanceof Error ? e : new Error(String(e));
  if (isUserFacingError(err)) {
    process.stderr.write(`ERROR: ${err.message}\n`);
    return;
  }
  process.stderr.write(`ERROR: ${describeReplayError(err)}\n`);
  if (process.env.MC_DEBUG === "1" && err.stack) {
    process.stderr.write(`${err.stack}\n`);
  }
}

async function runAction(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (e) {
    reportError(e);
    process.exitCode = 1;
  }
}

type Context = {
  sessions: SessionStore;
  service: MissionService;
};

async function openContext(): Promise<Context> {
  const config = await loadConfig();
  const logger = createLogger({ level: config.log_level });
  const paths = storagePaths(config);
  const store = new QueueStore({ queue_dir: paths.queue_dir, logger: componentLogger(logger, "queue") });
  const clock = await LamportClock.load({
    node_id: config.node_id,
    file_path: paths.clock_file,
    logger: componentLogger(logger, "clock")
  });
  const sessions = new SessionStore({ home_dir: config.home_dir, logger: componentLogger(logger, "session") });
  const service = new MissionService({
    store,
    clock,
    sessions,
    api: httpApiFactory({
      request_timeout_ms: config.request_timeout_ms,
      health_timeout_ms: config.health_timeout_ms
    }),
    api_url: config.api_url,
    auth_token: config.auth_token,
    replay: {
      max_batch_size: config.replay.max_batch_size,
      max_retries: config.replay.max_retries,
      policy: exponentialBackoff({ base_ms: config.replay.backoff_base_ms })
    },
    logger: componentLogger(logger, "mission")
  });
  return { sessions, service };
}

async function promptAcknowledgement(): Promise<AcknowledgementAction | null> {
  if (!process.stdin.isTTY) return null;
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  try {
    for (;;) {
      const answer = (await rl.question("Acknowledge [continue/hold/reassign/defer]: ")).trim().toLowerCase();
      const parsed = AcknowledgementAction.safeParse(answer);
      if (parsed.success) return parsed.data;
      process.stderr.write(`Expected one of ${AcknowledgementAction.options.join(", ")}\n`);
    }
  } finally {
    rl.close();
  }
}

function printDrive(res: DriveResult): void {
  if (res.status === "unchanged") {
    process.stdout.write(`Drive already ${res.drive_intent}\n`);
  } else if (res.status === "changed") {
    process.stdout.write(`Drive set to ${res.drive_intent} (${deliveryNote(res.delivery)})\n`);
  } else {
    process.stdout.write(renderCollision(res.warning));
  }
}

const program = new Command();

program.name("mcollab").description("Offline-first mission collaboration CLI").version("0.1.0");

program
  .command("mission:join")
  .description("Join a mission as a participant and make it the active mission")
  .argument("<mission_id>", "Mission id")
  .option("--role <role>", "Role (developer|reviewer|observer|stakeholder)", "")
  .option("--display-name <name>", "Display name shown to other participants", undefined)
  .action(async (missionId: string, opts: { role: string; displayName?: string }) => {
    await runAction(async () => {
      const { service } = await openContext();
      const res = await service.join(missionId, opts.role, { display_name: opts.displayName });
      process.stdout.write(`Joined ${missionId} as ${res.participant_id} (${res.role}); ${deliveryNote(res.delivery)}\n`);
    });
  });

program
  .command("mission:focus")
  .description("Set what you are working on: wp:<id>, step:<id>, or none")
  .argument("<target>", "Focus target")
  .option("--mission <mission_id>", "Mission id (defaults to the active mission)", undefined)
  .action(async (target: string, opts: { mission?: string }) => {
    await runAction(async () => {
      const { service, sessions } = await openContext();
      const missionId = await sessions.resolveMissionId(opts.mission);
      const res = await service.setFocus(missionId, target);
      if (res.status === "unchanged") {
        process.stdout.write(`Focus already ${res.focus ?? "none"}\n`);
        return;
      }
      process.stdout.write(`Focus set to ${res.focus ?? "none"} (${deliveryNote(res.delivery)})\n`);
    });
  });

program
  .command("mission:drive")
  .description("Declare whether you are actively driving your focus (active|inactive)")
  .argument("<state>", "active or inactive")
  .option("--mission <mission_id>", "Mission id (defaults to the active mission)", undefined)
  .option("--ack <action>", "Answer a collision warning without prompting (continue|hold|reassign|defer)", undefined)
  .action(async (state: string, opts: { mission?: string; ack?: string }) => {
    await runAction(async () => {
      const { service, sessions } = await openContext();
      const missionId = await sessions.resolveMissionId(opts.mission);
      const res = await service.setDrive(missionId, state);
      printDrive(res);
      if (res.status !== "collision") return;

      const action = opts.ack ?? (await promptAcknowledgement());
      if (action === null) {
        process.stderr.write(
          `Drive not changed. Re-run with --ack <action> or: mcollab mission:ack ${res.warning.warning_id} <action>\n`
        );
        process.exitCode = 2;
        return;
      }
      const ack = await service.acknowledge(missionId, res.warning.warning_id, action);
      process.stdout.write(`Acknowledged ${res.warning.warning_id}: ${ack.action}\n`);
      if (ack.drive) printDrive(ack.drive);
      if (ack.comment) process.stdout.write(`Posted comment ${ack.comment.event.event_id}\n`);
    });
  });

program
  .command("mission:ack")
  .description("Acknowledge a collision warning (continue|hold|reassign|defer)")
  .argument("<warning_id>", "Warning id printed by mission:drive")
  .argument("<action>", "continue, hold, reassign or defer")
  .option("--mission <mission_id>", "Mission id (defaults to the active mission)", undefined)
  .action(async (warningId: string, action: string, opts: { mission?: string }) => {
    await runAction(async () => {
      const { service, sessions } = await openContext();
      const missionId = await sessions.resolveMissionId(opts.mission);
      const ack = await service.acknowledge(missionId, warningId, action);
      process.stdout.write(`Acknowledged ${warningId}: ${ack.action} (${deliveryNote(ack.acknowledgement.delivery)})\n`);
      if (ack.drive) printDrive(ack.drive);
      if (ack.comment) process.stdout.write(`Posted comment ${ack.comment.event.event_id}\n`);
    });
  });

program
  .command("mission:status")
  .description("Show participants, drivers and the local queue for a mission")
  .option("--mission <mission_id>", "Mission id (defaults to the active mission)", undefined)
  .option("--verbose", "Include join and activity timestamps", false)
  .option("--json", "Print the report as JSON", false)
  .action(async (opts: { mission?: string; verbose: boolean; json: boolean }) => {
    await runAction(async () => {
      const { service, sessions } = await openContext();
      const missionId = await sessions.resolveMissionId(opts.mission);
      const report = await service.status(missionId);
      if (opts.json) {
        process.stdout.write(JSON.stringify(report, null, 2) + "\n");
        return;
      }
      process.stdout.write(renderStatus(report, { verbose: opts.verbose }));
    });
  });

program
  .command("mission:comment")
  .description("Post a comment to the mission")
  .argument("<text>", "Comment text (longer than 500 characters is truncated)")
  .option("--mission <mission_id>", "Mission id (defaults to the active mission)", undefined)
  .option("--reply-to <comment_id>", "Comment being answered", undefined)
  .action(async (text: string, opts: { mission?: string; replyTo?: string }) => {
    await runAction(async () => {
      const { service, sessions } = await openContext();
      const missionId = await sessions.resolveMissionId(opts.mission);
      const res = await service.comment(missionId, text, { reply_to: opts.replyTo });
      if (res.truncated) process.stderr.write("Comment truncated to 500 characters\n");
      process.stdout.write(`${res.comment_id} (${deliveryNote(res.delivery)})\n`);
    });
  });

program
  .command("mission:decide")
  .description("Record a decision for your current focus")
  .argument("<text>", "The chosen option")
  .option("--mission <mission_id>", "Mission id (defaults to the active mission)", undefined)
  .option("--rationale <text>", "Why this option was chosen", undefined)
  .option("--warning <warning_id>", "Collision warning this decision resolves", undefined)
  .action(async (text: string, opts: { mission?: string; rationale?: string; warning?: string }) => {
    await runAction(async () => {
      const { service, sessions } = await openContext();
      const missionId = await sessions.resolveMissionId(opts.mission);
      const res = await service.decide(missionId, text, {
        rationale: opts.rationale,
        referenced_warning_id: opts.warning
      });
      process.stdout.write(`${res.decision_id} on ${res.topic} (${deliveryNote(res.delivery)})\n`);
    });
  });

program
  .command("mission:replay")
  .description("Send queued events to the ingestion service")
  .option("--mission <mission_id>", "Mission id (defaults to the active mission)", undefined)
  .option("--include-failed", "Also resend events previously rejected", false)
  .action(async (opts: { mission?: string; includeFailed: boolean }) => {
    await runAction(async () => {
      const { service, sessions } = await openContext();
      const missionId = await sessions.resolveMissionId(opts.mission);
      const res = await service.replay(missionId, { include_failed: opts.includeFailed });
      process.stdout.write(
        `Replayed ${missionId}: ${res.accepted.length} accepted, ${res.rejected.length} rejected, ${res.deferred.length} still queued\n`
      );
      if (res.rejected.length > 0 || res.deferred.length > 0) process.exitCode = 2;
    });
  });

await program.parseAsync(process.argv);

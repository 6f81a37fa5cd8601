import fs from "node:fs/promises";
import path from "node:path";
import { LocalIoError, ValidationError, errorMessage } from "../core/errors.js";
import { nowIso } from "../core/time.js";
import { silentLogger, type Logger } from "../core/logger.js";
import {
  EventEnvelope,
  missionAggregateId,
  type QueueEntry,
  type ReplayStatus
} from "../schemas/event.js";
import { assertMissionId } from "../schemas/common.js";
import { appendLinesDurable, ensureDir, sleep, withFileLock, writeFileAtomic } from "../store/fs.js";
import { parseQueueLine, serializeQueueEntry } from "./queue_record.js";

export type StatusUpdate = {
  event_id: string;
  replay_status: ReplayStatus;
  /** Bump retry_count and stamp last_retry_at. */
  count_retry?: boolean;
  last_error?: string | null;
};

export type QueueSummary = {
  total: number;
  pending: number;
  delivered: number;
  failed: number;
  failed_entries: QueueEntry[];
  corrupt_lines: number;
};

export type QueueStoreArgs = {
  /** Directory holding one `<stream_id>.jsonl` file per mission. */
  queue_dir: string;
  logger?: Logger;
};

type ScannedLine =
  | { ok: true; line: string; entry: QueueEntry }
  | { ok: false; line: string; line_number: number; error: string };

const APPEND_ATTEMPTS = 2;
const APPEND_RETRY_DELAY_MS = 100;

function isPermissionError(e: unknown): boolean {
  const code = (e as NodeJS.ErrnoException).code;
  return code === "EACCES" || code === "EPERM" || code === "EROFS";
}

/**
 * Durable append-only event log, one JSONL file per stream. Envelopes are
 * never removed; only their replay metadata is rewritten.
 */
export class QueueStore {
  readonly queue_dir: string;
  private readonly logger: Logger;

  constructor(args: QueueStoreArgs) {
    this.queue_dir = args.queue_dir;
    this.logger = args.logger ?? silentLogger();
  }

  queuePath(streamId: string): string {
    return path.join(this.queue_dir, `${assertMissionId(streamId)}.jsonl`);
  }

  async append(streamId: string, envelope: EventEnvelope, status: ReplayStatus = "pending"): Promise<void> {
    await this.appendWith(streamId, async () => envelope, status);
  }

  /**
   * Runs `build` while holding the queue lock and appends its result. Clock
   * values drawn inside `build` therefore land in the log in clock order even
   * when several processes write as the same node.
   */
  async appendWith(
    streamId: string,
    build: () => Promise<EventEnvelope>,
    status: ReplayStatus = "pending"
  ): Promise<EventEnvelope> {
    const queuePath = this.queuePath(streamId);
    await this.prepareDir();
    return withFileLock(`${queuePath}.lock`, async () => {
      const parsed = EventEnvelope.safeParse(await build());
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ValidationError(
          `Refusing to append malformed event: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`
        );
      }
      const envelope = parsed.data;
      if (envelope.aggregate_id !== missionAggregateId(streamId)) {
        throw new ValidationError(
          `Event ${envelope.event_id} belongs to ${envelope.aggregate_id}, not ${missionAggregateId(streamId)}`
        );
      }
      const line = `${serializeQueueEntry({
        event: envelope,
        replay_status: status,
        retry_count: 0,
        last_retry_at: null,
        last_error: null
      })}\n`;
      await this.appendLineWithRetry(queuePath, line, envelope.event_id);
      await this.restrictPermissions(queuePath);
      return envelope;
    });
  }

  async readAll(streamId: string): Promise<QueueEntry[]> {
    return this.entriesOf(streamId, await this.scan(streamId));
  }

  private entriesOf(streamId: string, scanned: ScannedLine[]): QueueEntry[] {
    const aggregateId = missionAggregateId(streamId);
    const out: QueueEntry[] = [];
    for (const s of scanned) {
      if (!s.ok) {
        this.logger.warn(
          { stream_id: streamId, line_number: s.line_number, err: s.error },
          "skipping corrupted queue line"
        );
        continue;
      }
      // Guards against a file copied in from another mission.
      if (s.entry.event.aggregate_id !== aggregateId) {
        this.logger.debug({ stream_id: streamId, event_id: s.entry.event.event_id }, "skipping foreign event");
        continue;
      }
      out.push(s.entry);
    }
    return out;
  }

  async readPending(streamId: string): Promise<QueueEntry[]> {
    return (await this.readAll(streamId)).filter((e) => e.replay_status === "pending");
  }

  async readReplayable(streamId: string, opts: { include_failed?: boolean } = {}): Promise<QueueEntry[]> {
    return (await this.readAll(streamId)).filter(
      (e) => e.replay_status === "pending" || (opts.include_failed === true && e.replay_status === "failed")
    );
  }

  /**
   * Rewrites the log with new replay metadata. Lines that fail to parse are
   * carried over verbatim; unknown event ids are ignored.
   */
  async updateStatus(streamId: string, updates: StatusUpdate[]): Promise<number> {
    if (updates.length === 0) return 0;
    const queuePath = this.queuePath(streamId);
    const byId = new Map(updates.map((u) => [u.event_id, u]));
    return withFileLock(`${queuePath}.lock`, async () => {
      const scanned = await this.scan(streamId);
      if (scanned.length === 0) return 0;
      const at = nowIso();
      let changed = 0;
      const lines = scanned.map((s) => {
        if (!s.ok) return s.line;
        const u = byId.get(s.entry.event.event_id);
        if (!u) return s.line;
        changed += 1;
        const next: QueueEntry = {
          ...s.entry,
          replay_status: u.replay_status,
          retry_count: u.count_retry ? s.entry.retry_count + 1 : s.entry.retry_count,
          last_retry_at: u.count_retry ? at : s.entry.last_retry_at,
          last_error: u.last_error === undefined ? s.entry.last_error : u.last_error
        };
        return serializeQueueEntry(next);
      });
      try {
        await writeFileAtomic(queuePath, `${lines.join("\n")}\n`, { mode: 0o600 });
      } catch (e) {
        throw new LocalIoError(`Failed to rewrite queue ${queuePath}: ${errorMessage(e)}`, queuePath, {
          cause: e
        });
      }
      return changed;
    });
  }

  async summarize(streamId: string): Promise<QueueSummary> {
    const scanned = await this.scan(streamId);
    const entries = this.entriesOf(streamId, scanned);
    const failed = entries.filter((e) => e.replay_status === "failed");
    return {
      total: entries.length,
      pending: entries.filter((e) => e.replay_status === "pending").length,
      delivered: entries.filter((e) => e.replay_status === "delivered").length,
      failed: failed.length,
      failed_entries: failed,
      corrupt_lines: scanned.filter((s) => !s.ok).length
    };
  }

  private async scan(streamId: string): Promise<ScannedLine[]> {
    const queuePath = this.queuePath(streamId);
    let s: string;
    try {
      s = await fs.readFile(queuePath, { encoding: "utf8" });
    } catch (e) {
      if ((e as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw new LocalIoError(`Failed to read queue ${queuePath}: ${errorMessage(e)}`, queuePath, { cause: e });
    }
    const out: ScannedLine[] = [];
    const lines = s.split("\n");
    for (let i = 0; i < lines.length; i += 1) {
      const line = lines[i]?.trim() ?? "";
      if (!line) continue;
      try {
        out.push({ ok: true, line, entry: parseQueueLine(line) });
      } catch (e) {
        out.push({ ok: false, line, line_number: i + 1, error: errorMessage(e) });
      }
    }
    return out;
  }

  private async prepareDir(): Promise<void> {
    try {
      await ensureDir(this.queue_dir, 0o700);
    } catch (e) {
      throw new LocalIoError(
        `Cannot create queue directory ${this.queue_dir}: ${errorMessage(e)}`,
        this.queue_dir,
        { cause: e }
      );
    }
  }

  private async appendLineWithRetry(queuePath: string, line: string, eventId: string): Promise<void> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        await appendLinesDurable(queuePath, line, { mode: 0o600 });
        return;
      } catch (e) {
        if (isPermissionError(e)) {
          throw new LocalIoError(`Cannot write to queue file ${queuePath}: ${errorMessage(e)}`, queuePath, {
            cause: e
          });
        }
        if (attempt >= APPEND_ATTEMPTS) {
          throw new LocalIoError(
            `Failed to append event ${eventId} after ${APPEND_ATTEMPTS} attempts: ${errorMessage(e)}`,
            queuePath,
            { cause: e }
          );
        }
        this.logger.warn({ event_id: eventId, err: errorMessage(e) }, "queue append failed; retrying");
        await sleep(APPEND_RETRY_DELAY_MS);
      }
    }
  }

  private async restrictPermissions(queuePath: string): Promise<void> {
    for (const [target, mode] of [
      [queuePath, 0o600],
      [this.queue_dir, 0o700]
    ] as const) {
      try {
        await fs.chmod(target, mode);
      } catch (e) {
        this.logger.warn({ file_path: target, err: errorMessage(e) }, "could not restrict queue permissions");
      }
    }
  }
}

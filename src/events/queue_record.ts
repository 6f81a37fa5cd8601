import { z } from "zod";
import { IsoDateTime } from "../schemas/common.js";
import { EventEnvelope, ReplayStatus, type QueueEntry } from "../schemas/event.js";

// Metadata written before last_error existed, or by hand, still loads.
const StoredReplayMetadata = z.object({
  replay_status: ReplayStatus.default("pending"),
  retry_count: z.number().int().nonnegative().default(0),
  last_retry_at: IsoDateTime.nullable().default(null),
  last_error: z.string().nullable().default(null)
});

const RecordObject = z.record(z.string(), z.unknown());

export type QueueRecord = EventEnvelope & {
  replay_status: QueueEntry["replay_status"];
  retry_count: number;
  last_retry_at: string | null;
  last_error: string | null;
};

/** One queue line: the envelope fields followed by the local replay metadata. */
export function toQueueRecord(entry: QueueEntry): QueueRecord {
  return {
    ...entry.event,
    replay_status: entry.replay_status,
    retry_count: entry.retry_count,
    last_retry_at: entry.last_retry_at,
    last_error: entry.last_error
  };
}

export function serializeQueueEntry(entry: QueueEntry): string {
  return JSON.stringify(toQueueRecord(entry));
}

/** Throws a ZodError when the record is not a valid entry. */
export function parseQueueRecord(raw: unknown): QueueEntry {
  const { replay_status, retry_count, last_retry_at, last_error, ...envelope } = RecordObject.parse(raw);
  const meta = StoredReplayMetadata.parse({ replay_status, retry_count, last_retry_at, last_error });
  return { event: EventEnvelope.parse(envelope), ...meta };
}

export function parseQueueLine(line: string): QueueEntry {
  return parseQueueRecord(JSON.parse(line));
}

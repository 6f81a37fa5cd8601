import { ReplayAuthError, TransientDeliveryError, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { QueueEntry } from "../schemas/event.js";
import { sleep } from "../store/fs.js";
import { MAX_BATCH_SIZE, type BatchReply, type IngestionClient } from "./ingestion_client.js";
import type { LamportClock } from "./lamport.js";
import type { QueueStore, StatusUpdate } from "./queue_store.js";

export type RetryPolicy = {
  /** Delay before retry number `retry` (1-based). */
  delayMs: (retry: number) => number;
  sleep: (ms: number) => Promise<void>;
};

export function exponentialBackoff(opts: { base_ms?: number } = {}): RetryPolicy {
  const base = opts.base_ms ?? 1000;
  return {
    delayMs: (retry) => base * 2 ** (retry - 1),
    sleep
  };
}

export const ZERO_DELAY_POLICY: RetryPolicy = {
  delayMs: () => 0,
  sleep: async () => {}
};

export type ReplayArgs = {
  store: QueueStore;
  client: IngestionClient;
  stream_id: string;
  max_batch_size?: number;
  /** Retries per batch after the first attempt. */
  max_retries?: number;
  policy?: RetryPolicy;
  /** Also resubmit entries a previous run marked failed. */
  include_failed?: boolean;
  clock?: LamportClock;
  logger?: Logger;
  /**
   * Stop after this entry: only it and the replayable entries appended before
   * it are sent, so the service never sees an event ahead of its predecessors.
   */
  through_event_id?: string;
  /** Only entries written by this node. */
  origin_node?: string;
};

export type ReplayResult = {
  accepted: string[];
  rejected: string[];
  /** Left pending after transient failures; a later replay retries them. */
  deferred: string[];
};

type BatchOutcome = { kind: "reply"; reply: BatchReply } | { kind: "exhausted"; error: string };

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

async function submitWithRetry(
  client: IngestionClient,
  batch: QueueEntry[],
  maxRetries: number,
  policy: RetryPolicy,
  logger: Logger
): Promise<BatchOutcome> {
  const events = batch.map((e) => e.event);
  for (let attempt = 0; ; attempt += 1) {
    try {
      return { kind: "reply", reply: await client.submitBatch(events) };
    } catch (e) {
      if (!(e instanceof TransientDeliveryError)) throw e;
      if (attempt >= maxRetries) return { kind: "exhausted", error: e.message };
      const delay = policy.delayMs(attempt + 1);
      logger.warn({ attempt: attempt + 1, delay_ms: delay, err: e.message }, "batch delivery failed; backing off");
      await policy.sleep(delay);
    }
  }
}

/**
 * Sends queued events to the ingestion service in batches and records each
 * verdict on the queue. Nothing is ever dropped: transient failures leave
 * entries pending, definitive rejections mark them failed.
 */
export async function replayPending(args: ReplayArgs): Promise<ReplayResult> {
  const logger = args.logger ?? silentLogger();
  const maxBatchSize = Math.min(Math.max(1, args.max_batch_size ?? MAX_BATCH_SIZE), MAX_BATCH_SIZE);
  const maxRetries = Math.max(0, args.max_retries ?? 3);
  const policy = args.policy ?? exponentialBackoff();
  const result: ReplayResult = { accepted: [], rejected: [], deferred: [] };

  let entries = await args.store.readReplayable(args.stream_id, { include_failed: args.include_failed });
  if (args.origin_node !== undefined) {
    const node = args.origin_node;
    entries = entries.filter((e) => e.event.origin_node === node);
  }
  if (args.through_event_id !== undefined) {
    const last = entries.findIndex((e) => e.event.event_id === args.through_event_id);
    entries = last === -1 ? [] : entries.slice(0, last + 1);
  }
  if (entries.length === 0) return result;

  for (const batch of chunk(entries, maxBatchSize)) {
    let outcome: BatchOutcome;
    try {
      outcome = await submitWithRetry(args.client, batch, maxRetries, policy, logger);
    } catch (e) {
      if (e instanceof ReplayAuthError) {
        logger.warn({ stream_id: args.stream_id, status: e.status }, "replay stopped: credentials refused");
      }
      throw e;
    }

    const updates: StatusUpdate[] = [];
    if (outcome.kind === "exhausted") {
      for (const entry of batch) {
        updates.push({
          event_id: entry.event.event_id,
          replay_status: entry.replay_status,
          count_retry: true,
          last_error: outcome.error
        });
        result.deferred.push(entry.event.event_id);
      }
      logger.warn(
        { stream_id: args.stream_id, events: batch.length, err: outcome.error },
        "batch left pending after retries"
      );
    } else {
      const verdicts = new Map(outcome.reply.results.map((v) => [v.event_id, v]));
      for (const entry of batch) {
        const id = entry.event.event_id;
        const verdict = verdicts.get(id);
        if (!verdict) {
          logger.warn({ event_id: id }, "no verdict returned; leaving pending");
          result.deferred.push(id);
          continue;
        }
        if (verdict.status === "rejected") {
          const reason = verdict.reason ?? "rejected";
          updates.push({ event_id: id, replay_status: "failed", last_error: reason });
          result.rejected.push(id);
          logger.warn({ event_id: id, reason }, "event rejected by ingestion service");
        } else {
          updates.push({ event_id: id, replay_status: "delivered", last_error: null });
          result.accepted.push(id);
        }
      }
      if (outcome.reply.clock_hint !== undefined && args.clock) {
        await args.clock.observe(outcome.reply.clock_hint);
      }
    }
    await args.store.updateStatus(args.stream_id, updates);
    logger.debug({ stream_id: args.stream_id, size: batch.length }, "batch processed");
  }

  logger.info(
    {
      stream_id: args.stream_id,
      accepted: result.accepted.length,
      rejected: result.rejected.length,
      deferred: result.deferred.length
    },
    "replay finished"
  );
  return result;
}

export function describeReplayError(e: unknown): string {
  if (e instanceof ReplayAuthError) return `${e.message}; events remain queued`;
  return errorMessage(e);
}

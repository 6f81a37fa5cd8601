import { z } from "zod";
import { ReplayAuthError, TransientDeliveryError, errorMessage } from "../core/errors.js";
import { ParticipantRole } from "../schemas/common.js";
import type { EventEnvelope } from "../schemas/event.js";

export const EventVerdict = z.object({
  event_id: z.string().min(1),
  status: z.enum(["accepted", "duplicate", "rejected"]),
  reason: z.string().nullable().optional()
});
export type EventVerdict = z.infer<typeof EventVerdict>;

export const BatchReply = z.object({
  results: z.array(EventVerdict),
  /** Highest logical clock the service has seen for the mission, if it shares one. */
  clock_hint: z.number().int().nonnegative().optional()
});
export type BatchReply = z.infer<typeof BatchReply>;

export const JoinReply = z.object({
  participant_id: z.string().min(1),
  session_token: z.string().min(1).optional(),
  mission_run_id: z.string().optional(),
  display_name: z.string().min(1).nullable().optional()
});
export type JoinReply = z.infer<typeof JoinReply>;

/** Remote ingestion contract as consumed by the replay transport. */
export interface IngestionClient {
  submitBatch(events: EventEnvelope[]): Promise<BatchReply>;
  health(): Promise<boolean>;
}

export interface MissionApi extends IngestionClient {
  joinMission(missionId: string, role: ParticipantRole): Promise<JoinReply>;
}

export type ApiConnection = {
  api_url: string;
  token: string;
};

export type ApiFactory = (conn: ApiConnection) => MissionApi;

export type HttpIngestionClientArgs = ApiConnection & {
  request_timeout_ms?: number;
  health_timeout_ms?: number;
  fetch?: typeof fetch;
};

export const MAX_BATCH_SIZE = 100;

// Statuses a later attempt may succeed on.
function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export class HttpIngestionClient implements MissionApi {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;
  private readonly healthTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(args: HttpIngestionClientArgs) {
    this.baseUrl = args.api_url.replace(/\/+$/, "");
    this.token = args.token;
    this.requestTimeoutMs = args.request_timeout_ms ?? 10_000;
    this.healthTimeoutMs = args.health_timeout_ms ?? 2_000;
    this.fetchImpl = args.fetch ?? fetch;
  }

  async submitBatch(events: EventEnvelope[]): Promise<BatchReply> {
    if (events.length > MAX_BATCH_SIZE) {
      throw new RangeError(`Batch of ${events.length} exceeds the ${MAX_BATCH_SIZE}-event limit`);
    }
    const { status, ok, body } = await this.post("/api/v1/events/batch/", { events });
    if (status === 401 || status === 403) throw new ReplayAuthError(status);
    if (isRetryableStatus(status)) {
      throw new TransientDeliveryError(`Ingestion service returned HTTP ${status}`, status);
    }

    const parsed = BatchReply.safeParse(body);
    if (ok) {
      if (!parsed.success) {
        throw new TransientDeliveryError(`Ingestion service returned an unreadable reply (HTTP ${status})`, status);
      }
      return parsed.data;
    }
    // A 4xx for the whole batch: use per-event verdicts when the service sent
    // them, otherwise the batch itself was refused.
    if (parsed.success) return parsed.data;
    return {
      results: events.map((e) => ({ event_id: e.event_id, status: "rejected", reason: `http_${status}` }))
    };
  }

  async joinMission(missionId: string, role: ParticipantRole): Promise<JoinReply> {
    const { status, ok, body } = await this.post(
      `/api/v1/missions/${encodeURIComponent(missionId)}/participants`,
      { role }
    );
    if (status === 401 || status === 403) throw new ReplayAuthError(status);
    if (!ok) {
      if (isRetryableStatus(status)) {
        throw new TransientDeliveryError(`Join failed with HTTP ${status}`, status);
      }
      throw new Error(`Join refused for mission ${missionId} (HTTP ${status})`);
    }
    return JoinReply.parse(body);
  }

  async health(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.healthTimeoutMs)
      });
      await res.body?.cancel().catch(() => {});
      return res.status === 200;
    } catch {
      return false;
    }
  }

  private async post(pathname: string, payload: unknown): Promise<{ status: number; ok: boolean; body: unknown }> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}${pathname}`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.token}`,
          "content-type": "application/json"
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.requestTimeoutMs)
      });
      return { status: res.status, ok: res.ok, body: await readJson(res) };
    } catch (e) {
      throw new TransientDeliveryError(`Request to ${pathname} failed: ${errorMessage(e)}`, undefined, { cause: e });
    }
  }
}

export function httpApiFactory(opts: { request_timeout_ms?: number; health_timeout_ms?: number } = {}): ApiFactory {
  return (conn) => new HttpIngestionClient({ ...conn, ...opts });
}

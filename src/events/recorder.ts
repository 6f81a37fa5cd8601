import type { EventEnvelope, EventType } from "../schemas/event.js";
import { newEnvelope, type EventDraft } from "./envelope.js";
import type { LamportClock } from "./lamport.js";
import type { QueueStore } from "./queue_store.js";

export type RecordArgs<T extends EventType> = EventDraft<T>;

/**
 * Stamps envelopes with this node's identity and next clock value and
 * appends them. The clock is advanced inside the queue lock.
 */
export class EventRecorder {
  constructor(
    readonly store: QueueStore,
    readonly clock: LamportClock
  ) {}

  get node_id(): string {
    return this.clock.node_id;
  }

  async record<T extends EventType>(args: RecordArgs<T>): Promise<EventEnvelope> {
    // Validate before touching the clock so bad input leaves no trace.
    const draft = newEnvelope<T>({ ...args, origin_node: this.clock.node_id, logical_clock: 0 });
    return this.store.appendWith(args.mission_id, async () => ({
      ...draft,
      logical_clock: await this.clock.increment()
    }));
  }
}

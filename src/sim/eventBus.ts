import type { Logger } from "./config";
import { InvalidArgumentError, errorMessage } from "./errors";
import { makeId } from "./ids";
import type { EntityId, EventDraft, EventKind, LocationId, SimEvent } from "./types";

export type EventListener = (event: SimEvent) => void;
export type Unsubscribe = () => void;

export type EventBusOptions = {
  capacity: number;
  // Also warned about every listener failure. The sim.error event is published either way.
  logger?: Logger;
};

// Marks sim.error events raised for listener failures, so their own failures are not redispatched.
const LISTENER_FAILURE = "listener";

/**
 * Append-only event history in a fixed-size ring, with synchronous dispatch.
 * Global listeners run before kind-scoped ones, each group in registration order.
 */
export class EventBus {
  private readonly cap: number;
  private readonly logger: Logger | undefined;
  private ring: Array<SimEvent | undefined>;
  private head = 0; // index of the oldest retained event
  private count = 0;
  private seq = 1;

  private readonly anyListeners: EventListener[] = [];
  private readonly kindListeners = new Map<EventKind, EventListener[]>();

  constructor(opts: EventBusOptions) {
    if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
      throw new InvalidArgumentError(`event history capacity must be an integer >= 1 (got ${opts.capacity})`);
    }
    this.cap = opts.capacity;
    this.logger = opts.logger;
    this.ring = new Array<SimEvent | undefined>(this.cap);
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.cap;
  }

  /** Sequence number the next published event will get. */
  get nextSeq(): number {
    return this.seq;
  }

  publish(draft: EventDraft): SimEvent {
    const event = this.append(draft);
    const failures = this.dispatch(event);
    const isFailureReport = event.kind === "sim.error" && event.data?.origin === LISTENER_FAILURE;

    for (const f of failures) {
      const report: EventDraft = {
        kind: "sim.error",
        at: event.at,
        message: `Listener for ${event.kind} failed: ${errorMessage(f)}`,
        data: { origin: LISTENER_FAILURE, failedEventSeq: event.seq, failedKind: event.kind, error: errorMessage(f) }
      };
      this.logger?.warn(`[events] ${report.message}`);
      if (isFailureReport) this.append(report);
      else this.publish(report);
    }
    return event;
  }

  subscribe(kind: EventKind, listener: EventListener): Unsubscribe {
    const list = this.kindListeners.get(kind) ?? [];
    list.push(listener);
    this.kindListeners.set(kind, list);
    return () => removeOnce(list, listener);
  }

  onAny(listener: EventListener): Unsubscribe {
    this.anyListeners.push(listener);
    return () => removeOnce(this.anyListeners, listener);
  }

  /** Last `n` events, oldest first. */
  recent(n: number): SimEvent[] {
    const all = this.all();
    if (n <= 0) return [];
    return all.slice(Math.max(0, all.length - Math.floor(n)));
  }

  /** Every retained event, oldest first. */
  all(): SimEvent[] {
    const out: SimEvent[] = [];
    for (let i = 0; i < this.count; i++) {
      const e = this.ring[(this.head + i) % this.cap];
      if (e) out.push(e);
    }
    return out;
  }

  byKind(kind: EventKind, limit = Infinity): SimEvent[] {
    return this.newestFirst((e) => e.kind === kind, limit);
  }

  bySource(sourceId: EntityId, limit = Infinity): SimEvent[] {
    return this.newestFirst((e) => e.sourceId === sourceId, limit);
  }

  byLocation(locationId: LocationId, limit = Infinity): SimEvent[] {
    return this.newestFirst((e) => e.locationId === locationId, limit);
  }

  /** Retained events with seq strictly greater than `seq`, oldest first. */
  since(seq: number): SimEvent[] {
    return this.all().filter((e) => e.seq > seq);
  }

  /** Replace history wholesale (used when loading a save). Listeners are kept. */
  restore(events: readonly SimEvent[], nextSeq: number): void {
    const lastSeq = events.length ? events[events.length - 1].seq : 0;
    if (!Number.isInteger(nextSeq) || nextSeq <= lastSeq) {
      throw new InvalidArgumentError(`nextSeq ${nextSeq} must be greater than the last restored seq ${lastSeq}`);
    }
    const kept = events.slice(Math.max(0, events.length - this.cap));
    this.ring = new Array<SimEvent | undefined>(this.cap);
    this.head = 0;
    this.count = 0;
    for (const e of kept) this.store(freezeEvent({ ...e }));
    this.seq = nextSeq;
  }

  private append(draft: EventDraft): SimEvent {
    const seq = this.seq++;
    // Absent optionals are left off entirely so JSON and binary saves agree.
    const event: SimEvent = { seq, id: makeId("evt", draft.at, seq), kind: draft.kind, at: draft.at, message: draft.message };
    if (draft.sourceId !== undefined) event.sourceId = draft.sourceId;
    if (draft.targetId !== undefined) event.targetId = draft.targetId;
    if (draft.locationId !== undefined) event.locationId = draft.locationId;
    if (draft.data !== undefined) event.data = { ...draft.data };
    freezeEvent(event);
    this.store(event);
    return event;
  }

  private store(event: SimEvent): void {
    if (this.count < this.cap) {
      this.ring[(this.head + this.count) % this.cap] = event;
      this.count++;
    } else {
      this.ring[this.head] = event;
      this.head = (this.head + 1) % this.cap;
    }
  }

  private dispatch(event: SimEvent): unknown[] {
    const failures: unknown[] = [];
    // Copy so listeners that (un)subscribe during dispatch don't disturb this pass.
    const listeners = [...this.anyListeners, ...(this.kindListeners.get(event.kind) ?? [])];
    for (const l of listeners) {
      try {
        l(event);
      } catch (err) {
        failures.push(err);
      }
    }
    return failures;
  }

  private newestFirst(pred: (e: SimEvent) => boolean, limit: number): SimEvent[] {
    const out: SimEvent[] = [];
    for (let i = this.count - 1; i >= 0 && out.length < limit; i--) {
      const e = this.ring[(this.head + i) % this.cap];
      if (e && pred(e)) out.push(e);
    }
    return out;
  }
}

function removeOnce<T>(list: T[], item: T): void {
  const i = list.indexOf(item);
  if (i >= 0) list.splice(i, 1);
}

function freezeEvent(e: SimEvent): SimEvent {
  if (e.data) Object.freeze(e.data);
  return Object.freeze(e);
}

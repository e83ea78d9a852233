import {
  calendarAt,
  dayIndex,
  formatDate,
  formatDateTime,
  formatTime,
  isWithinWindow,
  minutesUntilNext,
  minutesUntilTime,
  seasonIndexOf,
  yearOf,
  type Period
} from "./calendar";
import { InvalidArgumentError } from "./errors";
import type { ClockSnapshot, HourOfDay, SimMinute, WorkWindow } from "./types";

export type ScheduledCallback = (firedAt: SimMinute, clock: WorldClock) => void;

export type ScheduleHandle = number;

export type ScheduleOptions = {
  /** Re-arm every N minutes after each firing. */
  every?: number;
  label?: string;
};

export type CallbackFailure = {
  handle: ScheduleHandle;
  label: string;
  at: SimMinute;
  error: unknown;
};

export type AdvanceResult = {
  from: SimMinute;
  to: SimMinute;
  fired: number;
  failures: CallbackFailure[];
  crossedDays: number;
  crossedSeasons: number;
  crossedYears: number;
};

export type WorldClockOptions = {
  defaultWorkWindow?: WorkWindow;
  /** Per-profession working window; undefined falls back to the default window. */
  workWindowFor?: (profession: string) => WorkWindow | undefined;
};

type Entry = {
  handle: ScheduleHandle;
  trigger: SimMinute;
  // insertion order, renewed on re-arm so ties stay FIFO
  order: number;
  every: number | null;
  label: string;
  callback: ScheduledCallback;
  cancelled: boolean;
};

function before(a: Entry, b: Entry): boolean {
  return a.trigger < b.trigger || (a.trigger === b.trigger && a.order < b.order);
}

// Binary min-heap on (trigger, order).
class EntryHeap {
  private items: Entry[] = [];

  get size(): number {
    return this.items.length;
  }

  peek(): Entry | undefined {
    return this.items[0];
  }

  push(e: Entry): void {
    const a = this.items;
    a.push(e);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!before(a[i], a[p])) break;
      [a[i], a[p]] = [a[p], a[i]];
      i = p;
    }
  }

  pop(): Entry | undefined {
    const a = this.items;
    const top = a[0];
    const last = a.pop();
    if (top === undefined || last === undefined || a.length === 0) return top;
    a[0] = last;
    let i = 0;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let m = i;
      if (l < a.length && before(a[l], a[m])) m = l;
      if (r < a.length && before(a[r], a[m])) m = r;
      if (m === i) break;
      [a[i], a[m]] = [a[m], a[i]];
      i = m;
    }
    return top;
  }
}

const DEFAULT_WORK_WINDOW: WorkWindow = { startHour: 8, endHour: 18 };

function assertPositiveInt(n: number, what: string): void {
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`${what} must be a positive integer (got ${String(n)})`, { value: n });
  }
}

/**
 * Owns simulated time. The minute counter only moves forward, through `advance`.
 */
export class WorldClock {
  private minutes: SimMinute;
  private readonly heap = new EntryHeap();
  private readonly live = new Map<ScheduleHandle, Entry>();
  private nextHandle = 1;
  private nextOrder = 0;
  private readonly defaultWindow: WorkWindow;
  private readonly workWindowFor: (profession: string) => WorkWindow | undefined;

  constructor(startMinute: SimMinute = 8 * 60, opts: WorldClockOptions = {}) {
    if (!Number.isInteger(startMinute) || startMinute < 0) {
      throw new InvalidArgumentError(`start minute must be a non-negative integer (got ${String(startMinute)})`);
    }
    this.minutes = startMinute;
    this.defaultWindow = opts.defaultWorkWindow ?? DEFAULT_WORK_WINDOW;
    this.workWindowFor = opts.workWindowFor ?? (() => undefined);
  }

  get now(): SimMinute {
    return this.minutes;
  }

  get day(): number {
    return dayIndex(this.minutes);
  }

  get hour(): HourOfDay {
    return calendarAt(this.minutes).hour;
  }

  get pending(): number {
    return this.live.size;
  }

  snapshot(): ClockSnapshot {
    return Object.freeze(calendarAt(this.minutes));
  }

  advance(minutes: number): AdvanceResult {
    assertPositiveInt(minutes, "advance minutes");
    const from = this.minutes;
    const to = from + minutes;
    this.minutes = to;

    const failures: CallbackFailure[] = [];
    let fired = 0;
    for (;;) {
      const top = this.heap.peek();
      if (!top || top.trigger > to) break;
      this.heap.pop();
      if (top.cancelled) continue;

      if (top.every === null) this.live.delete(top.handle);
      fired++;
      try {
        top.callback(top.trigger, this);
      } catch (error) {
        failures.push({ handle: top.handle, label: top.label, at: top.trigger, error });
      }
      // The callback may have cancelled its own recurring entry.
      if (top.every !== null && !top.cancelled) {
        top.trigger += top.every;
        top.order = this.nextOrder++;
        this.heap.push(top);
      }
    }

    return {
      from,
      to,
      fired,
      failures,
      crossedDays: dayIndex(to) - dayIndex(from),
      crossedSeasons: seasonIndexOf(to) - seasonIndexOf(from),
      crossedYears: yearOf(to) - yearOf(from)
    };
  }

  /** Advance to the next occurrence of hh:mm (a full day if it is that time now). */
  advanceTo(hour: HourOfDay, minute = 0): AdvanceResult {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23 || !Number.isInteger(minute) || minute < 0 || minute > 59) {
      throw new InvalidArgumentError(`invalid wall-clock time ${hour}:${minute}`, { hour, minute });
    }
    return this.advance(minutesUntilTime(this.minutes, hour, minute));
  }

  /** Fires at now + delay. A zero delay fires on the next advance. */
  schedule(delay: number, callback: ScheduledCallback, opts: ScheduleOptions = {}): ScheduleHandle {
    if (!Number.isInteger(delay) || delay < 0) {
      throw new InvalidArgumentError(`schedule delay must be a non-negative integer (got ${String(delay)})`);
    }
    if (opts.every !== undefined) assertPositiveInt(opts.every, "schedule interval");

    const handle = this.nextHandle++;
    const entry: Entry = {
      handle,
      trigger: this.minutes + delay,
      order: this.nextOrder++,
      every: opts.every ?? null,
      label: opts.label ?? `task#${handle}`,
      callback,
      cancelled: false
    };
    this.live.set(handle, entry);
    this.heap.push(entry);
    return handle;
  }

  cancel(handle: ScheduleHandle): boolean {
    const e = this.live.get(handle);
    if (!e) return false;
    e.cancelled = true;
    this.live.delete(handle);
    return true;
  }

  workWindow(profession?: string): WorkWindow {
    if (profession === undefined) return this.defaultWindow;
    return this.workWindowFor(profession) ?? this.defaultWindow;
  }

  isWorkingHours(profession?: string): boolean {
    return isWithinWindow(this.hour, this.workWindow(profession));
  }

  minutesUntilNext(period: Period): number {
    return minutesUntilNext(this.minutes, period);
  }

  formatTime(): string {
    return formatTime(calendarAt(this.minutes));
  }

  formatDate(): string {
    return formatDate(calendarAt(this.minutes));
  }

  formatDateTime(): string {
    return formatDateTime(calendarAt(this.minutes));
  }
}

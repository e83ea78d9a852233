/**
 * Rotating autosave.
 *
 * `afterTick` runs on the tick path: it only decides whether a save is due and, if so,
 * takes an in-memory snapshot. Encoding and disk writes are queued on a promise chain
 * and finish later on the event loop.
 */

import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../sim/config";
import { InvalidArgumentError, errorMessage } from "../sim/errors";
import { encodeSnapshot, takeSnapshot, type SerializeOptions, type Snapshot } from "../sim/snapshot";
import type { SimMinute, TickSummary } from "../sim/types";
import { isRecord } from "../sim/util";
import type { World } from "../sim/world";
import { atomicWriteFileAsync, saveExtension } from "./persist";

export type AutosaveOptions = SerializeOptions & {
  dir: string;
  // Number of rotating slots (K).
  slots?: number;
  everyMinutes?: number;
  everyTicks?: number;
  baseName?: string;
  logger?: Logger;
};

export type AutosaveEntry = {
  slot: number;
  path: string;
  at: SimMinute;
  savedAt: string; // ISO
};

export type AutosaveIndex = {
  version: 1;
  nextSlot: number;
  entries: AutosaveEntry[];
};

export const AUTOSAVE_INDEX_FILE = "autosave.index.json";

export class Autosaver {
  readonly dir: string;
  readonly slots: number;
  private readonly everyMinutes: number | null;
  private readonly everyTicks: number | null;
  private readonly baseName: string;
  private readonly serializeOpts: SerializeOptions;
  private readonly logger: Logger;

  private lastSaveMinute: SimMinute | null = null;
  private ticksSinceSave = 0;
  private queue: Promise<void> = Promise.resolve();
  private index: AutosaveIndex;
  private written = 0;
  private failure: unknown = null;

  constructor(opts: AutosaveOptions) {
    const slots = opts.slots ?? 3;
    if (!Number.isInteger(slots) || slots < 1) throw new InvalidArgumentError("autosave slots must be an integer >= 1");
    for (const [key, v] of [["everyMinutes", opts.everyMinutes], ["everyTicks", opts.everyTicks]] as const) {
      if (v !== undefined && (!Number.isInteger(v) || v < 1)) throw new InvalidArgumentError(`autosave ${key} must be an integer >= 1`);
    }
    if (opts.everyMinutes === undefined && opts.everyTicks === undefined) {
      throw new InvalidArgumentError("autosave needs everyMinutes and/or everyTicks");
    }

    this.dir = opts.dir;
    this.slots = slots;
    this.everyMinutes = opts.everyMinutes ?? null;
    this.everyTicks = opts.everyTicks ?? null;
    this.baseName = opts.baseName ?? "autosave";
    this.serializeOpts = { encoding: opts.encoding, compress: opts.compress };
    this.logger = opts.logger ?? console;
    this.index = readIndex(this.dir, this.logger) ?? { version: 1, nextSlot: 0, entries: [] };
  }

  get savesWritten(): number {
    return this.written;
  }

  /** The most recent write failure, if any; cleared by the next successful write. */
  get lastError(): unknown {
    return this.failure;
  }

  /** Call once per completed tick. Returns true when a save was queued. */
  afterTick(world: World, summary: TickSummary): boolean {
    if (this.lastSaveMinute === null) this.lastSaveMinute = summary.fromMinute;
    this.ticksSinceSave++;

    const dueByTicks = this.everyTicks !== null && this.ticksSinceSave >= this.everyTicks;
    const dueByMinutes = this.everyMinutes !== null && world.now - this.lastSaveMinute >= this.everyMinutes;
    if (!dueByTicks && !dueByMinutes) return false;

    this.saveNow(world);
    return true;
  }

  /** Snapshot now, write later. */
  saveNow(world: World): void {
    const snapshot = takeSnapshot(world);
    this.lastSaveMinute = world.now;
    this.ticksSinceSave = 0;
    this.queue = this.queue.then(() => this.write(snapshot));
  }

  /** Resolves when every queued save has been written (or has failed and been logged). */
  flush(): Promise<void> {
    return this.queue;
  }

  /** Path of the newest completed autosave, or null. */
  latest(): string | null {
    const lastSlot = (this.index.nextSlot - 1 + this.slots) % this.slots;
    return this.index.entries.find((e) => e.slot === lastSlot)?.path ?? null;
  }

  entries(): AutosaveEntry[] {
    return this.index.entries.map((e) => ({ ...e }));
  }

  private async write(snapshot: Snapshot): Promise<void> {
    const slot = this.index.nextSlot % this.slots;
    const file = path.join(this.dir, `${this.baseName}-${slot}${saveExtension(this.serializeOpts)}`);
    try {
      await atomicWriteFileAsync(file, encodeSnapshot(snapshot, this.serializeOpts));
      const entry: AutosaveEntry = { slot, path: file, at: snapshot.clock.totalMinutes, savedAt: new Date().toISOString() };
      this.index = {
        version: 1,
        nextSlot: (slot + 1) % this.slots,
        entries: [...this.index.entries.filter((e) => e.slot !== slot), entry].sort((a, b) => a.slot - b.slot)
      };
      await atomicWriteFileAsync(path.join(this.dir, AUTOSAVE_INDEX_FILE), `${JSON.stringify(this.index, null, 2)}\n`);
      this.written++;
      this.failure = null;
    } catch (err) {
      this.failure = err;
      this.logger.error(`[autosave] failed to write ${file}: ${errorMessage(err)}`);
    }
  }
}

export function readIndex(dir: string, logger: Logger = console): AutosaveIndex | null {
  const p = path.join(dir, AUTOSAVE_INDEX_FILE);
  if (!fs.existsSync(p)) return null;
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(p, "utf8"));
    return parseIndex(raw);
  } catch (err) {
    logger.warn(`[autosave] ignoring unreadable index ${p}: ${errorMessage(err)}`);
    return null;
  }
}

function parseIndex(raw: unknown): AutosaveIndex {
  if (!isRecord(raw) || raw.version !== 1 || typeof raw.nextSlot !== "number" || !Array.isArray(raw.entries)) {
    throw new Error("unexpected index shape");
  }
  const entries: AutosaveEntry[] = raw.entries.map((e: unknown) => {
    if (!isRecord(e)) throw new Error("bad index entry");
    const { slot, path: p, at, savedAt } = e;
    if (typeof slot !== "number" || typeof p !== "string" || typeof at !== "number" || typeof savedAt !== "string") {
      throw new Error("bad index entry");
    }
    return { slot, path: p, at, savedAt };
  });
  return { version: 1, nextSlot: raw.nextSlot, entries };
}

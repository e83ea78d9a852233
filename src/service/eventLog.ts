import fs from "node:fs";
import path from "node:path";
import { CorruptDataError, errorMessage } from "../sim/errors";
import type { EventBus, Unsubscribe } from "../sim/eventBus";
import { parseEvent } from "../sim/snapshotValidate";
import type { SimEvent } from "../sim/types";

export type EventLog = {
  path: string;
  appendEvents: (events: readonly SimEvent[]) => void;
  /** Stream every event the bus publishes from now on. */
  attach: (bus: EventBus) => Unsubscribe;
  /** Resolves once everything written so far is flushed; rejects if the file could not be written. */
  close: () => Promise<void>;
};

export function openEventLog(outPath: string, opts: { append?: boolean } = {}): EventLog {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  const stream = fs.createWriteStream(outPath, { encoding: "utf8", flags: opts.append ? "a" : "w" });
  const detach: Unsubscribe[] = [];
  let closed = false;
  // First open or write error; later writes are dropped and close() rejects with it.
  let failure: Error | null = null;
  stream.on("error", (err) => {
    failure ??= err;
  });

  const appendEvents = (events: readonly SimEvent[]) => {
    if (closed || failure) return;
    for (const e of events) stream.write(`${JSON.stringify(e)}\n`);
  };

  const attach = (bus: EventBus) => {
    const off = bus.onAny((e) => appendEvents([e]));
    detach.push(off);
    return off;
  };

  const settled = () => (failure ? Promise.reject(failure) : Promise.resolve());

  const close = () => {
    if (closed) return settled();
    closed = true;
    for (const off of detach) off();
    if (stream.destroyed) return settled();
    return new Promise<void>((resolve, reject) => {
      stream.once("close", () => (failure ? reject(failure) : resolve()));
      stream.end();
    });
  };

  return { path: outPath, appendEvents, attach, close };
}

/** Parse a JSONL event log; blank lines are skipped. */
export function readEventLog(filePath: string): SimEvent[] {
  const out: SimEvent[] = [];
  const lines = fs.readFileSync(filePath, "utf8").split("\n");
  lines.forEach((line, i) => {
    if (!line.trim()) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      throw new CorruptDataError(`${filePath}:${i + 1}: ${errorMessage(err)}`, { line: i + 1 });
    }
    out.push(parseEvent(parsed, `${filePath}:${i + 1}`));
  });
  return out;
}

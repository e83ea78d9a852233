/**
 * StateManager: World <-> bytes.
 *
 * Two encodings: indented JSON (editable by hand) and V8 structured serialization
 * (binary, full fidelity). Either can be gzip-wrapped. Decoding sniffs the leading
 * bytes, so callers never say which format they are handing over.
 */

import v8 from "node:v8";
import zlib from "node:zlib";
import { calendarAt } from "./calendar";
import { CorruptDataError, errorMessage } from "./errors";
import { SNAPSHOT_VERSION, parseSnapshot, type Snapshot } from "./snapshotValidate";
import { World, type WorldDeps } from "./world";

export { SNAPSHOT_VERSION, SUPPORTED_SNAPSHOT_VERSIONS, type Snapshot } from "./snapshotValidate";

export type SnapshotEncoding = "json" | "binary";

export type SerializeOptions = {
  encoding?: SnapshotEncoding;
  compress?: boolean;
};

export type SnapshotFormat = {
  encoding: SnapshotEncoding;
  compressed: boolean;
};

const GZIP_MAGIC = [0x1f, 0x8b] as const;
// First byte of every v8.serialize() payload (the version tag).
const V8_MAGIC = 0xff;

/** Synchronous in-memory copy; safe to encode later while the world keeps ticking. */
export function takeSnapshot(world: World): Snapshot {
  const state = world.captureState();
  const c = calendarAt(state.clockMinutes);
  return {
    version: SNAPSHOT_VERSION,
    name: state.name,
    seed: state.seed,
    clock: {
      totalMinutes: c.totalMinutes,
      year: c.year,
      month: c.month,
      dayOfMonth: c.dayOfMonth,
      hour: c.hour,
      minute: c.minute,
      season: c.season
    },
    rngState: state.rngState,
    counters: state.counters,
    entities: state.entities,
    eventTail: state.events,
    nextEventSeq: state.nextEventSeq
  };
}

export function encodeSnapshot(snapshot: Snapshot, opts: SerializeOptions = {}): Buffer {
  const encoding = opts.encoding ?? "json";
  const body = encoding === "binary" ? v8.serialize(snapshot) : Buffer.from(`${JSON.stringify(snapshot, null, 2)}\n`, "utf8");
  return opts.compress ? zlib.gzipSync(body) : body;
}

export function detectFormat(bytes: Uint8Array): SnapshotFormat {
  if (bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1]) {
    return { ...detectFormat(gunzip(bytes)), compressed: true };
  }
  if (bytes[0] === V8_MAGIC) return { encoding: "binary", compressed: false };
  if (firstNonSpace(bytes) === "{") return { encoding: "json", compressed: false };
  throw new CorruptDataError("Unrecognised snapshot format", { firstByte: bytes[0] ?? null });
}

export function decodeSnapshot(bytes: Uint8Array): Snapshot {
  let buf: Buffer = Buffer.from(bytes);
  if (buf[0] === GZIP_MAGIC[0] && buf[1] === GZIP_MAGIC[1]) buf = gunzip(buf);

  let raw: unknown;
  if (buf[0] === V8_MAGIC) {
    try {
      raw = v8.deserialize(buf);
    } catch (err) {
      throw new CorruptDataError(`Binary snapshot is unreadable: ${errorMessage(err)}`);
    }
  } else if (firstNonSpace(buf) === "{") {
    try {
      raw = JSON.parse(buf.toString("utf8"));
    } catch (err) {
      throw new CorruptDataError(`JSON snapshot is unreadable: ${errorMessage(err)}`);
    }
  } else {
    throw new CorruptDataError("Unrecognised snapshot format", { firstByte: buf[0] ?? null });
  }
  return parseSnapshot(raw);
}

export function serialize(world: World, opts: SerializeOptions = {}): Buffer {
  return encodeSnapshot(takeSnapshot(world), opts);
}

export function restoreWorld(snapshot: Snapshot, deps: WorldDeps = {}): World {
  return World.restore(
    {
      name: snapshot.name,
      seed: snapshot.seed,
      clockMinutes: snapshot.clock.totalMinutes,
      rngState: snapshot.rngState,
      counters: snapshot.counters,
      entities: snapshot.entities,
      events: snapshot.eventTail,
      nextEventSeq: snapshot.nextEventSeq
    },
    deps
  );
}

/** VersionMismatch for unsupported saves; CorruptData for anything malformed or inconsistent. */
export function deserialize(bytes: Uint8Array, deps: WorldDeps = {}): World {
  return restoreWorld(decodeSnapshot(bytes), deps);
}

function gunzip(bytes: Uint8Array): Buffer {
  try {
    return zlib.gunzipSync(bytes);
  } catch (err) {
    throw new CorruptDataError(`Compressed snapshot is unreadable: ${errorMessage(err)}`);
  }
}

function firstNonSpace(bytes: Uint8Array): string | undefined {
  for (let i = 0; i < bytes.length && i < 64; i++) {
    const b = bytes[i];
    if (b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d) continue;
    return String.fromCharCode(b);
  }
  return undefined;
}

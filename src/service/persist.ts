import fs from "node:fs";
import path from "node:path";
import { decodeSnapshot, detectFormat, restoreWorld, serialize, type SerializeOptions, type SnapshotFormat } from "../sim/snapshot";
import { NotFoundError } from "../sim/errors";
import type { World, WorldDeps } from "../sim/world";

export type SaveInfo = {
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAt: string; // ISO
};

const SAVE_SUFFIXES = [".json", ".json.gz", ".bin", ".bin.gz"] as const;

export function defaultSavesDir(): string {
  return path.join("saves");
}

export function saveExtension(opts: SerializeOptions = {}): string {
  const base = opts.encoding === "binary" ? ".bin" : ".json";
  return opts.compress ? `${base}.gz` : base;
}

// Autosave keeps its slot index beside the saves.
const INDEX_SUFFIX = ".index.json";

export function isSaveFile(name: string): boolean {
  return !name.endsWith(INDEX_SUFFIX) && SAVE_SUFFIXES.some((s) => name.endsWith(s));
}

export function atomicWriteFile(filePath: string, data: string | Uint8Array): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  fs.writeFileSync(tmp, data);
  fs.renameSync(tmp, filePath);
}

export async function atomicWriteFileAsync(filePath: string, data: string | Uint8Array): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  await fs.promises.writeFile(tmp, data);
  await fs.promises.rename(tmp, filePath);
}

/** Writes the world to `filePath` and returns the number of bytes written. */
export function saveWorld(world: World, filePath: string, opts: SerializeOptions = {}): number {
  const bytes = serialize(world, opts);
  atomicWriteFile(filePath, bytes);
  return bytes.length;
}

export function loadWorld(filePath: string, deps: WorldDeps = {}): World {
  return restoreWorld(decodeSnapshot(readSave(filePath)), deps);
}

export function readSaveFormat(filePath: string): SnapshotFormat {
  return detectFormat(readSave(filePath));
}

/** Save files in `dir`, newest name last. A missing directory has no saves. */
export function listSaves(dir: string): SaveInfo[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && isSaveFile(e.name))
    .map((e) => {
      const p = path.join(dir, e.name);
      const st = fs.statSync(p);
      return { name: e.name, path: p, sizeBytes: st.size, modifiedAt: st.mtime.toISOString() };
    })
    .sort((a, b) => a.name.localeCompare(b.name));
}

/** False when there was nothing to delete. */
export function deleteSave(filePath: string): boolean {
  if (!fs.existsSync(filePath)) return false;
  fs.unlinkSync(filePath);
  return true;
}

function readSave(filePath: string): Buffer {
  if (!fs.existsSync(filePath)) throw new NotFoundError(`No save at ${filePath}`, { path: filePath });
  return fs.readFileSync(filePath);
}

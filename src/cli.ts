#!/usr/bin/env node
import path from "node:path";
import { continueSimulation, runSimulation, DEFAULT_LOCATIONS, DEFAULT_NPCS, type RunSimulationResult } from "./runner/run";
import { Autosaver } from "./service/autosave";
import { openEventLog, type EventLog } from "./service/eventLog";
import { defaultSavesDir, listSaves, loadWorld, readSaveFormat, saveExtension, saveWorld } from "./service/persist";
import { createConfig } from "./sim/config";
import { isSimError } from "./sim/errors";
import type { SnapshotEncoding, SerializeOptions } from "./sim/snapshot";
import { isLocation, isNpc, type SimEvent } from "./sim/types";
import type { World } from "./sim/world";

type Flags = Record<string, string | boolean>;

function parseArgs(argv: string[]) {
  const args = argv.slice(2);
  const cmd = args[0] ?? "help";

  const map: Flags = {};
  for (let i = 1; i < args.length; i++) {
    const a = args[i];
    if (!a.startsWith("--")) continue;
    const key = a.slice(2);
    const next = args[i + 1];
    if (!next || next.startsWith("--")) {
      map[key] = true;
    } else {
      map[key] = next;
      i++;
    }
  }

  return { cmd, flags: map };
}

function numFlag(flags: Flags, key: string, fallback: number): number {
  const v = flags[key];
  if (v === undefined || v === true) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

function strFlag(flags: Flags, key: string): string | undefined {
  const v = flags[key];
  if (v === undefined || v === true) return undefined;
  return String(v);
}

function serializeFlags(flags: Flags): SerializeOptions {
  const enc = strFlag(flags, "encoding");
  const encoding: SnapshotEncoding = enc === "binary" ? "binary" : "json";
  return { encoding, compress: flags["compress"] === true };
}

function timestampForFilename(d = new Date()): string {
  // 2025-12-14T12:34:56.789Z -> 20251214-123456Z
  const iso = d.toISOString();
  const ymd = iso.slice(0, 10).replaceAll("-", "");
  const hms = iso.slice(11, 19).replaceAll(":", "");
  return `${ymd}-${hms}Z`;
}

function printHelp() {
  console.log(
    [
      "living-world CLI",
      "",
      "Commands:",
      "  run --seed <n> [--days <n>] [--hours <n>] [--locations <n>] [--npcs <n>] [--step <minutes>]",
      "      [--save <path>] [--encoding json|binary] [--compress] [--events-out <path>] [--events <n>]",
      "      [--autosave-dir <dir>] [--autosave-every <minutes>] [--autosave-slots <k>] [--log-ticks]",
      "  resume --file <save> [--days <n>] [--hours <n>] [--save <path>] [--encoding json|binary] [--compress]",
      "  inspect --file <save> [--npcs <n>]",
      "  saves [--dir <dir>]",
      "",
      "Examples:",
      "  node dist/cli.js run --seed 42 --days 3 --save saves/world-42.json",
      "  node dist/cli.js run --seed 7 --days 30 --events-out logs/events.jsonl --autosave-dir saves/auto --autosave-every 1440",
      "  node dist/cli.js resume --file saves/world-42.json --days 1 --save saves/world-42-day4.bin.gz --encoding binary --compress",
      "  node dist/cli.js inspect --file saves/world-42.json",
      "  node dist/cli.js saves --dir saves"
    ].join("\n")
  );
}

function printEvents(events: SimEvent[], limit: number) {
  if (limit <= 0) return;
  console.log("\nRecent events:");
  for (const e of events.slice(-limit)) {
    console.log(`- [#${e.seq} m${e.at}] ${e.kind}${e.locationId ? `@${e.locationId}` : ""}: ${e.message}`);
  }
}

function printSummary(world: World, npcLimit: number) {
  const s = world.summary();
  console.log(`${s.name} (seed ${s.seed})`);
  console.log(`  ${s.time}`);
  console.log(`  NPCs: ${s.npcs.active}/${s.npcs.total} active, locations: ${s.locations.active}/${s.locations.total} active`);
  console.log(
    `  activities: ${Object.entries(s.activities)
      .map(([k, v]) => `${k}=${v}`)
      .join(" ")}`
  );
  console.log(`  events retained: ${s.eventsRetained} (next seq ${s.nextEventSeq})`);

  console.log("\nLocations:");
  for (const loc of world.listEntities({ kind: "location" })) {
    if (!isLocation(loc)) continue;
    const weather = loc.weather ? `${loc.weather.condition} ${loc.weather.temperatureC}°C` : "unknown";
    const market = loc.isMarket ? (loc.marketOpen ? " [market open]" : " [market closed]") : "";
    console.log(`  - ${loc.id} ${loc.name} (${loc.locationType}, ${loc.biome}) npcs=${loc.npcIds.length} weather=${weather}${market}`);
  }

  console.log("\nNPCs:");
  const npcs = world.listEntities({ kind: "npc" });
  for (const npc of npcs.slice(0, npcLimit)) {
    if (!isNpc(npc)) continue;
    const n = npc.needs;
    console.log(
      `  - ${npc.id} ${npc.name}, ${npc.race} ${npc.title} [${npc.professions.join(", ") || "none"}] ` +
        `${npc.activity} @${npc.locationId ?? "?"} energy=${n.energy.toFixed(0)} hunger=${n.hunger.toFixed(0)} mood=${n.mood.toFixed(0)} items=${npc.inventory.length}`
    );
  }
  if (npcs.length > npcLimit) console.log(`  ... ${npcs.length - npcLimit} more`);
}

async function finish(res: RunSimulationResult, flags: Flags, log: EventLog | null, autosaver: Autosaver | null) {
  if (autosaver) {
    await autosaver.flush();
    const latest = autosaver.latest();
    console.log(`Autosaves written: ${autosaver.savesWritten}${latest ? ` (latest ${latest})` : ""}`);
  }
  if (log) {
    await log.close();
    console.log(`Event log: ${log.path}`);
  }

  console.log(
    `\nSimulated ${res.report.minutes} minute(s) in ${res.report.steps} step(s): ${res.report.eventsEmitted} event(s), ${res.report.errors} error(s)`
  );
  printSummary(res.world, numFlag(flags, "npcs-shown", 10));
  printEvents(res.events, numFlag(flags, "events", 0));

  const savePath = strFlag(flags, "save");
  if (savePath) {
    const bytes = saveWorld(res.world, savePath, serializeFlags(flags));
    console.log(`\nSaved ${bytes} bytes to ${savePath}`);
  }
}

function makeAutosaver(flags: Flags): Autosaver | null {
  const dir = strFlag(flags, "autosave-dir");
  if (!dir) return null;
  return new Autosaver({
    dir,
    slots: numFlag(flags, "autosave-slots", 3),
    everyMinutes: numFlag(flags, "autosave-every", 24 * 60),
    ...serializeFlags(flags)
  });
}

async function cmdRun(flags: Flags) {
  const seed = numFlag(flags, "seed", 1);
  const days = numFlag(flags, "days", 1);
  const hours = numFlag(flags, "hours", 0);
  const autosaver = makeAutosaver(flags);
  const eventsOut = strFlag(flags, "events-out");
  const config = createConfig({ debug: { logTicks: flags["log-ticks"] === true } });

  const res = runSimulation({
    seed,
    days,
    hours,
    locations: numFlag(flags, "locations", DEFAULT_LOCATIONS),
    npcs: numFlag(flags, "npcs", DEFAULT_NPCS),
    minutesPerStep: numFlag(flags, "step", 60),
    deps: { config },
    simulator: { autosaver: autosaver ?? undefined }
  });

  let log: EventLog | null = null;
  if (eventsOut !== undefined || flags["events-out"] === true) {
    log = openEventLog(eventsOut ?? path.join("logs", `events-${timestampForFilename()}-seed${seed}.jsonl`));
    // res.events covers the whole run, world.created included
    log.appendEvents(res.events);
  }
  await finish(res, flags, log, autosaver);
}

async function cmdResume(flags: Flags) {
  const file = strFlag(flags, "file");
  if (!file) throw new Error("resume needs --file <save>");
  const world = loadWorld(file);
  console.log(`Loaded ${file} at ${world.clock.formatDateTime()}`);

  const autosaver = makeAutosaver(flags);
  const eventsOut = strFlag(flags, "events-out");
  const log = eventsOut ? openEventLog(eventsOut, { append: true }) : null;
  const detach = log?.attach(world.events);
  const hours = numFlag(flags, "days", 1) * 24 + numFlag(flags, "hours", 0);
  const res = continueSimulation(world, hours, {
    minutesPerStep: numFlag(flags, "step", 60),
    simulator: { autosaver: autosaver ?? undefined }
  });
  detach?.();
  await finish(res, flags, log, autosaver);
}

function cmdInspect(flags: Flags) {
  const file = strFlag(flags, "file");
  if (!file) throw new Error("inspect needs --file <save>");
  const format = readSaveFormat(file);
  const world = loadWorld(file);
  console.log(`${file}: ${format.encoding}${format.compressed ? " (gzip)" : ""}\n`);
  printSummary(world, numFlag(flags, "npcs", 20));
  printEvents(world.recentEvents(numFlag(flags, "events", 10)), numFlag(flags, "events", 10));
}

function cmdSaves(flags: Flags) {
  const dir = strFlag(flags, "dir") ?? defaultSavesDir();
  const saves = listSaves(dir);
  if (!saves.length) {
    console.log(`No saves in ${dir} (looking for *${saveExtension()}, *${saveExtension({ encoding: "binary" })} and .gz variants)`);
    return;
  }
  for (const s of saves) console.log(`${s.modifiedAt}  ${String(s.sizeBytes).padStart(9)}  ${s.path}`);
}

async function main() {
  const { cmd, flags } = parseArgs(process.argv);
  switch (cmd) {
    case "run":
      return cmdRun(flags);
    case "resume":
      return cmdResume(flags);
    case "inspect":
      return cmdInspect(flags);
    case "saves":
      return cmdSaves(flags);
    default:
      printHelp();
  }
}

main().catch((err: unknown) => {
  if (isSimError(err)) console.error(`${err.code}: ${err.message}`);
  else console.error(err instanceof Error ? String(err.stack ?? err) : String(err));
  process.exitCode = 1;
});

import { InvalidArgumentError } from "../sim/errors";
import type { SimEvent } from "../sim/types";
import { World, type WorldDeps } from "../sim/world";
import { Simulator, type SimulationReport, type SimulatorOptions } from "./simulator";

export type RunSimulationOptions = {
  seed: number;
  days: number;
  hours?: number;
  name?: string;
  locations?: number;
  npcs?: number;
  minutesPerStep?: number;
  deps?: WorldDeps;
  simulator?: SimulatorOptions;
};

export type RunSimulationResult = {
  world: World;
  report: SimulationReport;
  // Every event published during the run, including world creation.
  events: SimEvent[];
};

export const DEFAULT_LOCATIONS = 8;
export const DEFAULT_NPCS = 20;

export function runSimulation(opts: RunSimulationOptions): RunSimulationResult {
  if (!Number.isInteger(opts.seed)) throw new InvalidArgumentError("seed must be an integer");
  if (!Number.isInteger(opts.days) || opts.days < 0) throw new InvalidArgumentError("days must be >= 0");
  const hours = opts.days * 24 + (opts.hours ?? 0);
  if (!Number.isInteger(hours) || hours < 0) throw new InvalidArgumentError("hours must be a non-negative integer");

  const world = World.createNew(
    {
      name: opts.name,
      seed: opts.seed,
      counts: { locations: opts.locations ?? DEFAULT_LOCATIONS, npcs: opts.npcs ?? DEFAULT_NPCS }
    },
    opts.deps
  );
  return continueSimulation(world, hours, opts);
}

/** Runs an existing world for `hours` more hours. */
export function continueSimulation(
  world: World,
  hours: number,
  opts: { minutesPerStep?: number; simulator?: SimulatorOptions } = {}
): RunSimulationResult {
  const events: SimEvent[] = world.events.all();
  const off = world.events.onAny((e) => events.push(e));
  const sim = new Simulator(world, opts.simulator);
  try {
    const report = hours > 0 ? sim.simulateHours(hours, opts.minutesPerStep) : { steps: 0, minutes: 0, eventsEmitted: 0, errors: 0 };
    return { world, report, events };
  } finally {
    off();
  }
}

/**
 * Simulation configuration
 * Controls thresholds, rates and limits. Passed explicitly to each World; there is no global copy.
 */

import { InvalidArgumentError } from "./errors";
import type { SimMinute, WorkWindow } from "./types";

// =============================================================================
// CONFIGURATION TYPE
// =============================================================================

/** Complete simulation configuration */
export type SimConfig = {
  /** Behavior tuning parameters */
  tuning: TuningParams;

  /** Calendar start and default schedules */
  clock: ClockParams;

  /** Size limits */
  limits: PerformanceLimits;

  /** Debug options */
  debug: DebugOptions;
};

/** Tuning parameters. Rates are per sim-minute unless the name says otherwise. */
export type TuningParams = {
  // Sleep
  sleepThreshold: number;
  wakeThreshold: number;
  sleepRecoveryPerMinute: number;

  // Hunger / eating
  eatThreshold: number;
  hungerGainPerMinute: number;
  eatHungerReduction: number;
  eatMoodImpact: number;
  hungryNoFoodMoodImpact: number;

  // Energy
  energyDecayPerMinute: number;
  workEnergyCostPerMinute: number;

  // Crafting
  craftChancePerMinute: number;
  craftMoodImpact: number;

  // Social
  socialBaseChance: number;
  socialMoodWeight: number;
  socialCrowdBonus: number;
  socialMaxChance: number;
  socialMoodImpact: number;

  // Mood (settles around the NPC's temperament)
  moodHalfLifeMinutes: number;
  lowEnergyMoodPenalty: number;
  highHungerMoodPenalty: number;
  restedMoodImpact: number;
  arrivalMoodImpact: number;
};

export type ClockParams = {
  /** Minute counter value a new world starts at (year 1, day 1, 08:00). */
  startMinute: SimMinute;
  defaultWorkWindow: WorkWindow;
};

/** Performance limits */
export type PerformanceLimits = {
  eventHistoryCap: number;
  memoryEntriesPerNpc: number;
  inventoryPerNpc: number;
  snapshotEventTail: number;
};

/** Debug options */
export type DebugOptions = {
  logTicks: boolean;
  /** Warn through the World's logger whenever an event listener throws. */
  logListenerFailures: boolean;
};

/** Where out-of-band failures go. The simulation itself reports through events. */
export type Logger = Pick<Console, "info" | "warn" | "error">;

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

/** Default tuning parameters */
export const defaultTuning: TuningParams = {
  // Sleep
  sleepThreshold: 20,
  wakeThreshold: 80,
  sleepRecoveryPerMinute: 0.5,

  // Hunger / eating
  eatThreshold: 60,
  hungerGainPerMinute: 0.05,
  eatHungerReduction: 45,
  eatMoodImpact: 3,
  hungryNoFoodMoodImpact: -3,

  // Energy
  energyDecayPerMinute: 0.05,
  workEnergyCostPerMinute: 0.1,

  // Crafting
  craftChancePerMinute: 0.004,
  craftMoodImpact: 4,

  // Social
  socialBaseChance: 0.1,
  socialMoodWeight: 0.4,
  socialCrowdBonus: 0.05,
  socialMaxChance: 0.9,
  socialMoodImpact: 4,

  // Mood
  moodHalfLifeMinutes: 720,
  lowEnergyMoodPenalty: 10,
  highHungerMoodPenalty: 10,
  restedMoodImpact: 2,
  arrivalMoodImpact: 1,
};

export const defaultClock: ClockParams = {
  startMinute: 8 * 60,
  defaultWorkWindow: { startHour: 8, endHour: 18 },
};

/** Default performance limits */
export const defaultLimits: PerformanceLimits = {
  eventHistoryCap: 1000,
  memoryEntriesPerNpc: 20,
  inventoryPerNpc: 24,
  snapshotEventTail: 200,
};

/** Default debug options */
export const defaultDebug: DebugOptions = {
  logTicks: false,
  logListenerFailures: false,
};

/** Default complete configuration */
export const defaultConfig: SimConfig = {
  tuning: defaultTuning,
  clock: defaultClock,
  limits: defaultLimits,
  debug: defaultDebug,
};

// =============================================================================
// CONFIGURATION HELPERS
// =============================================================================

/** Config override type allowing partial nested objects */
export type SimConfigOverrides = {
  tuning?: Partial<TuningParams>;
  clock?: Partial<ClockParams>;
  limits?: Partial<PerformanceLimits>;
  debug?: Partial<DebugOptions>;
};

/** Create config with custom overrides */
export function createConfig(overrides: SimConfigOverrides = {}): SimConfig {
  return validateConfig({
    tuning: { ...defaultTuning, ...overrides.tuning },
    clock: { ...defaultClock, ...overrides.clock },
    limits: { ...defaultLimits, ...overrides.limits },
    debug: { ...defaultDebug, ...overrides.debug },
  });
}

function isHour(h: number): boolean {
  return Number.isInteger(h) && h >= 0 && h <= 24;
}

function inNeedRange(n: number): boolean {
  return Number.isFinite(n) && n >= 0 && n <= 100;
}

export function validateConfig(cfg: SimConfig): SimConfig {
  const t = cfg.tuning;
  const problems: string[] = [];

  for (const key of ["sleepThreshold", "wakeThreshold", "eatThreshold"] as const) {
    if (!inNeedRange(t[key])) problems.push(`tuning.${key} must be within 0..100`);
  }
  if (t.sleepThreshold >= t.wakeThreshold) problems.push("tuning.sleepThreshold must be below tuning.wakeThreshold");
  for (const [key, value] of Object.entries(t)) {
    if (!Number.isFinite(value)) problems.push(`tuning.${key} must be a finite number`);
  }
  if (!(t.moodHalfLifeMinutes > 0)) problems.push("tuning.moodHalfLifeMinutes must be > 0");
  if (t.socialMaxChance < 0 || t.socialMaxChance > 1) problems.push("tuning.socialMaxChance must be within 0..1");

  if (!Number.isInteger(cfg.clock.startMinute) || cfg.clock.startMinute < 0) {
    problems.push("clock.startMinute must be a non-negative integer");
  }
  const w = cfg.clock.defaultWorkWindow;
  if (!isHour(w.startHour) || !isHour(w.endHour)) problems.push("clock.defaultWorkWindow hours must be integers 0..24");

  for (const [key, value] of Object.entries(cfg.limits)) {
    if (!Number.isInteger(value) || value < 1) problems.push(`limits.${key} must be an integer >= 1`);
  }

  if (problems.length) throw new InvalidArgumentError(`Invalid config: ${problems.join("; ")}`, { problems });
  return cfg;
}

/** Same as createConfig but with a deeper event history, for runs that count events. */
export function createTestConfig(overrides: SimConfigOverrides = {}): SimConfig {
  return createConfig({
    ...overrides,
    limits: { eventHistoryCap: 5000, ...overrides.limits },
  });
}

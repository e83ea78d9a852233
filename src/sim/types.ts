/**
 * Core simulation types.
 *
 * The simulation produces state + events; the API layer, rendering and accounts live elsewhere.
 *
 * Time unit: 1 sim-minute. A tick advances the clock by a caller-chosen number of minutes.
 */

export type SimMinute = number;

export type EntityId = string;
export type NpcId = EntityId;
export type LocationId = EntityId;

export type EntityKind = "npc" | "location";

export type Season = "spring" | "summer" | "autumn" | "winter";

export type TimeOfDay = "night" | "dawn" | "morning" | "afternoon" | "dusk" | "evening";

export type HourOfDay = number; // 0..23

export type WorkWindow = {
  startHour: HourOfDay;
  // Exclusive. A window with endHour <= startHour wraps past midnight.
  endHour: HourOfDay;
};

export type NeedKey = "energy" | "hunger" | "mood";

// 0..100 each. Hunger grows, energy drains.
export type Needs = Record<NeedKey, number>;

export type NpcActivity = "idle" | "working" | "eating" | "sleeping" | "socializing" | "traveling";

export type BaseEntity = {
  id: EntityId;
  kind: EntityKind;
  name: string;
  active: boolean;
  createdAt: SimMinute;
};

export type TravelPlan = {
  destinationId: LocationId;
  // Hops still to take, nearest first. Does not include the current location.
  path: LocationId[];
  startedAt: SimMinute;
};

export type MemoryKind = "ate" | "socialized" | "crafted" | "rested" | "arrived" | "went_hungry";

export type MemoryEntry = {
  at: SimMinute;
  kind: MemoryKind;
  // Signed mood contribution before recency weighting.
  impact: number;
  note: string;
};

export type ItemQuality = "Poor" | "Standard" | "Fine" | "Excellent" | "Masterwork";

export type InventoryItem = {
  name: string;
  template: string;
  quality: ItemQuality | null;
  value: number;
};

export type NpcState = BaseEntity & {
  kind: "npc";
  race: string;
  title: string;
  professions: string[];
  // 1..10, drives crafting odds and quality.
  skill: number;
  description: string;

  needs: Needs;
  // Resting mood the memory-weighted mood settles around.
  temperament: number;
  activity: NpcActivity;

  // Weak reference; null only while the NPC is being created.
  locationId: LocationId | null;
  workSiteId: LocationId | null;
  travel?: TravelPlan;

  memory: MemoryEntry[]; // bounded
  inventory: InventoryItem[]; // bounded
  gold: number;
};

export type WeatherCondition = "clear" | "cloudy" | "rain" | "storm" | "fog" | "snow" | "heatwave";

export type Weather = {
  condition: WeatherCondition;
  temperatureC: number;
  since: SimMinute;
};

export type LocationState = BaseEntity & {
  kind: "location";
  locationType: string;
  biome: string;
  description: string;
  environmentTags: string[];
  connections: LocationId[];

  // Ordered set of NPC ids currently here.
  npcIds: NpcId[];
  weather: Weather | null;
  hasFood: boolean;
  isMarket: boolean;
  marketOpen: boolean;
};

export type Entity = NpcState | LocationState;

export type EventKind =
  | "world.created"
  | "npc.spawned"
  | "entity.removed"
  | "npc.activity.changed"
  | "item.crafted"
  | "travel.started"
  | "travel.completed"
  | "travel.aborted"
  | "location.exited"
  | "location.entered"
  | "market.opened"
  | "market.closed"
  | "weather.changed"
  | "clock.day.started"
  | "clock.season.changed"
  | "clock.year.started"
  | "sim.error"
  | `custom.${string}`;

export type SimEvent = {
  seq: number;
  id: string;
  kind: EventKind;
  at: SimMinute;
  message: string;
  sourceId?: EntityId;
  // The other party: a chat partner, a journey's destination.
  targetId?: EntityId;
  locationId?: LocationId;
  data?: Record<string, unknown>;
};

export type EventDraft = Omit<SimEvent, "seq" | "id">;

export type ClockSnapshot = {
  totalMinutes: SimMinute;
  year: number;
  month: number; // 1..12
  dayOfMonth: number; // 1..30
  dayOfYear: number; // 1..360
  day: number; // absolute day index, 0-based
  hour: HourOfDay;
  minute: number;
  season: Season;
  timeOfDay: TimeOfDay;
  isDaytime: boolean;
};

export type TickSummary = {
  fromMinute: SimMinute;
  toMinute: SimMinute;
  deltaMinutes: number;
  changedEntityIds: EntityId[];
  eventsEmitted: number;
  // Events from this tick still retained by the bus (a tiny cap may have evicted some).
  events: SimEvent[];
  errors: number;
};

export function isNpc(e: Entity): e is NpcState {
  return e.kind === "npc";
}

export function isLocation(e: Entity): e is LocationState {
  return e.kind === "location";
}

export * from "./sim/types";
export * from "./sim/errors";
export { createConfig, defaultConfig, validateConfig, type Logger, type SimConfig, type SimConfigOverrides } from "./sim/config";
export { WorldClock, type AdvanceResult, type ScheduleHandle, type ScheduleOptions } from "./sim/clock";
export { EventBus, type EventListener, type Unsubscribe } from "./sim/eventBus";
export { World, type CreateWorldRequest, type WorldDeps, type WorldState, type WorldSummary } from "./sim/world";
export { ProfessionCatalog, type ProfessionDef } from "./sim/professions";
export { Rng } from "./sim/rng";
export { TableGenerator } from "./sim/generation/tableGenerator";
export { npcFromRecord, locationFromRecord } from "./sim/generation/entityFactory";
export type { ContentGenerator, DescriptiveRecord, GenerationRequest, NpcRequest } from "./sim/generation/types";
export { serialize, deserialize, takeSnapshot, encodeSnapshot, decodeSnapshot, type Snapshot, type SerializeOptions } from "./sim/snapshot";
export { Simulator, type RunOptions, type RunResult, type StepCallback } from "./runner/simulator";
export { Autosaver, type AutosaveOptions } from "./service/autosave";
export { saveWorld, loadWorld, listSaves, deleteSave } from "./service/persist";
export { openEventLog, readEventLog } from "./service/eventLog";

/**
 * Boundary types between the content generator and the simulation core.
 *
 * Records are plain JSON-shaped values. Only the EntityFactory reads them; nothing
 * past the factory sees a record.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type DescriptiveRecord = { [key: string]: JsonValue };

export type GenerationCounts = {
  locations: number;
  npcs: number;
};

export type GenerationTemplates = {
  // Restrict which table rows are used; unknown names are ignored.
  locationTypes?: string[];
  races?: string[];
  professions?: string[];
};

export type GenerationRequest = {
  seed: number;
  counts: GenerationCounts;
  templates?: GenerationTemplates;
};

export type GeneratedContent = {
  locations: DescriptiveRecord[];
  npcs: DescriptiveRecord[];
};

export type NpcRequest = {
  seed: number;
  professions?: string[];
  race?: string;
};

/**
 * Generation collaborator. Synchronous and idempotent: the same request always
 * yields the same records.
 */
export interface ContentGenerator {
  generate(request: GenerationRequest): GeneratedContent;
  generateNpc(request: NpcRequest): DescriptiveRecord;
}

import type { SimMinute } from "./types";

export function makeId(prefix: string, at: SimMinute, seq: number): string {
  return `${prefix}:${at}:${seq}`;
}

export function makeEntityId(prefix: string, seq: number): string {
  return `${prefix}:${seq}`;
}

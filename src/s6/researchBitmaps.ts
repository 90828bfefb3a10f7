// src/s6/researchBitmaps.ts
import type { RawResearchBitmap } from "./rawRecords.js";
import type { InventedCategory, ResearchInventedSet } from "../world/researchInvented.js";

export function isBitSet(words: ReadonlyArray<number>, index: number): boolean {
  const word = words[index >> 5] ?? 0;
  return ((word >>> (index & 31)) & 1) === 1;
}

function importCategory(
  invented: ResearchInventedSet,
  category: InventedCategory,
  words: ReadonlyArray<number>,
): number {
  invented.clear(category);
  let count = 0;
  for (let i = 0; i < invented.size(category); i++) {
    if (isBitSet(words, i)) {
      invented.setInvented(category, i);
      count++;
    }
  }
  return count;
}

export type InventedCounts = Record<InventedCategory, number>;

/** Resets every category to "not invented", then sets the bits present in the file. */
export function importResearchBitmaps(
  raw: RawResearchBitmap,
  invented: ResearchInventedSet,
): InventedCounts {
  return {
    rideTypes: importCategory(invented, "rideTypes", raw.rideTypes),
    rideEntries: importCategory(invented, "rideEntries", raw.rideEntries),
    sceneryItems: importCategory(invented, "sceneryItems", raw.sceneryItems),
  };
}

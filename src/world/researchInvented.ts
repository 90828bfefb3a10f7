// src/world/researchInvented.ts

export const RIDE_TYPE_COUNT = 91;
export const MAX_RIDE_OBJECTS = 128;
export const MAX_RESEARCHED_SCENERY_ITEMS = 56 * 32;

export type InventedCategory = "rideTypes" | "rideEntries" | "sceneryItems";

const CATEGORY_SIZES: Readonly<Record<InventedCategory, number>> = {
  rideTypes: RIDE_TYPE_COUNT,
  rideEntries: MAX_RIDE_OBJECTS,
  sceneryItems: MAX_RESEARCHED_SCENERY_ITEMS,
};

/** Which ride types, ride entries and scenery items have been invented. */
export class ResearchInventedSet {
  private readonly flags: Record<InventedCategory, boolean[]> = {
    rideTypes: [],
    rideEntries: [],
    sceneryItems: [],
  };

  public constructor() {
    this.clearAll();
  }

  public size(category: InventedCategory): number {
    return CATEGORY_SIZES[category];
  }

  public clear(category: InventedCategory): void {
    this.flags[category] = new Array<boolean>(CATEGORY_SIZES[category]).fill(false);
  }

  public clearAll(): void {
    this.clear("rideTypes");
    this.clear("rideEntries");
    this.clear("sceneryItems");
  }

  public setInvented(category: InventedCategory, index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= CATEGORY_SIZES[category]) {
      throw new RangeError(`${category} index out of range: ${index}`);
    }
    this.flags[category][index] = true;
  }

  public isInvented(category: InventedCategory, index: number): boolean {
    return this.flags[category][index] ?? false;
  }

  public inventedIndices(category: InventedCategory): number[] {
    const out: number[] = [];
    this.flags[category].forEach((v, i) => {
      if (v) out.push(i);
    });
    return out;
  }
}

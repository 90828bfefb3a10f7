// src/s6/repair.ts
//
// Passes that run once every field has been migrated. Each pass is
// best-effort: a failure is reported through `warn` and the next pass runs.

import { NEWS_TEXT_SIZE, USER_STRING_MAX_LENGTH } from "./layout.js";
import { makeLogger, type ImportLogger } from "./log.js";
import { convertByteString, removeFormatting, truncateUtf8 } from "./rct2String.js";
import { countRiders } from "./rideMigrator.js";
import {
  ENTRANCE_TYPE_RIDE_ENTRANCE,
  ENTRANCE_TYPE_RIDE_EXIT,
  OWNERSHIP_AVAILABLE,
  OWNERSHIP_CONSTRUCTION_RIGHTS_AVAILABLE,
  OWNERSHIP_CONSTRUCTION_RIGHTS_OWNED,
  OWNERSHIP_OWNED,
  TILE_ELEMENT_FLAG_GHOST,
  type EntranceElement,
} from "../world/tileElement.js";
import {
  SPRITE_IDENTIFIER_NULL,
  SPRITE_INDEX_NULL,
  SPRITE_LIST_NULL,
  type Ride,
  type Sprite,
  type TileCoordsXYZD,
} from "../world/types.js";
import { MAXIMUM_MAP_SIZE_TECHNICAL, type WorldState } from "../world/worldState.js";

export type RepairReport = {
  ghostFlagsStripped: number;
  tilesMapped: number;
  landOwnershipForSale: number;
  constructionRightsForSale: number;
  entranceExitFixes: number;
  spriteListCycles: number;
  spatialIndexCycles: number;
  disjointSprites: number;
  ridersRecounted: number;
};

/** Clears the ghost flag on decoded elements; raw records stay byte-identical. */
export function stripGhostFlags(world: WorldState): number {
  let n = 0;
  for (const el of world.tileElements) {
    if (el.kind === "raw") continue;
    if (el.flags & TILE_ELEMENT_FLAG_GHOST) {
      el.flags &= ~TILE_ELEMENT_FLAG_GHOST;
      n++;
    }
  }
  return n;
}

export function convertStringsToUtf8(world: WorldState): void {
  world.objective.completedBy = convertByteString(world.objective.completedBy);
  world.objective.scenarioName = convertByteString(world.objective.scenarioName);
  world.objective.scenarioDetails = convertByteString(world.objective.scenarioDetails);

  world.userStrings = world.userStrings.map((s) => {
    if (s === "") return s;
    const text = truncateUtf8(convertByteString(s), USER_STRING_MAX_LENGTH - 1);
    return removeFormatting(text, true);
  });

  for (const item of world.newsItems) {
    if (item.text === "") continue;
    item.text = truncateUtf8(convertByteString(item.text), NEWS_TEXT_SIZE - 1);
  }
}

export type LandRightsCount = { ownership: number; constructionRights: number };

export function countRemainingLandRights(world: WorldState): LandRightsCount {
  let ownership = 0;
  let constructionRights = 0;
  for (let y = 0; y < MAXIMUM_MAP_SIZE_TECHNICAL; y++) {
    for (let x = 0; x < MAXIMUM_MAP_SIZE_TECHNICAL; x++) {
      const surface = world.surfaceAt(x, y);
      if (surface === undefined) continue;
      const flags = surface.ownership;
      if (flags & OWNERSHIP_AVAILABLE && (flags & OWNERSHIP_OWNED) === 0) ownership++;
      else if (
        flags & OWNERSHIP_CONSTRUCTION_RIGHTS_AVAILABLE &&
        (flags & OWNERSHIP_CONSTRUCTION_RIGHTS_OWNED) === 0
      ) {
        constructionRights++;
      }
    }
  }
  world.park.landRemainingOwnershipSales = ownership;
  world.park.landRemainingConstructionSales = constructionRights;
  return { ownership, constructionRights };
}

function rideEntranceAt(
  world: WorldState,
  loc: TileCoordsXYZD,
  entranceType: number,
): EntranceElement | undefined {
  for (const el of world.elementsAt(loc.x, loc.y)) {
    if (el.kind !== "entrance") continue;
    if (el.baseHeight !== loc.z || el.entranceType !== entranceType) continue;
    if (el.flags & TILE_ELEMENT_FLAG_GHOST) continue;
    return el;
  }
  return undefined;
}

function locationIsValid(
  world: WorldState,
  ride: Ride,
  stationIndex: number,
  loc: TileCoordsXYZD,
  entranceType: number,
): EntranceElement | undefined {
  if (loc.x >= MAXIMUM_MAP_SIZE_TECHNICAL || loc.y >= MAXIMUM_MAP_SIZE_TECHNICAL) return undefined;
  const el = rideEntranceAt(world, loc, entranceType);
  if (el === undefined || el.rideIndex !== ride.id || el.stationIndex !== stationIndex) return undefined;
  return el;
}

/** First matching element in scan order, skipping the invisible outer ring. */
function findStationEntrance(
  world: WorldState,
  ride: Ride,
  stationIndex: number,
  entranceType: number,
): TileCoordsXYZD | null {
  for (let x = 1; x < MAXIMUM_MAP_SIZE_TECHNICAL - 1; x++) {
    for (let y = 1; y < MAXIMUM_MAP_SIZE_TECHNICAL - 1; y++) {
      for (const el of world.elementsAt(x, y)) {
        if (el.kind !== "entrance") continue;
        if (el.rideIndex !== ride.id || el.stationIndex !== stationIndex) continue;
        if (el.entranceType !== entranceType) continue;
        return { x, y, z: el.baseHeight, direction: el.direction };
      }
    }
  }
  return null;
}

/**
 * Confirms each station's entrance and exit against the map, taking the
 * element's direction. Locations that point at nothing are searched for;
 * when nothing is found they are cleared. Returns the number of relocations
 * and clears.
 */
export function determineRideEntranceExitLocations(world: WorldState, log: ImportLogger): number {
  let fixes = 0;
  for (const ride of world.activeRides()) {
    ride.stations.forEach((station, stationIndex) => {
      const slots = [
        { key: "entrance", type: ENTRANCE_TYPE_RIDE_ENTRANCE },
        { key: "exit", type: ENTRANCE_TYPE_RIDE_EXIT },
      ] as const;
      for (const { key, type } of slots) {
        const loc = station[key];
        if (loc === null) continue;
        const el = locationIsValid(world, ride, stationIndex, loc, type);
        if (el !== undefined) {
          loc.direction = el.direction;
          continue;
        }
        const found = findStationEntrance(world, ride, stationIndex, type);
        station[key] = found;
        fixes++;
        log.verbose(
          found === null
            ? `Cleared disconnected ${key} of ride ${ride.id}, station ${stationIndex}`
            : `Moved ${key} of ride ${ride.id}, station ${stationIndex} to (${found.x}, ${found.y}, ${found.z})`,
        );
      }
    });
  }
  return fixes;
}

function spriteAt(world: WorldState, index: number): Sprite | undefined {
  return index < world.spriteCapacity ? world.sprites[index] : undefined;
}

/**
 * Walks every sprite list from its head. An edge back to a visited sprite,
 * or to an index past the sprite array, is cut.
 */
export function checkSpriteListCycles(world: WorldState, fix: boolean): number {
  let cycles = 0;
  world.spriteListHead.forEach((head, list) => {
    const visited = new Set<number>();
    let prev: Sprite | undefined;
    let index = head;
    while (index !== SPRITE_INDEX_NULL) {
      const sprite = spriteAt(world, index);
      if (sprite === undefined || visited.has(index)) {
        cycles++;
        if (fix) {
          if (prev) prev.next = SPRITE_INDEX_NULL;
          else world.spriteListHead[list] = SPRITE_INDEX_NULL;
          const first = spriteAt(world, head);
          if (first) first.previous = SPRITE_INDEX_NULL;
        }
        break;
      }
      visited.add(index);
      prev = sprite;
      index = sprite.next;
    }
  });
  return cycles;
}

/** Cuts cycles in the per-quadrant chains of live sprites. */
export function checkSpatialIndexCycles(world: WorldState, fix: boolean): number {
  const UNSEEN = 0;
  const ON_PATH = 1;
  const DONE = 2;
  const state = new Uint8Array(world.spriteCapacity);
  let cycles = 0;

  for (let start = 0; start < world.spriteCapacity; start++) {
    if (state[start] !== UNSEEN) continue;
    const path: number[] = [];
    let index = start;
    for (;;) {
      const sprite = spriteAt(world, index);
      if (sprite === undefined || sprite.identifier === SPRITE_IDENTIFIER_NULL) break;
      if (state[index] !== UNSEEN) break;
      state[index] = ON_PATH;
      path.push(index);

      const next = sprite.nextInQuadrant;
      if (next === SPRITE_INDEX_NULL) break;
      if (state[next] === ON_PATH) {
        cycles++;
        if (fix) sprite.nextInQuadrant = SPRITE_INDEX_NULL;
        break;
      }
      index = next;
    }
    for (const i of path) state[i] = DONE;
  }
  return cycles;
}

/**
 * Appends null sprites that the null list cannot reach to its tail. Returns
 * how many were relinked.
 */
export function fixDisjointSprites(world: WorldState): number {
  const reachable = new Uint8Array(world.spriteCapacity);
  let tail: Sprite | undefined;
  for (let i = world.spriteListHead[SPRITE_LIST_NULL] ?? SPRITE_INDEX_NULL; i !== SPRITE_INDEX_NULL; ) {
    const sprite = spriteAt(world, i);
    if (sprite === undefined || reachable[i] === 1) break;
    reachable[i] = 1;
    tail = sprite;
    i = sprite.next;
  }
  if (tail === undefined) return 0;

  let count = 0;
  for (let i = 0; i < world.sprites.length; i++) {
    const sprite = world.sprites[i];
    if (sprite === undefined || sprite.identifier !== SPRITE_IDENTIFIER_NULL || reachable[i] === 1) continue;
    tail.next = i;
    sprite.next = SPRITE_INDEX_NULL;
    sprite.previous = tail.spriteIndex;
    tail = sprite;
    reachable[i] = 1;
    count++;
  }
  return count;
}

export function recountRiders(world: WorldState): number {
  let total = 0;
  for (const ride of world.activeRides()) {
    ride.numRiders = countRiders(world.sprites, ride.id);
    total += ride.numRiders;
  }
  return total;
}

function emptyReport(): RepairReport {
  return {
    ghostFlagsStripped: 0,
    tilesMapped: 0,
    landOwnershipForSale: 0,
    constructionRightsForSale: 0,
    entranceExitFixes: 0,
    spriteListCycles: 0,
    spatialIndexCycles: 0,
    disjointSprites: 0,
    ridersRecounted: 0,
  };
}

export function repairWorld(world: WorldState, logger: ImportLogger = makeLogger()): RepairReport {
  const report = emptyReport();

  const step = (name: string, fn: () => void): void => {
    try {
      fn();
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      logger.warn(`Repair step '${name}' failed: ${msg}`);
    }
  };

  step("strip ghost flags", () => {
    report.ghostFlagsStripped = stripGhostFlags(world);
  });
  step("tile pointers", () => {
    report.tilesMapped = world.updateTilePointers().tilesMapped;
  });
  step("strings", () => convertStringsToUtf8(world));
  step("land rights", () => {
    const counts = countRemainingLandRights(world);
    report.landOwnershipForSale = counts.ownership;
    report.constructionRightsForSale = counts.constructionRights;
  });
  step("ride entrances", () => {
    report.entranceExitFixes = determineRideEntranceExitLocations(world, logger);
  });
  step("sprite lists", () => {
    report.spriteListCycles = checkSpriteListCycles(world, true);
    report.spatialIndexCycles = checkSpatialIndexCycles(world, true);
    report.disjointSprites = fixDisjointSprites(world);
  });
  step("riders", () => {
    report.ridersRecounted = recountRiders(world);
  });

  if (report.spriteListCycles > 0) logger.warn(`Fixed ${report.spriteListCycles} sprite list cycles`);
  if (report.spatialIndexCycles > 0) logger.warn(`Fixed ${report.spatialIndexCycles} spatial index cycles`);
  if (report.disjointSprites > 0) logger.warn(`Found ${report.disjointSprites} disjoint null sprites`);
  if (report.tilesMapped < MAXIMUM_MAP_SIZE_TECHNICAL * MAXIMUM_MAP_SIZE_TECHNICAL) {
    logger.warn(`Tile elements ran out after ${report.tilesMapped} tiles`);
  }
  logger.verbose(`Stripped ghost flag from ${report.ghostFlagsStripped} elements`);
  return report;
}

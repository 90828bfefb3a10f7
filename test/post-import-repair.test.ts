import { describe, expect, it } from "vitest";

import { makeLogger } from "../src/s6/log.js";
import { toByteString } from "../src/s6/rct2String.js";
import {
  checkSpatialIndexCycles,
  checkSpriteListCycles,
  countRemainingLandRights,
  determineRideEntranceExitLocations,
  fixDisjointSprites,
  recountRiders,
  repairWorld,
  stripGhostFlags,
} from "../src/s6/repair.js";
import {
  ENTRANCE_TYPE_RIDE_ENTRANCE,
  ENTRANCE_TYPE_RIDE_EXIT,
  type TileElement,
} from "../src/world/tileElement.js";
import {
  PEEP_STATE_ENTERING_RIDE,
  PEEP_STATE_ON_RIDE,
  SPRITE_IDENTIFIER_PEEP,
  SPRITE_INDEX_NULL,
  type Sprite,
} from "../src/world/types.js";
import { WorldState } from "../src/world/worldState.js";
import { blankRide, entrance, fillMap, surface, tileKey } from "./helpers/worldFixture.js";

function sprite(world: WorldState, index: number): Sprite {
  const s = world.sprites[index];
  if (s === undefined) throw new Error(`no sprite ${index}`);
  return s;
}

function makePeep(world: WorldState, index: number, state: number, ride: number): void {
  const s = sprite(world, index);
  s.identifier = SPRITE_IDENTIFIER_PEEP;
  s.peepState = state;
  s.peepCurrentRide = ride;
}

describe("stripGhostFlags", () => {
  it("clears decoded elements and leaves raw records alone", () => {
    const world = new WorldState();
    world.tileElements = [
      surface(0, 0x90),
      surface(0, 0x80),
      { kind: "raw", bytes: Uint8Array.from([0, 0x90, 0xff, 0xff, 0, 0, 0, 0]) },
    ];

    expect(stripGhostFlags(world)).toBe(1);
    const [first, , raw] = world.tileElements;
    expect(first?.kind === "surface" ? first.flags : -1).toBe(0x80);
    expect(raw?.kind === "raw" ? raw.bytes[1] : -1).toBe(0x90);
  });
});

describe("countRemainingLandRights", () => {
  it("counts unowned tiles that are for sale", () => {
    const world = new WorldState();
    const ownership = new Map([
      [tileKey(0, 0), 0x80],
      [tileKey(1, 0), 0x40],
      [tileKey(2, 0), 0x50],
      [tileKey(3, 0), 0xa0],
      [tileKey(9, 9), 0x80],
    ]);
    fillMap(world, { ownershipAt: (x, y) => ownership.get(tileKey(x, y)) ?? 0 });

    expect(countRemainingLandRights(world)).toEqual({ ownership: 2, constructionRights: 1 });
    expect(world.park.landRemainingOwnershipSales).toBe(2);
    expect(world.park.landRemainingConstructionSales).toBe(1);
  });

  it("counts construction rights still for sale on an owned tile", () => {
    const world = new WorldState();
    const ownership = new Map([
      [tileKey(4, 4), 0x60],
      [tileKey(5, 4), 0x70],
    ]);
    fillMap(world, { ownershipAt: (x, y) => ownership.get(tileKey(x, y)) ?? 0 });

    expect(countRemainingLandRights(world)).toEqual({ ownership: 0, constructionRights: 1 });
  });
});

describe("determineRideEntranceExitLocations", () => {
  function worldWithStations(): WorldState {
    const world = new WorldState();
    const extras = new Map<number, TileElement[]>([
      [
        tileKey(10, 20),
        [entrance({ entranceType: ENTRANCE_TYPE_RIDE_ENTRANCE, rideIndex: 3, stationIndex: 0, direction: 2, baseHeight: 14 })],
      ],
      [
        tileKey(30, 40),
        [entrance({ entranceType: ENTRANCE_TYPE_RIDE_EXIT, rideIndex: 3, stationIndex: 0, direction: 1, baseHeight: 16 })],
      ],
    ]);
    fillMap(world, { extras });
    return world;
  }

  it("takes the direction of a valid location and relocates a stale one", () => {
    const world = worldWithStations();
    const ride = blankRide(3);
    const station = ride.stations[0];
    if (station === undefined) throw new Error("no station");
    station.entrance = { x: 10, y: 20, z: 14, direction: 0 };
    station.exit = { x: 50, y: 50, z: 14, direction: 0 };
    world.rides[3] = ride;

    const messages: string[] = [];
    const fixes = determineRideEntranceExitLocations(world, makeLogger({ verbose: (m) => messages.push(m) }));

    expect(fixes).toBe(1);
    expect(station.entrance).toEqual({ x: 10, y: 20, z: 14, direction: 2 });
    expect(station.exit).toEqual({ x: 30, y: 40, z: 16, direction: 1 });
    expect(messages).toEqual(["Moved exit of ride 3, station 0 to (30, 40, 16)"]);
  });

  it("clears a location nothing matches", () => {
    const world = worldWithStations();
    const ride = blankRide(7);
    const station = ride.stations[1];
    if (station === undefined) throw new Error("no station");
    station.entrance = { x: 10, y: 20, z: 14, direction: 0 };
    world.rides[7] = ride;

    expect(determineRideEntranceExitLocations(world, makeLogger())).toBe(1);
    expect(station.entrance).toBeNull();
  });
});

describe("checkSpriteListCycles", () => {
  it("cuts the edge that closes a cycle", () => {
    const world = new WorldState();
    sprite(world, 5).next = 2;

    expect(checkSpriteListCycles(world, false)).toBe(1);
    expect(sprite(world, 5).next).toBe(2);

    expect(checkSpriteListCycles(world, true)).toBe(1);
    expect(sprite(world, 5).next).toBe(SPRITE_INDEX_NULL);
    expect(checkSpriteListCycles(world, true)).toBe(0);
  });

  it("drops a head that points past the sprite array", () => {
    const world = new WorldState();
    world.spriteListHead[2] = 20000;
    expect(checkSpriteListCycles(world, true)).toBe(1);
    expect(world.spriteListHead[2]).toBe(SPRITE_INDEX_NULL);
  });
});

describe("checkSpatialIndexCycles", () => {
  it("cuts a loop among live sprites", () => {
    const world = new WorldState();
    for (const [i, next] of [[10, 11], [11, 12], [12, 10]] as const) {
      makePeep(world, i, 0, 0);
      sprite(world, i).nextInQuadrant = next;
    }

    expect(checkSpatialIndexCycles(world, true)).toBe(1);
    expect(sprite(world, 12).nextInQuadrant).toBe(SPRITE_INDEX_NULL);
    expect(sprite(world, 10).nextInQuadrant).toBe(11);
    expect(checkSpatialIndexCycles(world, true)).toBe(0);
  });
});

describe("fixDisjointSprites", () => {
  it("appends unreachable null sprites to the tail", () => {
    const world = new WorldState();
    sprite(world, 3).next = 7;
    sprite(world, 7).previous = 3;

    expect(fixDisjointSprites(world)).toBe(3);
    expect(sprite(world, 9999).next).toBe(4);
    expect(sprite(world, 4).previous).toBe(9999);
    expect(sprite(world, 5).previous).toBe(4);
    expect(sprite(world, 6).previous).toBe(5);
    expect(sprite(world, 6).next).toBe(SPRITE_INDEX_NULL);
    expect(fixDisjointSprites(world)).toBe(0);
  });
});

describe("recountRiders", () => {
  it("counts peeps on or entering each ride", () => {
    const world = new WorldState();
    const ride = blankRide(0);
    ride.numRiders = 50;
    world.rides[0] = ride;
    makePeep(world, 100, PEEP_STATE_ON_RIDE, 0);
    makePeep(world, 101, PEEP_STATE_ENTERING_RIDE, 0);
    makePeep(world, 102, PEEP_STATE_ON_RIDE, 1);
    makePeep(world, 103, 0, 0);
    // a null sprite with peep fields set
    sprite(world, 104).peepState = PEEP_STATE_ON_RIDE;

    expect(recountRiders(world)).toBe(2);
    expect(ride.numRiders).toBe(2);
  });
});

describe("repairWorld", () => {
  it("runs every pass and reports what it fixed", () => {
    const world = new WorldState();
    fillMap(world, { ownershipAt: (x, y) => (x === 0 && y === 0 ? 0x80 : 0) });
    sprite(world, 5).next = 2;
    world.userStrings[0] = toByteString(Uint8Array.from([0x01, 0x48, 0x8e, 0x69]));
    world.userStrings[1] = "A".repeat(40);
    world.objective.completedBy = toByteString(Uint8Array.from([0x9f]));
    const news = world.newsItems[0];
    if (news === undefined) throw new Error("no news item");
    news.type = 1;
    news.text = toByteString(new Uint8Array(100).fill(0xb5));

    const warnings: string[] = [];
    const report = repairWorld(world, makeLogger({ warn: (m) => warnings.push(m) }));

    expect(report).toEqual({
      ghostFlagsStripped: 0,
      tilesMapped: 65536,
      landOwnershipForSale: 1,
      constructionRightsForSale: 0,
      entranceExitFixes: 0,
      spriteListCycles: 1,
      spatialIndexCycles: 0,
      disjointSprites: 9994,
      ridersRecounted: 0,
    });
    expect(warnings).toEqual(["Fixed 1 sprite list cycles", "Found 9994 disjoint null sprites"]);
    expect(world.userStrings[0]).toBe("H\u008ei");
    expect(world.userStrings[1]).toBe("A".repeat(31));
    expect(world.objective.completedBy).toBe("Ą");
    expect(news.text).toBe("€".repeat(85));
  });

  it("keeps going after a pass fails", () => {
    const world = new WorldState();
    fillMap(world);
    world.surfaceAt = () => {
      throw new Error("boom");
    };
    const ride = blankRide(0);
    ride.numRiders = 9;
    world.rides[0] = ride;

    const warnings: string[] = [];
    const report = repairWorld(world, makeLogger({ warn: (m) => warnings.push(m) }));

    expect(warnings).toEqual(["Repair step 'land rights' failed: boom"]);
    expect(report.tilesMapped).toBe(65536);
    expect(ride.numRiders).toBe(0);
  });

  it("warns when the elements run out before the map does", () => {
    const world = new WorldState();
    const warnings: string[] = [];
    repairWorld(world, makeLogger({ warn: (m) => warnings.push(m) }));
    expect(warnings).toEqual(["Tile elements ran out after 0 tiles"]);
  });
});

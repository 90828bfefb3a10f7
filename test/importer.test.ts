import { beforeAll, describe, expect, it } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  AssetResolutionError,
  ChecksumError,
  FormatError,
  TruncatedDataError,
  UnsupportedFormatError,
} from "../src/s6/errors.js";
import { encryptMoney } from "../src/s6/fieldMigrator.js";
import type { ImporterConfig } from "../src/s6/config.js";
import { loadPark, S6Importer, type ImportPhase, type ImportResult } from "../src/s6/importer.js";
import { InMemoryObjectRepository, type ObjectRepository } from "../src/s6/objectRepository.js";
import { countTileElements, summarizeParkFile } from "../src/s6/summary.js";
import { WorldState } from "../src/world/worldState.js";
import {
  buildParkFile,
  createParkRegion,
  newsOffset,
  PARK,
  RIDE,
  rideOffset,
  spriteOffset,
  SPRITE,
  surfaceRecord,
  tileRecord,
  writePeep,
  writeText,
} from "./helpers/s6Fixture.js";

function savedGamePark(): Buffer {
  const park = createParkRegion(150);

  // three peeps taken off the end of the null list
  park.writeUInt16LE(0xffff, spriteOffset(9996) + SPRITE.next);
  writePeep(park, { index: 9997, state: 3, ride: 0, next: 9998, previous: 0xffff });
  writePeep(park, { index: 9998, state: 7, ride: 0, next: 9999, previous: 9997 });
  writePeep(park, { index: 9999, state: 3, ride: 1, next: 0xffff, previous: 9998 });
  park.writeUInt16LE(9997, PARK.listCount);
  park.writeUInt16LE(9997, PARK.listHead + 4);
  park.writeUInt16LE(3, PARK.listCount + 4);

  park.writeUInt16LE(100, PARK.peepSpawns);
  park.writeUInt16LE(100, PARK.peepSpawns + 2);
  park.writeUInt8(5, PARK.peepSpawns + 4);
  park.writeUInt8(1, PARK.peepSpawns + 5);

  park.writeUInt32LE(encryptMoney(123456), PARK.cash);
  park.writeUInt32LE(0x20, PARK.rideTypes);
  park.writeUInt32LE(1, PARK.sceneryItems + 4);

  writeText(park, PARK.scenarioFilename, "My Park.SV6");
  writeText(park, PARK.scenarioName, "Test Park");
  park.set([0x48, 0x01, 0x69], PARK.customStrings);
  park.set([0x8e, 0x47, 0x6f], PARK.customStrings + 32);

  park.writeUInt8(1, newsOffset(0));
  writeText(park, newsOffset(0) + 12, "Hello");
  park.writeUInt8(12, newsOffset(1));
  writeText(park, newsOffset(1) + 12, "Bad");
  park.writeUInt8(2, newsOffset(2));
  writeText(park, newsOffset(2) + 12, "Later");

  park.writeInt16LE(320, PARK.entranceX);
  park.writeInt16LE(640, PARK.entranceY);
  park.writeInt16LE(112, PARK.entranceZ);
  park.writeUInt8(3, PARK.entranceDir);

  const ride = rideOffset(0);
  park.writeUInt8(1, ride + RIDE.type);
  park.writeUInt8(2, ride + RIDE.status);
  park.writeUInt8(1, ride + RIDE.numStations);
  park.writeUInt8(14, ride + RIDE.stationHeights);
  park.set([1, 0], ride + RIDE.entrances);
  for (let station = 1; station < 4; station++) park.writeUInt16LE(0xffff, ride + RIDE.entrances + station * 2);
  for (let station = 0; station < 4; station++) park.writeUInt16LE(0xffff, ride + RIDE.exits + station * 2);

  return park;
}

const SAVED_GAME_TILES = [
  surfaceRecord(0x20),
  surfaceRecord(0x80, 0x00),
  // ghost ride entrance for ride 0, station 0, facing direction 2
  tileRecord({ type: 0x12, flags: 0x90, baseHeight: 14, clearanceHeight: 18 }),
  surfaceRecord(0x40),
  surfaceRecord(0x50),
];

function savedGameFile(overrides: { objects?: string[]; checksum?: boolean } = {}): Buffer {
  return buildParkFile({
    kind: "savedGame",
    objects: overrides.objects,
    date: { elapsedMonths: 17, currentDay: 1234, scenarioTicks: 99, srand0: 1, srand1: 2 },
    tiles: SAVED_GAME_TILES,
    park: savedGamePark(),
    checksum: overrides.checksum,
  });
}

function scenarioFile(): Buffer {
  const park = createParkRegion(64);
  writeText(park, PARK.scenarioFilename, "Amity Airfield.SC6");
  park.writeUInt16LE(10, PARK.peepSpawns);
  park.writeUInt16LE(20, PARK.peepSpawns + 2);
  park.writeUInt8(2, PARK.peepSpawns + 4);
  park.writeUInt16LE(30, PARK.peepSpawns + 6);
  park.writeUInt16LE(40, PARK.peepSpawns + 8);
  park.writeUInt8(3, PARK.peepSpawns + 10);
  park.writeUInt8(2, PARK.peepSpawns + 11);
  // not part of any scenario chunk
  park.writeUInt32LE(0xffffffff, PARK.rideTypes);

  return buildParkFile({
    kind: "scenario",
    scenarioName: Buffer.from("Amity", "latin1"),
    scenarioDetails: Buffer.from("Fly in \xb5", "latin1"),
    packedObjects: [{ name: "PACKOBJ", data: Uint8Array.from([1, 2, 3]) }],
    objects: ["PACKOBJ", "RIDE01"],
    park,
  });
}

describe("S6Importer on a saved game", () => {
  let world: WorldState;
  let result: ImportResult;
  let importer: S6Importer;
  const warnings: string[] = [];

  beforeAll(() => {
    importer = new S6Importer(new InMemoryObjectRepository(), { warn: (m) => warnings.push(m) });
    const load = importer.loadFromBuffer(savedGameFile(), false, "/saves/park.sv6");
    expect(load.kind).toBe("savedGame");
    expect(importer.phase).toBe("chunksLoaded");

    world = new WorldState();
    result = importer.import(world);
  });

  it("ends in the done phase", () => {
    expect(importer.phase).toBe("done");
    expect(importer.error).toBeUndefined();
  });

  it("copies the date block", () => {
    expect(world.date.monthsElapsed).toBe(17);
    expect(world.date.monthTicks).toBe(1234);
    expect(world.date.scenarioTicks).toBe(99);
    expect(world.randomSeeds).toEqual([1, 2]);
  });

  it("scales peep spawn heights and drops empty slots", () => {
    expect(world.peepSpawns).toEqual([{ x: 100, y: 100, z: 80, direction: 1, slot: 0 }]);
  });

  it("decrypts cash", () => {
    expect(world.finance.cash).toBe(123456);
  });

  it("imports the research bitmaps", () => {
    expect(result.invented).toEqual({ rideTypes: 1, rideEntries: 0, sceneryItems: 1 });
    expect(world.invented.inventedIndices("rideTypes")).toEqual([5]);
    expect(world.invented.inventedIndices("sceneryItems")).toEqual([32]);
  });

  it("keeps the stored scenario file name", () => {
    expect(result.scenarioFileName).toBe("My Park.SV6");
    expect(result.quirkApplied).toBe(false);
    expect(world.objective.scenarioFileName).toBe("My Park.SV6");
  });

  it("converts stored text", () => {
    expect(world.objective.scenarioName).toBe("Test Park");
    expect(world.userStrings[0]).toBe("Hi");
    expect(world.userStrings[1]).toBe("\u008eGo");
    expect(world.userStrings[2]).toBe("");
  });

  it("stops reading news at the first invalid type", () => {
    expect(world.newsItems[0]).toMatchObject({ type: 1, text: "Hello" });
    expect(world.newsItems[1]?.type).toBe(0);
    expect(world.newsItems[2]).toMatchObject({ type: 0, text: "" });
    expect(warnings).toEqual(["Invalid news type 0xc for news item 1, ignoring remaining news items"]);
  });

  it("keeps only defined park entrances", () => {
    expect(world.park.entrances).toEqual([{ x: 320, y: 640, z: 112, direction: 3 }]);
    expect(world.map.size).toBe(150);
  });

  it("decodes the tile elements and maps every tile", () => {
    expect(countTileElements(world.tileElements)).toEqual({ surface: 4, entrance: 1, raw: 196603 });
    expect(world.surfaceAt(0, 0)?.ownership).toBe(0x20);
    expect(world.elementsAt(1, 0).map((e) => e.kind)).toEqual(["surface", "entrance"]);
    expect(world.elementsAt(4, 0).map((e) => e.kind)).toEqual(["raw"]);
  });

  it("repairs the world", () => {
    expect(result.repair).toEqual({
      ghostFlagsStripped: 1,
      tilesMapped: 65536,
      landOwnershipForSale: 1,
      constructionRightsForSale: 1,
      entranceExitFixes: 0,
      spriteListCycles: 0,
      spatialIndexCycles: 0,
      disjointSprites: 0,
      ridersRecounted: 2,
    });
  });

  it("migrates the ride and fixes up its entrance", () => {
    const ride = world.getRide(0);
    expect(ride?.type).toBe(1);
    expect(ride?.status).toBe(2);
    expect(ride?.numRiders).toBe(2);
    expect(ride?.stations[0]?.entrance).toEqual({ x: 1, y: 0, z: 14, direction: 2 });
    expect(ride?.stations[0]?.exit).toBeNull();
    expect(world.getRide(1)).toBeNull();
  });

  it("keeps the sprite lists from the file", () => {
    expect(world.spriteListHead[0]).toBe(0);
    expect(world.spriteListHead[2]).toBe(9997);
    expect(world.spriteListCount[0]).toBe(9997);
    expect(world.sprites[9998]?.peepState).toBe(7);
  });
});

describe("S6Importer on a scenario", () => {
  it("reads the info block, packed objects and the scenario chunks", () => {
    const objects = new InMemoryObjectRepository(["ride01"]);
    const importer = new S6Importer(objects);
    const load = importer.loadFromBuffer(scenarioFile(), true, "/parks/amity.sc6");

    expect(load.kind).toBe("scenario");
    expect(load.requiredObjects).toHaveLength(721);
    expect(objects.packedObject("PACKOBJ")).toEqual(Buffer.from([1, 2, 3]));
    objects.loadObjects(load.requiredObjects);
    expect(objects.loadedIdentifiers).toEqual(["PACKOBJ", "RIDE01"]);

    const world = new WorldState();
    const result = importer.import(world);

    expect(world.scenarioInfo.name).toBe("Amity");
    expect(world.scenarioInfo.details).toBe("Fly in €");
    expect(world.objective.scenarioFileName).toBe("amity.sc6");
    expect(result.scenarioFileName).toBe("Amity Airfield.SC6");
    expect(result.quirkApplied).toBe(true);
    expect(world.peepSpawns).toEqual([
      { x: 10, y: 1296, z: 32, direction: 0, slot: 0 },
      { x: 30, y: 40, z: 48, direction: 2, slot: 1 },
    ]);
    expect(result.invented.rideTypes).toBe(0);
    expect(world.map.size).toBe(64);
  });

  it("summarizes the file without importing it", () => {
    const importer = new S6Importer(new InMemoryObjectRepository());
    importer.loadFromBuffer(scenarioFile(), true);
    const parsed = importer.parsedFile;
    if (parsed === undefined) throw new Error("nothing parsed");

    expect(summarizeParkFile(parsed)).toEqual({
      kind: "scenario",
      version: 120001,
      numPackedObjects: 1,
      scenarioName: "Amity",
      scenarioFileName: "Amity Airfield.SC6",
      mapSize: 64,
      requiredObjects: ["PACKOBJ", "RIDE01"],
    });
  });

  it("takes the stored name when loaded from memory", () => {
    const importer = new S6Importer(new InMemoryObjectRepository());
    importer.loadFromBuffer(scenarioFile(), true);
    const world = new WorldState();
    importer.import(world);
    expect(world.objective.scenarioFileName).toBe("Amity Airfield.SC6");
  });
});

describe("S6Importer on reserved tile tags", () => {
  it("keeps the record raw and finishes the import", () => {
    const file = buildParkFile({
      kind: "savedGame",
      tiles: [
        surfaceRecord(0, 0x00),
        tileRecord({ type: 0x24, flags: 0x80, baseHeight: 14, clearanceHeight: 16, b4: 7 }),
      ],
      park: createParkRegion(150),
    });
    const importer = new S6Importer(new InMemoryObjectRepository());
    importer.loadFromBuffer(file, false);
    const world = new WorldState();
    importer.import(world);

    expect(importer.phase).toBe("done");
    expect(countTileElements(world.tileElements)).toEqual({ surface: 1, raw: 196607 });
    expect(world.elementsAt(0, 0).map((e) => e.kind)).toEqual(["surface", "raw"]);
    const reserved = world.elementsAt(0, 0)[1];
    expect(reserved?.kind === "raw" ? Array.from(reserved.bytes) : []).toEqual([0x24, 0x80, 14, 16, 7, 0, 0, 0]);
  });
});

describe("S6Importer failures", () => {
  let savedGame: Buffer;

  beforeAll(() => {
    savedGame = savedGameFile();
  });

  function importer(config: Partial<ImporterConfig> = {}): S6Importer {
    return new S6Importer(new InMemoryObjectRepository(), { config });
  }

  it("rejects a saved game loaded as a scenario", () => {
    const imp = importer();
    expect(() => imp.loadFromBuffer(savedGame, true)).toThrow("Park is not a scenario.");
    expect(imp.phase).toBe("failed");
    expect(imp.error).toBeInstanceOf(FormatError);
  });

  it("rejects unknown type tags and classic saves", () => {
    const unknownType = buildParkFile({ kind: "savedGame", headerType: 7 });
    expect(() => importer().loadFromBuffer(unknownType, false)).toThrow(UnsupportedFormatError);

    const classic = buildParkFile({ kind: "savedGame", classicFlag: 0x0f });
    expect(() => importer().loadFromBuffer(classic, false)).toThrow(UnsupportedFormatError);
  });

  it("checks the checksum unless told not to", () => {
    const corrupt = Buffer.from(savedGame);
    corrupt[10] = (corrupt[10] ?? 0) ^ 0xff;
    expect(() => importer().loadFromBuffer(corrupt, false)).toThrow(ChecksumError);

    const imp = importer({ validateChecksum: false });
    expect(imp.loadFromBuffer(corrupt, false).kind).toBe("savedGame");
    expect(imp.phase).toBe("chunksLoaded");
  });

  it("reports truncated files", () => {
    expect(() => importer().loadFromBuffer(Buffer.alloc(4), false)).toThrow(TruncatedDataError);
    expect(() => importer({ validateChecksum: false }).loadFromBuffer(savedGame.subarray(0, 100), false)).toThrow(
      TruncatedDataError,
    );
  });

  it("refuses to import before a load", () => {
    const imp = importer();
    expect(() => imp.import(new WorldState())).toThrow("import() called before a park was loaded");
    expect(imp.phase).toBe("failed");
  });

  it("has no catalog details of its own", () => {
    expect(importer().getDetails()).toBeUndefined();
  });

  it("is past the header by the time packed objects arrive", () => {
    const phases: ImportPhase[] = [];
    const objects: ObjectRepository = {
      exportPackedObject: () => {
        phases.push(imp.phase);
      },
      loadObjects: () => {},
    };
    const imp = new S6Importer(objects);
    imp.loadFromBuffer(scenarioFile(), true);
    expect(phases).toEqual(["headerRead"]);
  });
});

describe("loadPark", () => {
  let file: string;

  beforeAll(async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "park-importer-"));
    file = path.join(dir, "park.sv6");
    await writeFile(file, savedGameFile({ objects: ["RIDE01", "SHOP01"] }));
  });

  it("fails when objects are missing", () => {
    const objects = new InMemoryObjectRepository(["RIDE01"]);
    try {
      loadPark(file, { objects });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(AssetResolutionError);
      if (e instanceof AssetResolutionError) expect(e.missing).toEqual(["SHOP01"]);
    }
  });

  it("can skip the object check", () => {
    const { load, result } = loadPark(file, {
      objects: new InMemoryObjectRepository(),
      config: { skipObjectCheck: true },
    });
    expect(load.kind).toBe("savedGame");
    expect(result.repair.ridersRecounted).toBe(2);
  });

  it("links extra sprite slots into the null list", () => {
    const { world, result } = loadPark(file, {
      objects: new InMemoryObjectRepository(["RIDE01", "SHOP01"]),
      config: { spriteCapacity: 12000 },
    });
    expect(world.spriteCapacity).toBe(12000);
    expect(world.spriteListHead[0]).toBe(10000);
    expect(world.spriteListCount[0]).toBe(11997);
    expect(world.sprites[11999]?.next).toBe(0);
    expect(world.sprites[0]?.previous).toBe(11999);
    expect(result.repair.disjointSprites).toBe(0);
  });

  it("rejects unknown extensions", () => {
    expect(() => loadPark("/parks/park.txt", { objects: new InMemoryObjectRepository() })).toThrow(
      "Invalid park extension '.txt' (expected .sc6 or .sv6)",
    );
  });
});

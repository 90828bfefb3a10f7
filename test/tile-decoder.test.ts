import { describe, expect, it } from "vitest";

import { FormatError } from "../src/s6/errors.js";
import { decodeTile, importTileRecord, isPassthroughRecord, tileTag } from "../src/s6/tileDecoder.js";
import { isDecoded, isLastForTile } from "../src/world/tileElement.js";

const rec = (...b: number[]): Uint8Array => Uint8Array.from(b);

describe("decodeTile", () => {
  it("decodes a surface", () => {
    expect(decodeTile(rec(0xc1, 0x80, 14, 16, 0x65, 0x4a, 3, 0x2f))).toEqual({
      kind: "surface",
      direction: 1,
      flags: 0x80,
      baseHeight: 14,
      clearanceHeight: 16,
      slope: 5,
      surfaceStyle: 10,
      edgeStyle: 11,
      grassLength: 3,
      ownership: 0x20,
      parkFences: 0x0f,
      waterHeight: 10,
      hasTrackThatNeedsWater: true,
    });
  });

  it("decodes a queue path", () => {
    expect(decodeTile(rec(0x85, 0, 4, 6, 0x3c, 0x25, 0xa5, 7))).toMatchObject({
      kind: "path",
      direction: 1,
      entryIndex: 3,
      queueBannerDirection: 2,
      isSloped: true,
      slopeDirection: 0,
      hasQueueBanner: true,
      isQueue: true,
      isWide: false,
      rideIndex: 7,
      stationIndex: 2,
      edges: 5,
      corners: 10,
      addition: 5,
      additionIsGhost: false,
    });
  });

  it("decodes a track piece", () => {
    expect(decodeTile(rec(0x8b, 0, 8, 12, 0x2a, 0xb3, 0x5e, 9))).toMatchObject({
      kind: "track",
      direction: 3,
      trackType: 42,
      sequenceIndex: 3,
      stationIndex: 3,
      rideIndex: 9,
      colourScheme: 2,
      hasChain: true,
      hasCableLift: true,
      isInverted: true,
      brakeBoosterSpeed: 22,
      hasGreenLight: true,
      seatRotation: 5,
      mazeEntry: 0x5eb3,
      photoTimeout: 11,
    });
  });

  it("decodes small scenery", () => {
    expect(decodeTile(rec(0xce, 0, 2, 4, 17, 40, 0x2b, 0xe6))).toMatchObject({
      kind: "smallScenery",
      direction: 2,
      entryIndex: 17,
      age: 40,
      quadrant: 3,
      primaryColour: 11,
      secondaryColour: 6,
      needsSupports: true,
    });
  });

  it("decodes a ride exit", () => {
    expect(decodeTile(rec(0x12, 0x80, 14, 18, 1, 0x21, 4, 12))).toEqual({
      kind: "entrance",
      direction: 2,
      flags: 0x80,
      baseHeight: 14,
      clearanceHeight: 18,
      entranceType: 1,
      rideIndex: 12,
      stationIndex: 2,
      sequenceIndex: 1,
      pathType: 4,
    });
  });

  it("decodes a wall, taking colour bits from the flags byte", () => {
    expect(decodeTile(rec(0x94, 0xe0, 2, 6, 200, 0x33, 0x47, 0x9c))).toMatchObject({
      kind: "wall",
      flags: 0xe0,
      entryIndex: 200,
      slope: 2,
      primaryColour: 7,
      secondaryColour: 26,
      tertiaryColour: 19,
      bannerIndex: 0x33,
      animationFrame: 3,
      isAcrossTrack: true,
      isAnimationBackwards: true,
    });
  });

  it("decodes large scenery with a split banner index", () => {
    expect(decodeTile(rec(0x58, 0, 2, 10, 0x05, 0x0d, 0xa4, 0x63))).toMatchObject({
      kind: "largeScenery",
      entryIndex: 261,
      sequenceIndex: 3,
      primaryColour: 4,
      secondaryColour: 3,
      bannerIndex: 107,
    });
  });

  it("decodes a banner", () => {
    expect(decodeTile(rec(0x1c, 0, 2, 4, 9, 2, 0xf5, 0))).toMatchObject({
      kind: "banner",
      bannerIndex: 9,
      position: 2,
      allowedEdges: 5,
    });
  });

  it("rejects a record of the wrong size", () => {
    expect(() => decodeTile(rec(0, 0, 0))).toThrow(FormatError);
  });
});

describe("importTileRecord", () => {
  it("passes padding through byte-for-byte", () => {
    const raw = rec(0x00, 0x80, 0xff, 0xff, 1, 2, 3, 4);
    expect(isPassthroughRecord(raw)).toBe(true);

    const el = importTileRecord(raw, 0);
    raw[4] = 99;
    expect(el).toEqual({ kind: "raw", bytes: rec(0x00, 0x80, 0xff, 0xff, 1, 2, 3, 4) });
    expect(isDecoded(el)).toBe(false);
    expect(isLastForTile(el)).toBe(true);
  });

  it("passes corrupt markers through", () => {
    for (const type of [0x20, 0x38, 0x3c]) {
      expect(importTileRecord(rec(type, 0, 2, 2, 0, 0, 0, 0), 0).kind).toBe("raw");
    }
  });

  it("passes reserved tags 9 to 13 through", () => {
    for (const type of [0x24, 0x28, 0x2c, 0x30, 0x34]) {
      const raw = rec(type, 0, 2, 2, 5, 6, 7, 8);
      expect(importTileRecord(raw, 1)).toEqual({ kind: "raw", bytes: rec(type, 0, 2, 2, 5, 6, 7, 8) });
    }
    expect(tileTag(rec(0x24, 0, 2, 2, 0, 0, 0, 0))).toBe(9);
  });

  it("still rejects reserved tags when decoded directly", () => {
    expect(() => decodeTile(rec(0x24, 0, 2, 2, 0, 0, 0, 0))).toThrow("Unreachable tile element tag 9");
    expect(() => decodeTile(rec(0x34, 0, 2, 2, 0, 0, 0, 0))).toThrow(FormatError);
  });
});

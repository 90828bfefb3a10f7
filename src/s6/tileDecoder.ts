// src/s6/tileDecoder.ts
import { FormatError } from "./errors.js";
import type { RawTileRecord } from "./rawRecords.js";
import {
  TILE_ELEMENT_TAGS,
  TILE_ELEMENT_TAG_CORRUPT,
  type DecodedTileElement,
  type TileElement,
  type TileElementBase,
} from "../world/tileElement.js";

const TYPE_MASK = 0x3c;
const DIRECTION_MASK = 0x03;
const BASE_HEIGHT_PADDING = 0xff;

export function tileTag(raw: RawTileRecord): number {
  return ((raw[0] ?? 0) & TYPE_MASK) >> 2;
}

/**
 * Padding (base height 0xFF), corrupt markers and the reserved tags 9..15 are
 * carried byte-for-byte.
 */
export function isPassthroughRecord(raw: RawTileRecord): boolean {
  return raw[2] === BASE_HEIGHT_PADDING || tileTag(raw) >= TILE_ELEMENT_TAG_CORRUPT;
}

function byteAt(raw: RawTileRecord, i: number): number {
  return raw[i] ?? 0;
}

export function decodeTile(raw: RawTileRecord): DecodedTileElement {
  if (raw.length !== 8) {
    throw new FormatError(`Tile record must be 8 bytes, got ${raw.length}`);
  }
  const type = byteAt(raw, 0);
  const flags = byteAt(raw, 1);
  const b4 = byteAt(raw, 4);
  const b5 = byteAt(raw, 5);
  const b6 = byteAt(raw, 6);
  const b7 = byteAt(raw, 7);

  const base: TileElementBase = {
    direction: type & DIRECTION_MASK,
    flags,
    baseHeight: byteAt(raw, 2),
    clearanceHeight: byteAt(raw, 3),
  };

  const tag = tileTag(raw);
  switch (tag) {
    case TILE_ELEMENT_TAGS.surface:
      return {
        ...base,
        kind: "surface",
        slope: b4 & 0x1f,
        surfaceStyle: (b5 >> 5) | ((type & 0x01) << 3),
        edgeStyle: (b4 >> 5) | ((type & 0x80) >> 4),
        grassLength: b6,
        ownership: b7 & 0xf0,
        parkFences: b7 & 0x0f,
        waterHeight: b5 & 0x1f,
        hasTrackThatNeedsWater: (type & 0x40) !== 0,
      };

    case TILE_ELEMENT_TAGS.path:
      return {
        ...base,
        kind: "path",
        entryIndex: b4 >> 4,
        queueBannerDirection: (type & 0xc0) >> 6,
        isSloped: (b4 & 0x04) !== 0,
        slopeDirection: b4 & 0x03,
        rideIndex: b7,
        stationIndex: (b5 & 0x70) >> 4,
        isWide: (type & 0x02) !== 0,
        isQueue: (type & 0x01) !== 0,
        hasQueueBanner: (b4 & 0x08) !== 0,
        edges: b6 & 0x0f,
        corners: b6 >> 4,
        addition: b5 & 0x0f,
        additionIsGhost: (b5 & 0x80) !== 0,
        additionStatus: b7,
      };

    case TILE_ELEMENT_TAGS.track:
      return {
        ...base,
        kind: "track",
        trackType: b4,
        sequenceIndex: b5 & 0x0f,
        rideIndex: b7,
        colourScheme: b6 & 0x03,
        stationIndex: (b5 & 0x70) >> 4,
        hasChain: (type & 0x80) !== 0,
        hasCableLift: (b6 & 0x08) !== 0,
        isInverted: (b6 & 0x04) !== 0,
        brakeBoosterSpeed: (b5 >> 4) << 1,
        hasGreenLight: (b5 & 0x80) !== 0,
        seatRotation: b6 >> 4,
        mazeEntry: b5 | (b6 << 8),
        photoTimeout: b5 >> 4,
      };

    case TILE_ELEMENT_TAGS.smallScenery:
      return {
        ...base,
        kind: "smallScenery",
        entryIndex: b4,
        age: b5,
        quadrant: (type & 0xc0) >> 6,
        primaryColour: b6 & 0x1f,
        secondaryColour: b7 & 0x1f,
        needsSupports: (b6 & 0x20) !== 0,
      };

    case TILE_ELEMENT_TAGS.entrance:
      return {
        ...base,
        kind: "entrance",
        entranceType: b4,
        rideIndex: b7,
        stationIndex: (b5 & 0x70) >> 4,
        sequenceIndex: b5 & 0x0f,
        pathType: b6,
      };

    case TILE_ELEMENT_TAGS.wall:
      return {
        ...base,
        kind: "wall",
        entryIndex: b4,
        slope: (type & 0xc0) >> 6,
        primaryColour: b6 & 0x1f,
        secondaryColour: (b6 >> 5) | ((flags & 0x60) >> 2),
        tertiaryColour: b5 & 0x1f,
        animationFrame: (b7 >> 3) & 0x0f,
        bannerIndex: b5,
        isAcrossTrack: (b7 & 0x04) !== 0,
        isAnimationBackwards: (b7 & 0x80) !== 0,
      };

    case TILE_ELEMENT_TAGS.largeScenery: {
      const word = b4 | (b5 << 8);
      return {
        ...base,
        kind: "largeScenery",
        entryIndex: word & 0x3ff,
        sequenceIndex: word >> 10,
        primaryColour: b6 & 0x1f,
        secondaryColour: b7 & 0x1f,
        bannerIndex: (type & 0xc0) | ((b6 & 0xe0) >> 2) | ((b7 & 0xe0) >> 5),
      };
    }

    case TILE_ELEMENT_TAGS.banner:
      return {
        ...base,
        kind: "banner",
        bannerIndex: b4,
        position: b5,
        allowedEdges: b6 & 0x0f,
      };

    default:
      throw new FormatError(`Unreachable tile element tag ${tag}`);
  }
}

/** Decodes one record in scan order; anything without a decoder passes through raw. */
export function importTileRecord(raw: RawTileRecord, tileIndex: number): TileElement {
  if (isPassthroughRecord(raw)) {
    return { kind: "raw", bytes: Uint8Array.from(raw) };
  }
  try {
    return decodeTile(raw);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new FormatError(`${msg} at tileIndex=${tileIndex}`);
  }
}

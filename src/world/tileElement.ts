// src/world/tileElement.ts

export const TILE_ELEMENT_FLAG_GHOST = 0x10;
export const TILE_ELEMENT_FLAG_LAST_TILE = 0x80;

export const OWNERSHIP_UNOWNED = 0x00;
export const OWNERSHIP_CONSTRUCTION_RIGHTS_OWNED = 0x10;
export const OWNERSHIP_OWNED = 0x20;
export const OWNERSHIP_CONSTRUCTION_RIGHTS_AVAILABLE = 0x40;
export const OWNERSHIP_AVAILABLE = 0x80;

export const ENTRANCE_TYPE_RIDE_ENTRANCE = 0;
export const ENTRANCE_TYPE_RIDE_EXIT = 1;
export const ENTRANCE_TYPE_PARK_ENTRANCE = 2;

export type TileElementKind =
  | "surface"
  | "path"
  | "track"
  | "smallScenery"
  | "entrance"
  | "wall"
  | "largeScenery"
  | "banner";

/** Type tags as stored in bits 2..5 of the type byte. */
export const TILE_ELEMENT_TAGS: Readonly<Record<TileElementKind, number>> = {
  surface: 0,
  path: 1,
  track: 2,
  smallScenery: 3,
  entrance: 4,
  wall: 5,
  largeScenery: 6,
  banner: 7,
};

export const TILE_ELEMENT_TAG_CORRUPT = 8;

export type TileElementBase = {
  direction: number;
  flags: number;
  baseHeight: number;
  clearanceHeight: number;
};

export type SurfaceElement = TileElementBase & {
  kind: "surface";
  slope: number;
  surfaceStyle: number;
  edgeStyle: number;
  grassLength: number;
  ownership: number;
  parkFences: number;
  waterHeight: number;
  hasTrackThatNeedsWater: boolean;
};

export type PathElement = TileElementBase & {
  kind: "path";
  entryIndex: number;
  queueBannerDirection: number;
  isSloped: boolean;
  slopeDirection: number;
  rideIndex: number;
  stationIndex: number;
  isWide: boolean;
  isQueue: boolean;
  hasQueueBanner: boolean;
  edges: number;
  corners: number;
  addition: number;
  additionIsGhost: boolean;
  additionStatus: number;
};

export type TrackElement = TileElementBase & {
  kind: "track";
  trackType: number;
  sequenceIndex: number;
  rideIndex: number;
  colourScheme: number;
  stationIndex: number;
  hasChain: boolean;
  hasCableLift: boolean;
  isInverted: boolean;
  brakeBoosterSpeed: number;
  hasGreenLight: boolean;
  seatRotation: number;
  mazeEntry: number;
  photoTimeout: number;
};

export type SmallSceneryElement = TileElementBase & {
  kind: "smallScenery";
  entryIndex: number;
  age: number;
  quadrant: number;
  primaryColour: number;
  secondaryColour: number;
  needsSupports: boolean;
};

export type EntranceElement = TileElementBase & {
  kind: "entrance";
  entranceType: number;
  rideIndex: number;
  stationIndex: number;
  sequenceIndex: number;
  pathType: number;
};

export type WallElement = TileElementBase & {
  kind: "wall";
  entryIndex: number;
  slope: number;
  primaryColour: number;
  secondaryColour: number;
  tertiaryColour: number;
  animationFrame: number;
  bannerIndex: number;
  isAcrossTrack: boolean;
  isAnimationBackwards: boolean;
};

export type LargeSceneryElement = TileElementBase & {
  kind: "largeScenery";
  entryIndex: number;
  sequenceIndex: number;
  primaryColour: number;
  secondaryColour: number;
  bannerIndex: number;
};

export type BannerElement = TileElementBase & {
  kind: "banner";
  bannerIndex: number;
  position: number;
  allowedEdges: number;
};

/** Record copied through untouched (padding, corrupt markers). */
export type RawElement = {
  kind: "raw";
  bytes: Uint8Array;
};

export type DecodedTileElement =
  | SurfaceElement
  | PathElement
  | TrackElement
  | SmallSceneryElement
  | EntranceElement
  | WallElement
  | LargeSceneryElement
  | BannerElement;

export type TileElement = DecodedTileElement | RawElement;

export function isDecoded(el: TileElement): el is DecodedTileElement {
  return el.kind !== "raw";
}

/** Last-for-tile marker; raw records carry it in their flags byte. */
export function isLastForTile(el: TileElement): boolean {
  const flags = el.kind === "raw" ? (el.bytes[1] ?? 0) : el.flags;
  return (flags & TILE_ELEMENT_FLAG_LAST_TILE) !== 0;
}

// src/s6/layout.ts
//
// Fixed sizes and chunk order of the two legacy layouts. The numbers are
// literal format constants; the scenario and saved-game sequences are not
// derived from one another.

export const S6_TYPE_SAVED_GAME = 0;
export const S6_TYPE_SCENARIO = 1;

export const CLASSIC_FLAG_UNSUPPORTED = 0x0f;

export type S6Kind = "scenario" | "savedGame";

export const HEADER_SIZE = 0x20;
export const SCENARIO_INFO_SIZE = 0x198;
export const OBJECT_ENTRY_SIZE = 16;
export const OBJECT_ENTRY_COUNT = 721;
export const OBJECTS_SIZE = OBJECT_ENTRY_COUNT * OBJECT_ENTRY_SIZE;
export const DATE_BLOCK_SIZE = 16;

export const MAX_TILE_ELEMENTS = 0x30000;
export const TILE_ELEMENT_SIZE = 8;
export const TILE_ELEMENTS_SIZE = MAX_TILE_ELEMENTS * TILE_ELEMENT_SIZE;

/** Everything from the next-free-element index to the end of the file image. */
export const PARK_DATA_SIZE = 3048816;

export type ParkChunk = Readonly<{
  name: string;
  /** Offset inside the park data region. */
  offset: number;
  size: number;
}>;

export const SAVED_GAME_PARK_CHUNKS: ReadonlyArray<ParkChunk> = [
  { name: "park", offset: 0, size: 3048816 },
];

// Scenarios leave research bitmaps, the expenditure table, histories and the
// trailing block out; those spans stay zero in the park data region.
export const SCENARIO_PARK_CHUNKS: ReadonlyArray<ParkChunk> = [
  { name: "sprites", offset: 0, size: 2560076 },
  { name: "guestsInPark", offset: 2561164, size: 4 },
  { name: "lastGuestsInPark", offset: 2562064, size: 8 },
  { name: "parkRating", offset: 2562296, size: 2 },
  { name: "researchState", offset: 2562362, size: 1082 },
  { name: "currentExpenditure", offset: 2563956, size: 16 },
  { name: "parkValue", offset: 2564484, size: 4 },
  { name: "companyValue", offset: 2565000, size: 483816 },
];

export type LayoutDescriptor = Readonly<{
  kind: S6Kind;
  headerType: number;
  hasScenarioInfo: boolean;
  parkChunks: ReadonlyArray<ParkChunk>;
}>;

export const SCENARIO_LAYOUT: LayoutDescriptor = {
  kind: "scenario",
  headerType: S6_TYPE_SCENARIO,
  hasScenarioInfo: true,
  parkChunks: SCENARIO_PARK_CHUNKS,
};

export const SAVED_GAME_LAYOUT: LayoutDescriptor = {
  kind: "savedGame",
  headerType: S6_TYPE_SAVED_GAME,
  hasScenarioInfo: false,
  parkChunks: SAVED_GAME_PARK_CHUNKS,
};

export function layoutFor(kind: S6Kind): LayoutDescriptor {
  return kind === "scenario" ? SCENARIO_LAYOUT : SAVED_GAME_LAYOUT;
}

// Record counts inside the park data region.
export const RCT2_MAX_SPRITES = 10000;
export const SPRITE_SIZE = 256;
export const NUM_SPRITE_LISTS = 6;
export const MAX_PEEP_SPAWNS = 2;
export const RIDE_TYPE_QUADS = 8;
export const RIDE_ENTRY_QUADS = 8;
export const TRACK_TYPE_QUADS = 128;
export const SCENERY_ITEM_QUADS = 56;
export const EXPENDITURE_MONTHS = 16;
export const EXPENDITURE_TYPES = 14;
export const HISTORY_SIZE = 32;
export const FINANCE_GRAPH_SIZE = 128;
export const MAX_AWARDS = 4;
export const MAX_RESEARCH_ITEMS = 500;
export const RESEARCH_ITEM_SIZE = 5;
export const MAX_PARK_ENTRANCES = 4;
export const EXPANSION_PACK_NAMES_SIZE = 3256;
export const MAX_BANNERS = 250;
export const BANNER_SIZE = 8;
export const MAX_USER_STRINGS = 1024;
export const USER_STRING_MAX_LENGTH = 32;
export const MAX_RIDES = 255;
export const RIDE_SIZE = 0x260;
export const MAX_ANIMATED_OBJECTS = 2000;
export const MAP_ANIMATION_SIZE = 6;
export const RIDE_RATINGS_CALC_DATA_SIZE = 0x4c;
export const MAX_RIDE_MEASUREMENTS = 8;
export const RIDE_MEASUREMENT_SIZE = 0x4b0c;
export const MAX_STAFF = 200;
export const STAFF_TYPE_COUNT = 4;
export const PATROL_AREA_SIZE = 128;
export const MAX_NEWS_ITEMS = 61;
export const NEWS_ITEM_SIZE = 268;
export const NEWS_TEXT_SIZE = 256;

